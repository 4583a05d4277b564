export * from "./scribe";
