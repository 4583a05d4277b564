export type Platform = "mac" | "windows" | "linux";

export const platforms: readonly Platform[] = ["mac", "windows", "linux"];

export function detectPlatform(): Platform {
  if (typeof process === "undefined") {
    return "linux";
  }
  if (process.platform === "darwin") {
    return "mac";
  }
  if (process.platform === "win32") {
    return "windows";
  }
  return "linux";
}
