import { InvalidHandleError } from "./errors.js";

/**
 * Handles are plain file names relative to the store root. Anything that could
 * walk out of the root (parent segments, absolute paths, drive letters) is
 * rejected before a back end sees it.
 */
export function normalizeHandle(name: string): string {
  const handle = name.trim();
  if (handle === "") throw new InvalidHandleError(name, "empty name");
  if (handle.includes("\0")) throw new InvalidHandleError(name, "contains a NUL byte");
  if (handle.startsWith("/") || handle.startsWith("\\")) {
    throw new InvalidHandleError(name, "absolute paths are not allowed");
  }
  if (/^[A-Za-z]:/.test(handle)) throw new InvalidHandleError(name, "absolute paths are not allowed");

  const segments = handle.split(/[\\/]/);
  if (segments.some((segment) => segment === "..")) {
    throw new InvalidHandleError(name, "parent directory segments are not allowed");
  }
  if (segments.some((segment) => segment === "" || segment === ".")) {
    throw new InvalidHandleError(name, "empty path segment");
  }

  return segments.join("/");
}
