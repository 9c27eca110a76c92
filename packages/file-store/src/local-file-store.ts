import { promises as fs } from "node:fs";
import path from "node:path";

import { FileNotFoundError } from "./errors.js";
import type { FileStore } from "./file-store.js";
import { normalizeHandle } from "./handles.js";

function errnoCode(err: unknown): string | undefined {
  if (typeof err !== "object" || err === null || !("code" in err)) return undefined;
  return typeof err.code === "string" ? err.code : undefined;
}

async function atomicWriteFile(filePath: string, contents: Uint8Array): Promise<void> {
  const dir = path.dirname(filePath);
  const base = path.basename(filePath);
  const tmpPath = path.join(dir, `.${base}.${process.pid}.${Date.now()}.tmp`);

  await fs.writeFile(tmpPath, contents);
  try {
    await fs.rename(tmpPath, filePath);
  } catch (err) {
    const code = errnoCode(err);
    if (code === "EEXIST" || code === "EPERM") {
      await fs.rm(filePath, { force: true });
      await fs.rename(tmpPath, filePath);
      return;
    }
    throw err;
  }
}

/**
 * Stores files under a single root directory. Handles are relative names; the
 * same name always maps to the same file, so uploads are last-write-wins.
 */
export class LocalFileStore implements FileStore {
  private readonly root: string;

  constructor(root: string) {
    this.root = path.resolve(root);
  }

  private pathFor(handle: string): string {
    const resolved = path.resolve(this.root, normalizeHandle(handle));
    const relative = path.relative(this.root, resolved);
    if (relative === "" || relative.startsWith("..") || path.isAbsolute(relative)) {
      throw new FileNotFoundError(handle);
    }
    return resolved;
  }

  async download(handle: string): Promise<Uint8Array> {
    const filePath = this.pathFor(handle);
    try {
      return new Uint8Array(await fs.readFile(filePath));
    } catch (err) {
      const code = errnoCode(err);
      if (code === "ENOENT" || code === "EISDIR") throw new FileNotFoundError(handle);
      throw err;
    }
  }

  async upload(name: string, bytes: Uint8Array): Promise<string> {
    const handle = normalizeHandle(name);
    const filePath = this.pathFor(handle);
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await atomicWriteFile(filePath, bytes);
    return handle;
  }

  async exists(handle: string): Promise<boolean> {
    try {
      const stat = await fs.stat(this.pathFor(handle));
      return stat.isFile();
    } catch (err) {
      if (errnoCode(err) === "ENOENT") return false;
      throw err;
    }
  }

  async list(): Promise<string[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.root, { recursive: true });
    } catch (err) {
      if (errnoCode(err) === "ENOENT") return [];
      throw err;
    }

    const files: string[] = [];
    for (const entry of entries) {
      const handle = entry.split(path.sep).join("/");
      if (path.basename(handle).startsWith(".")) continue;
      const stat = await fs.stat(path.join(this.root, entry));
      if (stat.isFile()) files.push(handle);
    }
    return files.sort();
  }
}
