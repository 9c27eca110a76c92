import { FileNotFoundError } from "./errors.js";
import type { FileStore } from "./file-store.js";
import { normalizeHandle } from "./handles.js";

export class InMemoryFileStore implements FileStore {
  private readonly files = new Map<string, Uint8Array>();

  constructor(initial: Record<string, Uint8Array> = {}) {
    for (const [name, bytes] of Object.entries(initial)) {
      this.files.set(normalizeHandle(name), new Uint8Array(bytes));
    }
  }

  async download(handle: string): Promise<Uint8Array> {
    const bytes = this.files.get(normalizeHandle(handle));
    if (!bytes) throw new FileNotFoundError(handle);
    return new Uint8Array(bytes);
  }

  async upload(name: string, bytes: Uint8Array): Promise<string> {
    const handle = normalizeHandle(name);
    // Copy so later mutation of the caller's buffer can't change stored content.
    this.files.set(handle, new Uint8Array(bytes));
    return handle;
  }

  async exists(handle: string): Promise<boolean> {
    return this.files.has(normalizeHandle(handle));
  }

  async list(): Promise<string[]> {
    return [...this.files.keys()].sort();
  }
}
