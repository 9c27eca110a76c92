export class FileNotFoundError extends Error {
  readonly handle: string;

  constructor(handle: string) {
    super(`File not found: ${handle}`);
    this.name = "FileNotFoundError";
    this.handle = handle;
  }
}

export class InvalidHandleError extends Error {
  readonly handle: string;

  constructor(handle: string, reason: string) {
    super(`Invalid file handle "${handle}": ${reason}`);
    this.name = "InvalidHandleError";
    this.handle = handle;
  }
}
