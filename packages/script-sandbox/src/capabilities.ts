import type { FileStore } from "@tabula/file-store";
import { loadWorkbook, saveWorkbook, sheetRecords, workbookFromRecords } from "@tabula/workbook-ops";
import HTMLtoDOCX from "html-to-docx";
import mammoth from "mammoth";
import pino, { type Logger } from "pino";
import sharp from "sharp";
import { z, type ZodType, type ZodTypeDef } from "zod";

import { CapabilityArgumentError } from "./errors.js";

/** A host function a script can call. Inside the sandbox it always returns a promise. */
export type SandboxCapability = (...args: unknown[]) => Promise<unknown>;

export type SandboxCapabilities = Record<string, SandboxCapability>;

export const CAPABILITY_NAMES = [
  "read_file",
  "write_file",
  "read_json",
  "write_json",
  "read_excel",
  "write_excel",
  "read_excel_all",
  "write_excel_all",
  "read_image",
  "write_image",
  "read_docx",
  "write_docx",
  "encode_base64",
  "decode_base64",
] as const;

export type CapabilityName = (typeof CAPABILITY_NAMES)[number];

/** Signatures as shown to script authors. */
export const CAPABILITY_SIGNATURES: Record<CapabilityName, string> = {
  read_file: "read_file(handle) -> Uint8Array",
  write_file: "write_file(filename, content: Uint8Array | string) -> handle",
  read_json: "read_json(handle) -> any",
  write_json: "write_json(data, filename) -> handle",
  read_excel: "read_excel(handle) -> Array<record> (first sheet, keyed by header row)",
  write_excel: "write_excel(records, filename) -> handle",
  read_excel_all: "read_excel_all(handle) -> { [sheetName]: Array<record> }",
  write_excel_all: "write_excel_all({ [sheetName]: Array<record> }, filename) -> handle",
  read_image: "read_image(handle) -> { format, width, height, channels, data: Uint8Array }",
  write_image: "write_image({ data, format? }, filename) -> handle (re-encoded to the filename's extension)",
  read_docx: "read_docx(handle) -> string (one line per paragraph)",
  write_docx: "write_docx(text, filename) -> handle (one paragraph per line)",
  encode_base64: "encode_base64(data: Uint8Array | string) -> string",
  decode_base64: "decode_base64(text) -> Uint8Array",
};

export interface SandboxCapabilityOptions {
  fileStore: FileStore;
  logger?: Logger;
}

const HandleArg = z.string().trim().min(1, "expected a file handle");
const FilenameArg = z.string().trim().min(1, "expected a file name");
const BytesArg = z.instanceof(Uint8Array);
const ContentArg = z.union([BytesArg, z.string()]);
const RecordsArg = z.array(z.record(z.unknown()));
const ImageArg = z.object({ data: BytesArg, format: z.string().optional() });

type SharpFormat = keyof sharp.FormatEnum;

const IMAGE_FORMATS = new Map<string, SharpFormat>([
  ["png", "png"],
  ["jpg", "jpeg"],
  ["jpeg", "jpeg"],
  ["webp", "webp"],
  ["gif", "gif"],
  ["tif", "tiff"],
  ["tiff", "tiff"],
  ["avif", "avif"],
]);

function toBytes(content: Uint8Array | string): Uint8Array {
  return typeof content === "string" ? new TextEncoder().encode(content) : content;
}

function extensionOf(filename: string): string {
  const dot = filename.lastIndexOf(".");
  return dot === -1 ? "" : filename.slice(dot + 1).toLowerCase();
}

function escapeHtml(text: string): string {
  return text
    .replaceAll("&", "&amp;")
    .replaceAll("<", "&lt;")
    .replaceAll(">", "&gt;")
    .replaceAll('"', "&quot;");
}

/**
 * Builds a capability from a tuple schema for its arguments. Argument errors
 * reach the script as a rejected promise naming the capability.
 */
function capability<Args extends unknown[]>(
  name: CapabilityName,
  args: ZodType<Args, ZodTypeDef, unknown>,
  handler: (...parsed: Args) => Promise<unknown>,
  logger: Logger,
): SandboxCapability {
  return async (...raw: unknown[]) => {
    const parsed = args.safeParse(raw);
    if (!parsed.success) {
      const [issue] = parsed.error.issues;
      const where = issue && issue.path.length > 0 ? `argument ${issue.path.join(".")}` : "arguments";
      throw new CapabilityArgumentError(name, `invalid ${where}: ${issue?.message ?? "validation failed"}`);
    }
    logger.debug({ capability: name }, "sandbox_capability_called");
    return handler(...parsed.data);
  };
}

/**
 * Creates the capability object handed to one script run. Every file access a
 * script makes goes through `fileStore`.
 */
export function createSandboxCapabilities(options: SandboxCapabilityOptions): Record<CapabilityName, SandboxCapability> {
  const { fileStore } = options;
  const logger = options.logger ?? pino({ level: "silent" });

  const readText = async (handle: string): Promise<string> =>
    new TextDecoder().decode(await fileStore.download(handle));

  return {
    read_file: capability("read_file", z.tuple([HandleArg]), (handle) => fileStore.download(handle), logger),

    write_file: capability(
      "write_file",
      z.tuple([FilenameArg, ContentArg]),
      (filename, content) => fileStore.upload(filename, toBytes(content)),
      logger,
    ),

    read_json: capability(
      "read_json",
      z.tuple([HandleArg]),
      async (handle): Promise<unknown> => JSON.parse(await readText(handle)),
      logger,
    ),

    write_json: capability(
      "write_json",
      z.tuple([z.unknown(), FilenameArg]),
      (data, filename) => fileStore.upload(filename, new TextEncoder().encode(JSON.stringify(data) ?? "null")),
      logger,
    ),

    read_excel: capability(
      "read_excel",
      z.tuple([HandleArg]),
      async (handle) => {
        const workbook = await loadWorkbook(await fileStore.download(handle));
        return sheetRecords(workbook, workbook.firstSheet().name);
      },
      logger,
    ),

    write_excel: capability(
      "write_excel",
      z.tuple([RecordsArg, FilenameArg]),
      async (records, filename) => fileStore.upload(filename, await saveWorkbook(workbookFromRecords({ Sheet1: records }))),
      logger,
    ),

    read_excel_all: capability(
      "read_excel_all",
      z.tuple([HandleArg]),
      async (handle) => {
        const workbook = await loadWorkbook(await fileStore.download(handle));
        return Object.fromEntries(workbook.listSheets().map((name) => [name, sheetRecords(workbook, name)]));
      },
      logger,
    ),

    write_excel_all: capability(
      "write_excel_all",
      z.tuple([z.record(RecordsArg), FilenameArg]),
      async (sheets, filename) => fileStore.upload(filename, await saveWorkbook(workbookFromRecords(sheets))),
      logger,
    ),

    read_image: capability(
      "read_image",
      z.tuple([HandleArg]),
      async (handle) => {
        const data = await fileStore.download(handle);
        const metadata = await sharp(data).metadata();
        return {
          format: metadata.format ?? null,
          width: metadata.width ?? null,
          height: metadata.height ?? null,
          channels: metadata.channels ?? null,
          data,
        };
      },
      logger,
    ),

    write_image: capability(
      "write_image",
      z.tuple([ImageArg, FilenameArg]),
      async (image, filename) => {
        const target = IMAGE_FORMATS.get(extensionOf(filename)) ?? IMAGE_FORMATS.get(image.format?.toLowerCase() ?? "");
        const current = image.format ? IMAGE_FORMATS.get(image.format.toLowerCase()) : undefined;
        const bytes =
          target && target !== current ? new Uint8Array(await sharp(image.data).toFormat(target).toBuffer()) : image.data;
        return fileStore.upload(filename, bytes);
      },
      logger,
    ),

    read_docx: capability(
      "read_docx",
      z.tuple([HandleArg]),
      async (handle) => {
        const result = await mammoth.extractRawText({ buffer: Buffer.from(await fileStore.download(handle)) });
        // Raw text ends every paragraph with a blank line.
        return result.value.replace(/\n\n/g, "\n").replace(/\n+$/, "");
      },
      logger,
    ),

    write_docx: capability(
      "write_docx",
      z.tuple([z.string(), FilenameArg]),
      async (text, filename) => {
        const body = text
          .split("\n")
          .map((line) => `<p>${escapeHtml(line)}</p>`)
          .join("");
        const buffer = await HTMLtoDOCX(`<!DOCTYPE html><html><body>${body}</body></html>`);
        return fileStore.upload(filename, new Uint8Array(buffer));
      },
      logger,
    ),

    encode_base64: capability(
      "encode_base64",
      z.tuple([ContentArg]),
      async (data) => Buffer.from(toBytes(data)).toString("base64"),
      logger,
    ),

    decode_base64: capability(
      "decode_base64",
      z.tuple([z.string()]),
      async (text) => new Uint8Array(Buffer.from(text, "base64")),
      logger,
    ),
  };
}
