import { FileNotFoundError, InMemoryFileStore } from "@tabula/file-store";
import sharp from "sharp";
import { describe, expect, it } from "vitest";

import { CAPABILITY_NAMES, CAPABILITY_SIGNATURES, createSandboxCapabilities } from "../src/capabilities.js";
import { CapabilityArgumentError } from "../src/errors.js";
import { ScriptSandbox } from "../src/sandbox.js";

function setup() {
  const fileStore = new InMemoryFileStore();
  return { fileStore, capabilities: createSandboxCapabilities({ fileStore }) };
}

describe("createSandboxCapabilities", () => {
  it("provides every documented helper", () => {
    const { capabilities } = setup();
    expect(Object.keys(capabilities).sort()).toEqual([...CAPABILITY_NAMES].sort());
    expect(Object.keys(CAPABILITY_SIGNATURES).sort()).toEqual([...CAPABILITY_NAMES].sort());
  });

  it("writes and reads raw files", async () => {
    const { capabilities } = setup();

    const handle = await capabilities.write_file("notes.txt", "hello");
    expect(handle).toBe("notes.txt");
    expect(await capabilities.read_file("notes.txt")).toEqual(new TextEncoder().encode("hello"));
  });

  it("writes and reads JSON", async () => {
    const { capabilities } = setup();

    await expect(capabilities.write_json({ a: [1, 2] }, "data.json")).resolves.toBe("data.json");
    await expect(capabilities.read_json("data.json")).resolves.toEqual({ a: [1, 2] });
  });

  it("writes and reads the first sheet as records", async () => {
    const { capabilities } = setup();

    await capabilities.write_excel([{ name: "Alice", score: 3 }, { name: "Bob" }], "scores.xlsx");
    await expect(capabilities.read_excel("scores.xlsx")).resolves.toEqual([
      { name: "Alice", score: 3 },
      { name: "Bob", score: null },
    ]);
  });

  it("writes and reads every sheet", async () => {
    const { capabilities } = setup();

    await capabilities.write_excel_all({ A: [{ x: 1 }], B: [{ y: "z" }] }, "multi.xlsx");
    await expect(capabilities.read_excel_all("multi.xlsx")).resolves.toEqual({ A: [{ x: 1 }], B: [{ y: "z" }] });
  });

  it("encodes and decodes base64", async () => {
    const { capabilities } = setup();

    await expect(capabilities.encode_base64("hi")).resolves.toBe("aGk=");
    await expect(capabilities.encode_base64(new Uint8Array([104, 105]))).resolves.toBe("aGk=");
    await expect(capabilities.decode_base64("aGk=")).resolves.toEqual(new Uint8Array([104, 105]));
  });

  it("reads image metadata and re-encodes by extension", async () => {
    const { fileStore, capabilities } = setup();
    const png = await sharp({
      create: { width: 2, height: 3, channels: 3, background: { r: 255, g: 0, b: 0 } },
    })
      .png()
      .toBuffer();
    await fileStore.upload("red.png", new Uint8Array(png));

    await expect(capabilities.read_image("red.png")).resolves.toMatchObject({
      format: "png",
      width: 2,
      height: 3,
      channels: 3,
    });

    await capabilities.write_image({ data: new Uint8Array(png), format: "png" }, "red.jpg");
    await expect(capabilities.read_image("red.jpg")).resolves.toMatchObject({ format: "jpeg", width: 2, height: 3 });
  });

  it("writes and reads docx paragraphs", async () => {
    const { capabilities } = setup();

    await capabilities.write_docx("First line\nSecond line", "notes.docx");
    const text = await capabilities.read_docx("notes.docx");

    expect(typeof text).toBe("string");
    expect(String(text).split("\n").filter(Boolean)).toEqual(["First line", "Second line"]);
  });

  it("rejects malformed arguments with the capability name", async () => {
    const { capabilities } = setup();

    const promise = capabilities.read_file(42);
    await expect(promise).rejects.toBeInstanceOf(CapabilityArgumentError);
    await expect(promise).rejects.toThrow("read_file: invalid argument 0: Expected string, received number");
  });

  it("passes store errors through", async () => {
    const { capabilities } = setup();
    await expect(capabilities.read_json("missing.json")).rejects.toBeInstanceOf(FileNotFoundError);
  });

  it("is reachable from scripts", async () => {
    const { fileStore, capabilities } = setup();
    const sandbox = new ScriptSandbox();

    const result = await sandbox.run(
      {
        script: [
          'const handle = await write_json({ total: input_data.values.length }, "summary.json");',
          "const back = await read_json(handle);",
          'output = { handle, total: back.total, encoded: await encode_base64("hi") };',
        ].join("\n"),
        input: { values: [4, 5, 6] },
      },
      capabilities,
    );

    expect(result).toMatchObject({ success: true, output: { handle: "summary.json", total: 3, encoded: "aGk=" } });
    expect(await fileStore.list()).toEqual(["summary.json"]);
  });

  it("reports argument errors to the script", async () => {
    const { capabilities } = setup();
    const sandbox = new ScriptSandbox();

    const result = await sandbox.run({ script: "output = await read_file(42);" }, capabilities);
    expect(result).toMatchObject({
      success: false,
      error: {
        kind: "ScriptRuntimeError",
        message: "CapabilityArgumentError: read_file: invalid argument 0: Expected string, received number",
      },
    });
  });
});
