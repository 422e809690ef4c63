import { access, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import JSZip from "jszip";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { MAX_LOGO_SCALE, resolveRequest } from "./config.js";
import { ErrorCode } from "./errors.js";
import { readManifest } from "./output.js";
import { runGeneration } from "./workflow.js";
import { decodeEan, decodeQR, makeTempDir, removeDir, solidPng } from "../test-utils/decode.js";

describe("runGeneration", () => {
  let dir: string;
  let outputDir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
    outputDir = path.join(dir, "output");
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  const writeCodes = async (lines: string): Promise<string> => {
    const file = path.join(dir, "codes.txt");
    await writeFile(file, lines);
    return file;
  };

  it("lists every line of the input file in the manifest, in order", async () => {
    const file = await writeCodes("590123412345\n400638133393\n\n501234567890\n");
    const summary = await runGeneration(resolveRequest({ file, outputDir }));

    expect(summary).toMatchObject({ total: 3, written: 3, failed: 0, outputDir });
    await expect(readManifest(outputDir)).resolves.toEqual([
      { code: "590123412345", filename: "590123412345.png" },
      { code: "400638133393", filename: "400638133393.png" },
      { code: "501234567890", filename: "501234567890.png" },
    ]);

    const png = await readFile(path.join(outputDir, "400638133393.png"));
    await expect(decodeEan(png, "ean13")).resolves.toBe("4006381333931");
  });

  it("writes one QR image per generated code", async () => {
    const summary = await runGeneration(
      resolveRequest({ count: 4, length: 6, alphanum: true, encodingType: "qr", outputDir })
    );
    const entries = await readManifest(outputDir);
    expect(entries).toHaveLength(4);
    expect(new Set(entries.map((entry) => entry.code)).size).toBe(4);
    expect(summary.results.map((result) => result.code)).toEqual(entries.map((entry) => entry.code));

    const first = entries[0];
    const png = await readFile(path.join(outputDir, first.filename));
    await expect(decodeQR(png)).resolves.toBe(first.code);
  });

  it("stores codes with path characters under safe names in the output directory", async () => {
    const file = await writeCodes("first\nhttps://example.com/item/42\n../escaped\nlast\n");
    const summary = await runGeneration(resolveRequest({ file, encodingType: "qr", outputDir }));

    expect(summary).toMatchObject({ total: 4, written: 4, failed: 0 });
    await expect(readManifest(outputDir)).resolves.toEqual([
      { code: "first", filename: "first.png" },
      { code: "https://example.com/item/42", filename: "https___example.com_item_42.png" },
      { code: "../escaped", filename: "___escaped.png" },
      { code: "last", filename: "last.png" },
    ]);
    await expect(access(path.join(dir, "escaped.png"))).rejects.toThrow();

    const png = await readFile(path.join(outputDir, "https___example.com_item_42.png"));
    await expect(decodeQR(png)).resolves.toBe("https://example.com/item/42");
  });

  it("embeds the logo in QR codes without changing the payload", async () => {
    const logo = path.join(dir, "logo.png");
    await writeFile(logo, await solidPng(32, 32, "#003399"));
    const file = await writeCodes("Zx81Qp04Lm7T\n");

    await runGeneration(
      resolveRequest({ file, encodingType: "qr", image: logo, logoScale: MAX_LOGO_SCALE, outputDir })
    );
    const png = await readFile(path.join(outputDir, "Zx81Qp04Lm7T.png"));
    await expect(decodeQR(png)).resolves.toBe("Zx81Qp04Lm7T");
  });

  it("does not repeat codes already in the manifest", async () => {
    const request = resolveRequest({ count: 9, length: 1, encodingType: "qr", outputDir });
    await runGeneration(request);
    const first = (await readManifest(outputDir)).map((entry) => entry.code);

    await runGeneration({ ...request, count: 1 });
    const all = (await readManifest(outputDir)).map((entry) => entry.code);
    expect(all).toHaveLength(10);
    expect([...all].sort()).toEqual(["0", "1", "2", "3", "4", "5", "6", "7", "8", "9"]);
    expect(all.slice(0, 9)).toEqual(first);

    await expect(runGeneration({ ...request, count: 1 })).rejects.toMatchObject({
      code: ErrorCode.GENERATION_EXHAUSTED,
    });
  });

  it("validates every code before writing anything", async () => {
    const file = await writeCodes("590123412345\n12345\n");
    await expect(runGeneration(resolveRequest({ file, outputDir }))).rejects.toMatchObject({
      code: ErrorCode.CODE_MISMATCH,
    });
    await expect(access(outputDir)).rejects.toThrow();
  });

  it("keeps going after a code fails to render and reports it at the end", async () => {
    // too long for any QR version
    const oversized = "x".repeat(3000);
    const file = await writeCodes(`first\n${oversized}\nlast\n`);

    await expect(runGeneration(resolveRequest({ file, encodingType: "qr", outputDir }))).rejects.toMatchObject({
      code: ErrorCode.RENDER_FAILED,
      message: `1 of 3 codes could not be rendered; the other 2 were saved to ${outputDir}`,
    });
    await expect(readManifest(outputDir)).resolves.toEqual([
      { code: "first", filename: "first.png" },
      { code: "last", filename: "last.png" },
    ]);
  });

  it("writes PDFs and a zip archive on request", async () => {
    const file = await writeCodes("9638507\n");
    const summary = await runGeneration(
      resolveRequest({ file, encodingType: "ean8", format: "pdf", zip: true, outputDir })
    );

    expect(summary.archivePath).toBe(path.join(outputDir, "codes.zip"));
    const zip = await JSZip.loadAsync(await readFile(path.join(outputDir, "codes.zip")));
    expect(Object.keys(zip.files).sort()).toEqual(["9638507.pdf", "manifest.csv"]);
  });

  it("archives only the current run's images and manifest rows", async () => {
    const request = resolveRequest({ count: 2, length: 6, encodingType: "qr", zip: true, outputDir });
    await runGeneration(request);
    const second = await runGeneration(request);

    await expect(readManifest(outputDir)).resolves.toHaveLength(4);
    const zip = await JSZip.loadAsync(await readFile(path.join(outputDir, "codes.zip")));
    const filenames = second.results.map((result) => `${result.code}.png`);
    expect(Object.keys(zip.files).sort()).toEqual([...filenames, "manifest.csv"].sort());
    await expect(zip.file("manifest.csv")?.async("string")).resolves.toBe(
      `code,filename\n${second.results.map((result) => `${result.code},${result.code}.png`).join("\n")}\n`
    );
  });

  it("fails on a missing logo before creating the output directory", async () => {
    const file = await writeCodes("abc\n");
    await expect(
      runGeneration(resolveRequest({ file, encodingType: "qr", image: path.join(dir, "none.png"), outputDir }))
    ).rejects.toMatchObject({ code: ErrorCode.LOGO_UNREADABLE });
    await expect(access(outputDir)).rejects.toThrow();
  });

  it("fails on a missing input file", async () => {
    await expect(
      runGeneration(resolveRequest({ file: path.join(dir, "none.txt"), outputDir }))
    ).rejects.toMatchObject({ code: ErrorCode.INPUT_UNREADABLE });
  });
});
