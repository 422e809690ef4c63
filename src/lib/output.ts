import { appendFile, mkdir, readFile, stat, writeFile } from "node:fs/promises";
import path from "node:path";
import Papa from "papaparse";
import JSZip from "jszip";
import { jsPDF } from "jspdf";
import { loadImage } from "@napi-rs/canvas";
import { ARCHIVE_FILE, MANIFEST_FILE } from "./config.js";
import { CodegenError, ErrorCode } from "./errors.js";
import type { ManifestEntry, OutputFormat } from "./types.js";

const MANIFEST_FIELDS = ["code", "filename"] as const;

type ManifestRow = Record<(typeof MANIFEST_FIELDS)[number], string>;

const writeFailed = (target: string, error: unknown): CodegenError =>
  new CodegenError(ErrorCode.WRITE_FAILED, `Cannot write ${target}`, { cause: error });

async function exists(filePath: string): Promise<boolean> {
  try {
    await stat(filePath);
    return true;
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return false;
    }
    throw error;
  }
}

export const manifestPath = (outputDir: string): string => path.join(outputDir, MANIFEST_FILE);

export const archivePath = (outputDir: string): string => path.join(outputDir, ARCHIVE_FILE);

/** Returns true when the directory had to be created. */
export async function ensureOutputDir(outputDir: string): Promise<boolean> {
  try {
    const created = await mkdir(outputDir, { recursive: true });
    return created !== undefined;
  } catch (error) {
    throw writeFailed(`output directory ${outputDir}`, error);
  }
}

const UNSAFE_NAME_CHARS = /[^A-Za-z0-9._-]/g;
const MAX_STEM_LENGTH = 200;

/**
 * File name stem for `code`. Characters outside `A-Z a-z 0-9 . _ -` and
 * leading dots become "_", so the name never leaves the output directory.
 */
export function fileStem(code: string): string {
  const stem = code
    .replace(UNSAFE_NAME_CHARS, "_")
    .replace(/^\.+/, (dots) => "_".repeat(dots.length))
    .slice(0, MAX_STEM_LENGTH);
  return stem || "_";
}

export function imageFileName(code: string, format: OutputFormat): string {
  return `${fileStem(code)}.${format}`;
}

/**
 * Hands out one file name per code. Distinct codes that share a stem, or
 * differ only in case, get a numeric suffix (`-2`, `-3`, ...). Names listed
 * in `existing` stay reserved; a code already listed keeps its file name.
 */
export function createFileNamer(
  format: OutputFormat,
  existing: readonly ManifestEntry[] = []
): (code: string) => string {
  const byCode = new Map<string, string>();
  const taken = new Set<string>();
  for (const entry of existing) {
    taken.add(entry.filename.toLowerCase());
    if (entry.filename.endsWith(`.${format}`)) {
      byCode.set(entry.code, entry.filename);
    }
  }

  return (code) => {
    const known = byCode.get(code);
    if (known) return known;
    const stem = fileStem(code);
    let name = `${stem}.${format}`;
    for (let n = 2; taken.has(name.toLowerCase()); n++) {
      name = `${stem}-${n}.${format}`;
    }
    byCode.set(code, name);
    taken.add(name.toLowerCase());
    return name;
  };
}

/** Single-page PDF the size of the image, in points. */
export async function toPdf(png: Buffer): Promise<Buffer> {
  const image = await loadImage(png);
  const { width, height } = image;
  const pdf = new jsPDF({
    orientation: width >= height ? "landscape" : "portrait",
    unit: "pt",
    format: [width, height],
  });
  pdf.addImage(png, "PNG", 0, 0, width, height);
  return Buffer.from(pdf.output("arraybuffer"));
}

/** File contents for `format`: the PNG as is, or wrapped in a PDF. */
export async function encodeImage(png: Buffer, format: OutputFormat): Promise<Buffer> {
  if (format === "png") {
    return png;
  }
  try {
    return await toPdf(png);
  } catch (error) {
    throw new CodegenError(ErrorCode.RENDER_FAILED, "Cannot convert the image to PDF", { cause: error });
  }
}

export async function saveImage(outputDir: string, filename: string, data: Buffer): Promise<void> {
  try {
    await writeFile(path.join(outputDir, filename), data);
  } catch (error) {
    throw writeFailed(filename, error);
  }
}

export async function writeImage(
  outputDir: string,
  code: string,
  png: Buffer,
  format: OutputFormat,
  filename: string = imageFileName(code, format)
): Promise<string> {
  await saveImage(outputDir, filename, await encodeImage(png, format));
  return filename;
}

export function serializeManifest(entries: readonly ManifestEntry[], withHeader: boolean): string {
  if (entries.length === 0) {
    return withHeader ? `${MANIFEST_FIELDS.join(",")}\n` : "";
  }
  const csv = Papa.unparse(
    {
      fields: [...MANIFEST_FIELDS],
      data: entries.map((entry) => [entry.code, entry.filename]),
    },
    { header: withHeader, newline: "\n" }
  );
  return `${csv}\n`;
}

/**
 * Appends rows to manifest.csv, writing the header first when the file is new.
 */
export async function appendManifest(outputDir: string, entries: readonly ManifestEntry[]): Promise<string> {
  const target = manifestPath(outputDir);
  try {
    const isNew = !(await exists(target));
    const chunk = serializeManifest(entries, isNew);
    if (chunk) {
      await appendFile(target, chunk, "utf8");
    }
  } catch (error) {
    throw writeFailed(MANIFEST_FILE, error);
  }
  return target;
}

export function parseManifest(text: string): ManifestEntry[] {
  const result = Papa.parse<Partial<ManifestRow>>(text, {
    header: true,
    skipEmptyLines: true,
    transformHeader: (header) => header.trim(),
  });
  const entries: ManifestEntry[] = [];
  for (const row of result.data) {
    const code = row.code?.trim();
    if (!code) continue;
    entries.push({ code, filename: row.filename?.trim() ?? "" });
  }
  return entries;
}

/** Entries of an existing manifest; empty when there is none yet. */
export async function readManifest(outputDir: string): Promise<ManifestEntry[]> {
  const target = manifestPath(outputDir);
  if (!(await exists(target))) {
    return [];
  }
  try {
    return parseManifest(await readFile(target, "utf8"));
  } catch (error) {
    throw new CodegenError(ErrorCode.INPUT_UNREADABLE, `Cannot read ${target}`, { cause: error });
  }
}

/**
 * Zips the entries' images into codes.zip, with a manifest listing just
 * those entries.
 */
export async function createArchive(outputDir: string, entries: readonly ManifestEntry[]): Promise<string> {
  const target = archivePath(outputDir);
  try {
    const zip = new JSZip();
    for (const entry of entries) {
      zip.file(entry.filename, await readFile(path.join(outputDir, entry.filename)));
    }
    zip.file(MANIFEST_FILE, serializeManifest(entries, true));
    const content = await zip.generateAsync({ type: "nodebuffer", compression: "DEFLATE" });
    await writeFile(target, content);
  } catch (error) {
    throw writeFailed(ARCHIVE_FILE, error);
  }
  return target;
}
