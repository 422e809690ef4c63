import { mkdtemp, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { createCanvas, loadImage, type ImageData } from "@napi-rs/canvas";
import {
  BarcodeFormat,
  BinaryBitmap,
  DecodeHintType,
  HybridBinarizer,
  MultiFormatReader,
  RGBLuminanceSource,
} from "@zxing/library";

/** RGBA pixels of a PNG flattened onto white. */
export async function readPixels(png: Buffer): Promise<ImageData> {
  const image = await loadImage(png);
  const canvas = createCanvas(image.width, image.height);
  const ctx = canvas.getContext("2d");
  ctx.fillStyle = "#ffffff";
  ctx.fillRect(0, 0, image.width, image.height);
  ctx.drawImage(image, 0, 0);
  return ctx.getImageData(0, 0, image.width, image.height);
}

const FORMATS = {
  qr: BarcodeFormat.QR_CODE,
  ean13: BarcodeFormat.EAN_13,
  ean8: BarcodeFormat.EAN_8,
} as const;

/** Text encoded in a rendered symbol; throws when nothing decodes. */
export async function decodeSymbol(png: Buffer, format: keyof typeof FORMATS): Promise<string> {
  const { data, width, height } = await readPixels(png);
  const luminances = new Uint8ClampedArray(width * height);
  for (let i = 0; i < luminances.length; i++) {
    const r = data[i * 4];
    const g = data[i * 4 + 1];
    const b = data[i * 4 + 2];
    luminances[i] = Math.round(0.299 * r + 0.587 * g + 0.114 * b);
  }
  const bitmap = new BinaryBitmap(new HybridBinarizer(new RGBLuminanceSource(luminances, width, height)));
  const hints = new Map<DecodeHintType, unknown>([
    [DecodeHintType.POSSIBLE_FORMATS, [FORMATS[format]]],
    [DecodeHintType.TRY_HARDER, true],
  ]);
  return new MultiFormatReader().decode(bitmap, hints).getText();
}

export const decodeQR = (png: Buffer): Promise<string> => decodeSymbol(png, "qr");

export const decodeEan = (png: Buffer, format: "ean13" | "ean8"): Promise<string> => decodeSymbol(png, format);

/** Solid-colour PNG used as a logo. */
export async function solidPng(width: number, height: number, color: string): Promise<Buffer> {
  const canvas = createCanvas(width, height);
  const ctx = canvas.getContext("2d");
  ctx.fillStyle = color;
  ctx.fillRect(0, 0, width, height);
  return canvas.encode("png");
}

export const makeTempDir = (): Promise<string> => mkdtemp(path.join(os.tmpdir(), "codegen-labels-"));

export const removeDir = (dir: string): Promise<void> => rm(dir, { recursive: true, force: true });
