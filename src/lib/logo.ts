import { createCanvas, loadImage, type Canvas, type Image } from "@napi-rs/canvas";
import { CodegenError, ErrorCode } from "./errors.js";
import type { EncodingType } from "./types.js";

export type Frame = {
  x: number;
  y: number;
  w: number;
  h: number;
};

export async function loadLogo(logoPath: string): Promise<Image> {
  try {
    const image = await loadImage(logoPath);
    if (!image.width || !image.height) {
      throw new Error("image has no dimensions");
    }
    return image;
  } catch (error) {
    throw new CodegenError(ErrorCode.LOGO_UNREADABLE, `Cannot load logo image ${logoPath}`, { cause: error });
  }
}

function createSurface(width: number, height: number): Canvas {
  return createCanvas(Math.max(1, Math.round(width)), Math.max(1, Math.round(height)));
}

/** Centred square whose side is `scale` of the shorter image side. */
export function logoFrame(width: number, height: number, scale: number): Frame {
  const side = Math.floor(Math.min(width, height) * scale);
  return {
    x: Math.floor((width - side) / 2),
    y: Math.floor((height - side) / 2),
    w: side,
    h: side,
  };
}

/** Draws `source` into `frame`, keeping its aspect ratio. */
function drawContained(canvas: Canvas, source: Image, frame: Frame): void {
  const ctx = canvas.getContext("2d");
  const scale = Math.min(frame.w / source.width, frame.h / source.height);
  const drawWidth = source.width * scale;
  const drawHeight = source.height * scale;
  const dx = frame.x + (frame.w - drawWidth) / 2;
  const dy = frame.y + (frame.h - drawHeight) / 2;
  ctx.save();
  ctx.imageSmoothingEnabled = true;
  ctx.imageSmoothingQuality = "high";
  ctx.drawImage(source, dx, dy, drawWidth, drawHeight);
  ctx.restore();
}

/** Composites `logo` over the centre of a QR PNG and returns the new PNG. */
export async function embedLogo(qrPng: Buffer, logo: Image, scale: number): Promise<Buffer> {
  const qr = await loadImage(qrPng);
  const canvas = createSurface(qr.width, qr.height);
  const ctx = canvas.getContext("2d");
  ctx.drawImage(qr, 0, 0, canvas.width, canvas.height);
  drawContained(canvas, logo, logoFrame(canvas.width, canvas.height, scale));
  return canvas.encode("png");
}

export async function maybeEmbedLogo(
  png: Buffer,
  type: EncodingType,
  logo: Image | undefined,
  scale: number
): Promise<Buffer> {
  if (type !== "qr" || !logo) {
    return png;
  }
  return embedLogo(png, logo, scale);
}
