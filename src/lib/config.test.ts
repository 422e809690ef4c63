import path from "node:path";
import { describe, expect, it, vi } from "vitest";
import { resolveRequest } from "./config.js";
import { ErrorCode } from "./errors.js";
import { silentLogger } from "./logger.js";

const CWD = path.resolve("/work");

const errorOf = (fn: () => unknown): unknown => {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error("expected a failure");
};

describe("resolveRequest", () => {
  it("fills in defaults", () => {
    expect(resolveRequest({ count: "5" }, silentLogger, CWD)).toEqual({
      count: 5,
      file: undefined,
      length: 12,
      alphanumeric: false,
      encodingType: "ean13",
      logo: undefined,
      outputDir: path.join(CWD, "output"),
      format: "png",
      zip: false,
      qrSize: undefined,
      logoScale: 0.25,
    });
  });

  it("resolves paths against the working directory", () => {
    const request = resolveRequest(
      { file: "codes.txt", encodingType: "qr", image: "logo.png", outputDir: "out" },
      silentLogger,
      CWD
    );
    expect(request.file).toBe(path.join(CWD, "codes.txt"));
    expect(request.logo).toBe(path.join(CWD, "logo.png"));
    expect(request.outputDir).toBe(path.join(CWD, "out"));
  });

  it("defaults EAN8 to seven data digits", () => {
    expect(resolveRequest({ count: 3, encodingType: "ean8" }, silentLogger, CWD).length).toBe(7);
  });

  it("requires exactly one of file and count", () => {
    expect(errorOf(() => resolveRequest({}, silentLogger, CWD))).toMatchObject({
      code: ErrorCode.INVALID_OPTIONS,
      message: "One of --file or --count is required",
    });
    expect(errorOf(() => resolveRequest({ file: "a.txt", count: 2 }, silentLogger, CWD))).toMatchObject({
      code: ErrorCode.INVALID_OPTIONS,
      message: "Use either --file or --count, not both",
    });
  });

  it("rejects bad numbers and choices", () => {
    expect(errorOf(() => resolveRequest({ count: "0" }, silentLogger, CWD))).toMatchObject({
      message: "--count must be a positive integer, got '0'",
    });
    expect(errorOf(() => resolveRequest({ count: 1, length: "2.5" }, silentLogger, CWD))).toMatchObject({
      code: ErrorCode.INVALID_OPTIONS,
    });
    expect(errorOf(() => resolveRequest({ count: 1, encodingType: "upc" }, silentLogger, CWD))).toMatchObject({
      message: "--encoding-type must be one of ean13, ean8, qr, got 'upc'",
    });
    expect(errorOf(() => resolveRequest({ count: 1, logoScale: "1.5" }, silentLogger, CWD))).toMatchObject({
      code: ErrorCode.INVALID_OPTIONS,
    });
  });

  it("limits the logo scale to what QR error correction can absorb", () => {
    expect(resolveRequest({ count: 1, logoScale: "0.25" }, silentLogger, CWD).logoScale).toBe(0.25);
    expect(errorOf(() => resolveRequest({ count: 1, logoScale: "0.3" }, silentLogger, CWD))).toMatchObject({
      code: ErrorCode.INVALID_OPTIONS,
      message: "--logo-scale must be greater than 0 and at most 0.25, got '0.3'",
    });
  });

  it("rejects alphanumeric barcodes", () => {
    expect(errorOf(() => resolveRequest({ count: 1, alphanum: true }, silentLogger, CWD))).toMatchObject({
      code: ErrorCode.CODE_MISMATCH,
    });
  });

  it("rejects generated lengths the barcode cannot hold", () => {
    expect(errorOf(() => resolveRequest({ count: 1, length: 10 }, silentLogger, CWD))).toMatchObject({
      code: ErrorCode.CODE_MISMATCH,
      message: "EAN13 needs 12 data digits, got --length 10",
    });
  });

  it("allows any length for QR", () => {
    const request = resolveRequest({ count: 1, length: 4, alphanum: true, encodingType: "qr" }, silentLogger, CWD);
    expect(request).toMatchObject({ length: 4, alphanumeric: true, encodingType: "qr" });
  });

  it("drops a logo for barcodes with a warning", () => {
    const warn = vi.fn();
    const request = resolveRequest({ count: 1, image: "logo.png" }, { ...silentLogger, warn }, CWD);
    expect(request.logo).toBeUndefined();
    expect(warn).toHaveBeenCalledWith("Logo logo.png ignored: logos are only embedded in QR codes");
  });
});
