import type { Image } from "@napi-rs/canvas";
import { generateCodes, readCodesFromFile } from "./codes.js";
import { CodegenError, ErrorCode } from "./errors.js";
import { renderCode, validateCodes } from "./encoders.js";
import { loadLogo, maybeEmbedLogo } from "./logo.js";
import { silentLogger, type Logger } from "./logger.js";
import {
  appendManifest,
  createArchive,
  createFileNamer,
  encodeImage,
  ensureOutputDir,
  manifestPath,
  readManifest,
  saveImage,
} from "./output.js";
import type { GenerationRequest, ManifestEntry, ProcessResult, RunSummary } from "./types.js";

/**
 * Codes for the run: read from the input file, or drawn at random while
 * skipping codes the output directory's manifest already lists.
 */
export async function prepareCodes(request: GenerationRequest, logger: Logger = silentLogger): Promise<string[]> {
  let codes: string[];
  if (request.file) {
    logger.info(`Reading codes from file: ${request.file}`);
    codes = await readCodesFromFile(request.file);
  } else if (request.count !== undefined) {
    const existing = await readManifest(request.outputDir);
    if (existing.length > 0) {
      logger.debug(`Skipping ${existing.length} codes already listed in ${manifestPath(request.outputDir)}`);
    }
    logger.info(`Generating ${request.alphanumeric ? "alphanumeric" : "numeric"} codes`);
    codes = generateCodes({
      count: request.count,
      length: request.length,
      alphanumeric: request.alphanumeric,
      exclude: new Set(existing.map((entry) => entry.code)),
    });
  } else {
    throw new CodegenError(ErrorCode.INVALID_OPTIONS, "One of --file or --count is required");
  }

  if (codes.length === 0) {
    logger.warn("No codes to encode");
  }
  validateCodes(codes, request.encodingType);
  logger.info(`${codes.length} codes ready for encoding`);
  return codes;
}

/**
 * Renders and writes each code in order. A code that fails to render is
 * recorded and skipped; a write failure ends the run.
 */
export async function processCodes(
  codes: readonly string[],
  request: GenerationRequest,
  logger: Logger = silentLogger
): Promise<ProcessResult[]> {
  let logo: Image | undefined;
  if (request.logo && request.encodingType === "qr") {
    logo = await loadLogo(request.logo);
    logger.info(`Loaded logo image: ${request.logo}`);
  }

  if (await ensureOutputDir(request.outputDir)) {
    logger.info(`Created output directory: ${request.outputDir}`);
  }
  const fileNameFor = createFileNamer(request.format, await readManifest(request.outputDir));

  logger.info(`Generating ${request.encodingType} codes in ${request.outputDir}`);
  const results: ProcessResult[] = [];
  for (const code of codes) {
    let data: Buffer;
    try {
      const rendered = await renderCode(code, request.encodingType, { qrSize: request.qrSize });
      const png = await maybeEmbedLogo(rendered, request.encodingType, logo, request.logoScale);
      data = await encodeImage(png, request.format);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error(`Failed to generate ${request.encodingType} code for ${code}: ${message}`);
      logger.debug("Render failure detail", error);
      results.push({ code, outcome: "error", message });
      continue;
    }

    const filename = fileNameFor(code);
    await saveImage(request.outputDir, filename, data);
    await appendManifest(request.outputDir, [{ code, filename }]);
    logger.debug(`${code} -> ${filename}`);
    results.push({ code, outcome: "ok", filename });
  }
  return results;
}

export async function runGeneration(request: GenerationRequest, logger: Logger = silentLogger): Promise<RunSummary> {
  const codes = await prepareCodes(request, logger);
  const results = await processCodes(codes, request, logger);

  const written: ManifestEntry[] = results.flatMap((result) =>
    result.filename ? [{ code: result.code, filename: result.filename }] : []
  );
  const summary: RunSummary = {
    total: codes.length,
    written: written.length,
    failed: results.length - written.length,
    outputDir: request.outputDir,
    manifestPath: manifestPath(request.outputDir),
    results,
  };
  logger.info(`Manifest file at ${summary.manifestPath}`);

  if (request.zip && written.length > 0) {
    summary.archivePath = await createArchive(request.outputDir, written);
    logger.info(`Archive written to ${summary.archivePath}`);
  }

  if (summary.failed > 0) {
    throw new CodegenError(
      ErrorCode.RENDER_FAILED,
      `${summary.failed} of ${summary.total} codes could not be rendered; the other ${summary.written} were saved to ${summary.outputDir}`
    );
  }
  return summary;
}
