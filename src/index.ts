export * from "./lib/types.js";
export { ErrorCode, CodegenError, isCodegenError, describeError, exitCodeFor } from "./lib/errors.js";
export type { ErrorCodeType } from "./lib/errors.js";
export { createLogger, levelFromFlags, silentLogger } from "./lib/logger.js";
export type { Logger, LogLevel, VerbosityFlags } from "./lib/logger.js";
export { resolveRequest } from "./lib/config.js";
export type { RawOptions } from "./lib/config.js";
export {
  ALPHANUMERIC,
  NUMERIC,
  codeSpaceSize,
  generateCodes,
  parseCodeList,
  readCodesFromFile,
} from "./lib/codes.js";
export {
  SYMBOLOGIES,
  eanCheckDigit,
  generateBarcodePng,
  generateQRPng,
  normalizeBarcodeCode,
  renderCode,
  validateCodes,
} from "./lib/encoders.js";
export { embedLogo, loadLogo, logoFrame, maybeEmbedLogo } from "./lib/logo.js";
export {
  appendManifest,
  createArchive,
  createFileNamer,
  encodeImage,
  ensureOutputDir,
  fileStem,
  imageFileName,
  parseManifest,
  readManifest,
  saveImage,
  toPdf,
  writeImage,
} from "./lib/output.js";
export { prepareCodes, processCodes, runGeneration } from "./lib/workflow.js";
export { buildProgram, main } from "./lib/program.js";
