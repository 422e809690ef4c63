import { Command, CommanderError, Option, type OutputConfiguration } from "commander";
import {
  DEFAULT_ENCODING_TYPE,
  DEFAULT_FORMAT,
  DEFAULT_LENGTH,
  DEFAULT_LOGO_SCALE,
  DEFAULT_OUTPUT_DIR,
  MAX_LOGO_SCALE,
  resolveRequest,
  type RawOptions,
} from "./config.js";
import { describeError, exitCodeFor } from "./errors.js";
import { createLogger, levelFromFlags, type VerbosityFlags } from "./logger.js";
import { ENCODING_TYPES, OUTPUT_FORMATS } from "./types.js";
import { runGeneration } from "./workflow.js";

export type CliOptions = RawOptions & VerbosityFlags;

export function buildProgram(output?: OutputConfiguration): Command {
  const program = new Command()
    .name("codegen-labels")
    .description("Generate unique codes and render them as EAN13/EAN8 barcodes or QR codes.")
    .version("0.1.0")
    .option("-f, --file <path>", "file containing codes to process, one per line")
    .option("-c, --count <n>", "number of codes to generate")
    .option("-l, --length <n>", `length of each generated code (default: ${DEFAULT_LENGTH}, 7 for ean8)`)
    .option("-a, --alphanum", "generate alphanumeric codes instead of numeric")
    .addOption(
      new Option("-t, --encoding-type <type>", `type of encoding (default: ${DEFAULT_ENCODING_TYPE})`).choices(
        ENCODING_TYPES
      )
    )
    .option("-i, --image <path>", "image to embed in the centre of generated QR codes")
    .option("-o, --output-dir <dir>", `directory to save the generated codes (default: ./${DEFAULT_OUTPUT_DIR})`)
    .addOption(new Option("--format <format>", `image file format (default: ${DEFAULT_FORMAT})`).choices(OUTPUT_FORMATS))
    .option("--zip", "also pack the images and manifest into codes.zip")
    .option("--qr-size <px>", "fixed QR code width in pixels")
    .option(
      "--logo-scale <fraction>",
      `logo size relative to the QR code, at most ${MAX_LOGO_SCALE} (default: ${DEFAULT_LOGO_SCALE})`
    )
    .option("-v, --verbose", "enable verbose output")
    .option("-q, --quiet", "suppress all output except errors")
    .option("-d, --debug", "enable debug output")
    .exitOverride();

  if (output) {
    program.configureOutput(output);
  }
  return program;
}

/**
 * Runs the CLI on user arguments (without the node and script entries)
 * and resolves to the process exit code.
 */
export async function main(args: readonly string[], output?: OutputConfiguration): Promise<number> {
  const program = buildProgram(output);
  try {
    program.parse([...args], { from: "user" });
  } catch (error) {
    if (error instanceof CommanderError) {
      // --help and --version exit cleanly
      return error.exitCode === 0 ? 0 : 2;
    }
    throw error;
  }

  const options = program.opts<CliOptions>();
  const logger = createLogger(levelFromFlags(options));
  logger.debug("Options", options);

  try {
    const request = resolveRequest(options, logger);
    const summary = await runGeneration(request, logger);
    logger.result(`Generated ${summary.written} codes and saved them to ${summary.outputDir}.`);
    return 0;
  } catch (error) {
    logger.error(describeError(error, options.debug === true));
    return exitCodeFor(error);
  }
}
