import { readFile } from "node:fs/promises";
import { randomInt } from "node:crypto";
import { MAX_ATTEMPTS_PER_CODE } from "./config.js";
import { CodegenError, ErrorCode } from "./errors.js";

export const NUMERIC = "0123456789";
export const ALPHANUMERIC = "ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789";

/** Returns an integer in [0, max). */
export type RandomIndex = (max: number) => number;

export type GenerateOptions = {
  count: number;
  length: number;
  alphanumeric?: boolean;
  /** Codes that must not be produced again (e.g. from an earlier manifest). */
  exclude?: ReadonlySet<string>;
  random?: RandomIndex;
  maxAttemptsPerCode?: number;
};

const cryptoIndex: RandomIndex = (max) => randomInt(max);

export const alphabetFor = (alphanumeric: boolean): string => (alphanumeric ? ALPHANUMERIC : NUMERIC);

export const codeSpaceSize = (length: number, alphanumeric: boolean): bigint =>
  BigInt(alphabetFor(alphanumeric).length) ** BigInt(length);

function drawCode(alphabet: string, length: number, random: RandomIndex): string {
  let code = "";
  for (let i = 0; i < length; i++) {
    code += alphabet.charAt(random(alphabet.length));
  }
  return code;
}

function countExcludedInSpace(exclude: ReadonlySet<string>, alphabet: string, length: number): number {
  let inSpace = 0;
  for (const code of exclude) {
    if (code.length === length && [...code].every((ch) => alphabet.includes(ch))) {
      inSpace++;
    }
  }
  return inSpace;
}

/**
 * Draw `count` distinct random codes of `length` symbols.
 *
 * Fails with E_GENERATION_EXHAUSTED when the space cannot hold `count` new codes,
 * or when the draw budget (`count * maxAttemptsPerCode`) runs out.
 */
export function generateCodes(options: GenerateOptions): string[] {
  const {
    count,
    length,
    alphanumeric = false,
    exclude = new Set<string>(),
    random = cryptoIndex,
    maxAttemptsPerCode = MAX_ATTEMPTS_PER_CODE,
  } = options;

  const alphabet = alphabetFor(alphanumeric);
  const available = codeSpaceSize(length, alphanumeric) - BigInt(countExcludedInSpace(exclude, alphabet, length));
  if (available < BigInt(count)) {
    throw new CodegenError(
      ErrorCode.GENERATION_EXHAUSTED,
      `Cannot generate ${count} unique codes of length ${length}: only ${available} ${alphanumeric ? "alphanumeric" : "numeric"} codes are available`
    );
  }

  const codes: string[] = [];
  const seen = new Set<string>();
  const maxAttempts = count * maxAttemptsPerCode;
  let attempts = 0;

  while (codes.length < count && attempts < maxAttempts) {
    attempts++;
    const code = drawCode(alphabet, length, random);
    if (seen.has(code) || exclude.has(code)) continue;
    seen.add(code);
    codes.push(code);
  }

  if (codes.length < count) {
    throw new CodegenError(
      ErrorCode.GENERATION_EXHAUSTED,
      `Could not generate ${count} unique codes in ${maxAttempts} attempts. Generated: ${codes.length}`
    );
  }

  return codes;
}

/** One code per line; lines are trimmed and blank ones dropped. */
export function parseCodeList(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

export async function readCodesFromFile(filePath: string): Promise<string[]> {
  let text: string;
  try {
    text = await readFile(filePath, "utf8");
  } catch (error) {
    throw new CodegenError(ErrorCode.INPUT_UNREADABLE, `Cannot read codes from ${filePath}`, { cause: error });
  }
  return parseCodeList(text);
}
