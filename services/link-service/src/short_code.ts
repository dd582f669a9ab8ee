import { customAlphabet } from "nanoid";
import { ExhaustedError } from "./errors.js";

export const CODE_ALPHABET = "0123456789abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ";
export const DEFAULT_CODE_LENGTH = 7;
export const DEFAULT_MAX_ATTEMPTS = 8;

export type CodeGenerator = () => string;

export interface CodeOptions {
  generate?: CodeGenerator;
  maxAttempts?: number;
}

export function createCodeGenerator(length: number = DEFAULT_CODE_LENGTH): CodeGenerator {
  const nanoid = customAlphabet(CODE_ALPHABET, length);
  return () => nanoid();
}

const CODE_PATTERN = /^[0-9a-zA-Z]{1,64}$/;

/** Anything else cannot have come from the generator, so it is never stored. */
export function isWellFormedCode(s: string): boolean {
  return CODE_PATTERN.test(s);
}

/**
 * Generate -> insert-if-absent -> retry. `tryInsert` resolves to null when the
 * candidate is already taken; any error it throws propagates unchanged.
 */
export async function allocateCode<T>(
  tryInsert: (code: string) => Promise<T | null>,
  options: Required<CodeOptions>
): Promise<T> {
  for (let i = 0; i < options.maxAttempts; i++) {
    const inserted = await tryInsert(options.generate());
    if (inserted !== null) return inserted;
  }
  throw new ExhaustedError(options.maxAttempts);
}

export function resolveCodeOptions(options: CodeOptions = {}): Required<CodeOptions> {
  return {
    generate: options.generate ?? createCodeGenerator(),
    maxAttempts: options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS
  };
}
