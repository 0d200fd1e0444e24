/**
 * Staging-area file helpers shared by every stage
 */

import { mkdir, readFile, writeFile } from "fs/promises";
import { dirname } from "path";
import { ErrorCode, FileIOError, PipelineError } from "./errors.js";

/**
 * Serialise a staging document. Two-space indent, trailing newline,
 * non-ASCII characters written as-is.
 */
export function serializeJSON(data: unknown): string {
  return `${JSON.stringify(data, null, 2)}\n`;
}

/**
 * Write a JSON document, creating the parent directory when needed
 */
export async function writeJSONFile(path: string, data: unknown): Promise<void> {
  try {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, serializeJSON(data), "utf8");
  } catch (err) {
    throw new FileIOError(`Failed to write ${path}`, { path }, { cause: err });
  }
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * Read a staging file as text
 */
export async function readTextFile(path: string, description: string): Promise<string> {
  try {
    return await readFile(path, "utf8");
  } catch (err) {
    if (isMissingFile(err)) {
      throw new FileIOError(`${description} not found at: ${path}`, { path }, { cause: err });
    }
    throw new FileIOError(`Failed to read ${description} from ${path}`, { path }, {
      cause: err,
    });
  }
}

/**
 * Load and parse a JSON staging file. The result is untyped: callers
 * narrow it before use.
 */
export async function loadJSONFile(path: string, description: string): Promise<unknown> {
  const content = await readTextFile(path, description);
  try {
    return JSON.parse(content);
  } catch (err) {
    throw new PipelineError(
      ErrorCode.INPUT_READ_ERROR,
      `${description} at ${path} is not valid JSON`,
      { path },
      { cause: err },
    );
  }
}

/**
 * Load a JSON staging file that must hold an array
 */
export async function loadJSONArray(path: string, description: string): Promise<unknown[]> {
  const data = await loadJSONFile(path, description);
  if (!Array.isArray(data)) {
    throw new PipelineError(
      ErrorCode.INPUT_READ_ERROR,
      `${description} at ${path} must contain a JSON array`,
      { path },
    );
  }
  return data;
}

/**
 * File-name stem for a species: whitespace runs become underscores and path
 * separators are neutralised.
 *
 * @example
 * speciesFileStem("Cervus elaphus"); // "Cervus_elaphus"
 */
export function speciesFileStem(species: string): string {
  return species.trim().replace(/\s+/g, "_").replace(/[/\\]/g, "_");
}
