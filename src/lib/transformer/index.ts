/**
 * Transformer module - renames and cleans raw GBIF payloads into canonical
 * animal records
 */

import { readdir } from "fs/promises";
import { join } from "path";
import type { AnimalRecord, RawRecord } from "../../types/data-model.js";
import { isRawRecord } from "../../types/data-model.js";
import type { TransformFileResult, TransformResult } from "./types.js";
import { mapField } from "./field-mappers.js";
import { FileIOError, TransformError } from "../../utils/errors.js";
import { readTextFile, writeJSONFile } from "../../utils/staging.js";
import { logger } from "../../utils/logger.js";

export * from "./types.js";
export * from "./field-mappers.js";

export const RAW_FILE_PATTERN = /^gbif_.+\.json$/;
export const TRANSFORMED_FILE_NAME = "animals_transformed.json";

/**
 * Transform one raw record. Always yields a record: when no name can be
 * found `nom` is the empty string and the Validator rejects it. Unknown raw
 * keys are dropped.
 */
export function transformRecord(raw: RawRecord): AnimalRecord {
  return {
    nom: mapField(raw, "nom") ?? "",
    nom_commun: mapField(raw, "nom_commun"),
    rang: mapField(raw, "rang"),
    statutUICN: mapField(raw, "statutUICN"),
    ordre: mapField(raw, "ordre"),
    famille: mapField(raw, "famille"),
    genre: mapField(raw, "genre"),
    descriptions: mapField(raw, "descriptions"),
    imageUrl: mapField(raw, "imageUrl"),
  };
}

/**
 * Transform many raw records, keeping the first record for each non-empty
 * name. Nameless records are all kept so each one gets its own rejection.
 */
export function transformRecords(raws: readonly RawRecord[]): TransformResult {
  const records: AnimalRecord[] = [];
  const duplicates: string[] = [];
  const seen = new Set<string>();

  for (const raw of raws) {
    const record = transformRecord(raw);
    if (record.nom !== "") {
      if (seen.has(record.nom)) {
        logger.debug("Duplicate record skipped", { nom: record.nom });
        duplicates.push(record.nom);
        continue;
      }
      seen.add(record.nom);
    }
    records.push(record);
  }

  logger.info("Records transformed", {
    input: raws.length,
    output: records.length,
    duplicates: duplicates.length,
  });

  return { records, duplicates };
}

/**
 * Expand a parsed raw document into its records: a single object, an array
 * of objects, or a class batch (`{ [className]: object[] }`).
 */
export function expandRawPayload(payload: unknown, source: string): RawRecord[] {
  if (Array.isArray(payload)) {
    return payload.map((entry, index) => {
      if (!isRawRecord(entry)) {
        throw new TransformError(source, `Entry ${index} of ${source} is not a JSON object`);
      }
      return entry;
    });
  }

  if (!isRawRecord(payload)) {
    throw new TransformError(source, `${source} does not contain a JSON object`);
  }

  const values = Object.values(payload);
  if (values.length > 0 && values.every((value) => Array.isArray(value))) {
    return values.flatMap((group) => expandRawPayload(group, source));
  }

  return [payload];
}

/**
 * Read one staged raw file
 *
 * @throws TransformError when the file is not valid JSON or holds no object
 */
export async function readRawPayload(path: string): Promise<RawRecord[]> {
  const content = await readTextFile(path, "Raw payload");
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (err) {
    throw new TransformError(path, `Malformed JSON in ${path}`, { cause: err });
  }
  return expandRawPayload(parsed, path);
}

/**
 * Read every `gbif_*.json` file of a staging directory, in file-name order
 */
export async function loadRawDirectory(dir: string): Promise<RawRecord[]> {
  let names: string[];
  try {
    names = await readdir(dir);
  } catch (err) {
    throw new FileIOError(`Failed to list raw directory ${dir}`, { dir }, { cause: err });
  }

  const files = names.filter((name) => RAW_FILE_PATTERN.test(name)).sort();
  logger.info("Loading raw payloads", { dir, files: files.length });

  const raws: RawRecord[] = [];
  for (const file of files) {
    raws.push(...(await readRawPayload(join(dir, file))));
  }
  return raws;
}

/**
 * Transform staged raw files and write the canonical records to `outputPath`
 */
export async function transformFiles(
  inputPaths: readonly string[],
  outputPath: string,
): Promise<TransformFileResult> {
  const raws: RawRecord[] = [];
  for (const inputPath of inputPaths) {
    raws.push(...(await readRawPayload(inputPath)));
  }

  const result = transformRecords(raws);
  await writeJSONFile(outputPath, result.records);
  logger.info("Transformed records written", {
    outputPath,
    count: result.records.length,
  });

  return { ...result, outputPath };
}

/**
 * Transform every raw file of a directory into one output file
 */
export async function transformDirectory(
  rawDir: string,
  outputPath: string,
): Promise<TransformFileResult> {
  const raws = await loadRawDirectory(rawDir);
  const result = transformRecords(raws);
  await writeJSONFile(outputPath, result.records);
  logger.info("Transformed records written", {
    outputPath,
    count: result.records.length,
  });
  return { ...result, outputPath };
}
