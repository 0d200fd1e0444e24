/**
 * Validator module - partitions canonical records into validated and
 * rejected collections
 */

export * from "./types.js";
export {
  AnimalRecordValidator,
  ANIMAL_RECORD_SCHEMA,
  createAjv,
} from "./schema-validator.js";

import { join } from "path";
import { AnimalRecordValidator } from "./schema-validator.js";
import type { ValidateFileResult, ValidationResult } from "./types.js";
import type { ValidatedRecord, ValidationRejection } from "../../types/data-model.js";
import { isRawRecord } from "../../types/data-model.js";
import { loadJSONArray, writeJSONFile } from "../../utils/staging.js";
import { logger } from "../../utils/logger.js";

export const VALIDATED_FILE_NAME = "animals_validated.json";
export const REJECTED_FILE_NAME = "animals_validation_errors.json";

/**
 * Validate a collection of records. Pure: no I/O, input records are never
 * modified, and the result depends only on the input.
 */
export function validateRecords(
  records: readonly unknown[],
  validator: AnimalRecordValidator = new AnimalRecordValidator(),
): ValidationResult {
  const validated: ValidatedRecord[] = [];
  const rejected: ValidationRejection[] = [];

  records.forEach((record, index) => {
    const check = validator.check(record);
    if (check.valid) {
      validated.push(check.record);
    } else {
      rejected.push({ index, record, reason: check.reason, detail: check.detail });
    }
  });

  return { validated, rejected };
}

function recordName(record: unknown): string {
  if (isRawRecord(record) && typeof record.nom === "string" && record.nom !== "") {
    return record.nom;
  }
  return "(no name)";
}

/**
 * Validate a transformed staging file and write both outputs to
 * `outputDir`. The rejected file is written even when it is empty.
 */
export async function validateFile(
  inputPath: string,
  outputDir: string,
): Promise<ValidateFileResult> {
  const records = await loadJSONArray(inputPath, "Transformed records");
  logger.info("Validating records", { inputPath, count: records.length });

  const result = validateRecords(records);

  for (const rejection of result.rejected) {
    logger.warn(`Record ${rejection.index} rejected (${recordName(rejection.record)})`, {
      reason: rejection.reason,
      detail: rejection.detail,
    });
  }

  const validatedPath = join(outputDir, VALIDATED_FILE_NAME);
  const rejectedPath = join(outputDir, REJECTED_FILE_NAME);
  await writeJSONFile(validatedPath, result.validated);
  await writeJSONFile(rejectedPath, result.rejected);

  logger.info("Validation complete", {
    validated: result.validated.length,
    rejected: result.rejected.length,
    validatedPath,
    rejectedPath,
  });

  return { ...result, validatedPath, rejectedPath };
}
