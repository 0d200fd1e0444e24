/**
 * Transformer module types
 */

import type { AnimalRecord } from "../../types/data-model.js";

export interface TransformResult {
  records: AnimalRecord[];
  duplicates: string[]; // names dropped because an earlier record had them
}

export interface TransformFileResult extends TransformResult {
  outputPath: string;
}
