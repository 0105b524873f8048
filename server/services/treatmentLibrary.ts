import rawConstants from "@shared/treatment-constants.json";
import { treatmentConstantsSchema, type TreatmentConstants } from "@shared/schema";
import type { ZodIssue } from "zod";

export class TreatmentConstantsError extends Error {
  readonly issues: ZodIssue[];

  constructor(issues: ZodIssue[]) {
    const summary = issues
      .map(issue => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    super(`Invalid treatment constants: ${summary}`);
    this.name = "TreatmentConstantsError";
    this.issues = issues;
  }
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object") {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * Validates a constants document (raw influent, effluent limits and the two
 * plan profile sets). Removal fractions outside [0, 1], unknown parameters and
 * incomplete raw vectors are rejected.
 */
export function parseTreatmentConstants(input: unknown): TreatmentConstants {
  const parsed = treatmentConstantsSchema.safeParse(input);
  if (!parsed.success) {
    throw new TreatmentConstantsError(parsed.error.issues);
  }
  return deepFreeze(parsed.data);
}

export const TREATMENT_CONSTANTS: TreatmentConstants = parseTreatmentConstants(rawConstants);
