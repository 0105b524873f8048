import {
  PARAMETER_KEYS,
  type ComplianceReport,
  type ConcentrationVector,
  type EffluentLimit,
  type EffluentLimits,
  type ParameterKey,
} from "@shared/schema";

export function meetsLimit(value: number, limit: EffluentLimit): boolean {
  if (limit.kind === "range") {
    return limit.min <= value && value <= limit.max;
  }
  return value <= limit.max;
}

/**
 * Checks final effluent values against the discharge limits.
 * pH has no enforced limit and is always reported as passing; parameters
 * without a limit are left out of the report.
 */
export function evaluateCompliance(finalEffluent: ConcentrationVector, limits: EffluentLimits): ComplianceReport {
  const report: ComplianceReport = {};

  for (const param of PARAMETER_KEYS) {
    const value = finalEffluent[param];

    if (param === "ph") {
      report[param] = { value, passes: true, limit: null };
      continue;
    }

    const limit = limits[param];
    if (!limit) continue;

    report[param] = { value, passes: meetsLimit(value, limit), limit };
  }

  return report;
}

export function failedParameters(report: ComplianceReport): ParameterKey[] {
  return PARAMETER_KEYS.filter(param => report[param]?.passes === false);
}

export function describeLimit(limit: EffluentLimit | null | undefined): string {
  if (!limit) return "N/A";
  if (limit.kind === "range") return `${limit.min}-${limit.max}`;
  return `≤${limit.max}`;
}
