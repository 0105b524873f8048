import type { ParameterKey } from "./schema";

export interface ParameterDefinition {
  displayName: string;
  unit: string;
  group: string;
  notes?: string;
}

export const parameterGroupLabels: Record<string, string> = {
  physical: "Physical Characteristics",
  organic: "Organic Load",
  dissolved: "Dissolved Constituents",
  nutrients: "Nutrients",
  metals: "Heavy Metals",
};

/**
 * Parameter table. Key order is the canonical display order used for
 * history tables and compliance reports.
 */
export const PARAMETER_LIBRARY: Record<ParameterKey, ParameterDefinition> = {
  ph: { displayName: "pH", unit: "", group: "physical", notes: "0-14 scale, adjusted only by electrocoagulation" },
  tss: { displayName: "TSS", unit: "mg/L", group: "physical" },
  tds: { displayName: "TDS", unit: "mg/L", group: "dissolved" },
  cod: { displayName: "COD", unit: "mg/L", group: "organic" },
  bod: { displayName: "BOD", unit: "mg/L", group: "organic" },
  conductivity: { displayName: "Conductivity", unit: "µS/cm", group: "dissolved" },
  turbidity: { displayName: "Turbidity", unit: "NTU", group: "physical" },
  alkalinity: { displayName: "Alkalinity", unit: "mg/L as CaCO₃", group: "dissolved" },
  totalNitrates: { displayName: "Total Nitrates", unit: "mg/L NO₃⁻", group: "nutrients" },
  totalPhosphates: { displayName: "Total Phosphates", unit: "mg/L", group: "nutrients" },
  totalColor: { displayName: "Total Color", unit: "HU", group: "physical" },
  totalZinc: { displayName: "Total Zinc", unit: "mg/L", group: "metals" },
};
