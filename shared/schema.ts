/**
 * Shared data model for the effluent treatment simulator.
 * These schemas and types are used by the treatment engine, the constants loader
 * and the HTTP routes. The zod schemas double as the validation layer for the
 * bundled treatment constants and for incoming request bodies.
 */

import { z } from "zod";

/**
 * Tracked water-quality parameters in canonical display order.
 * Every concentration vector carries exactly these keys.
 */
export const PARAMETER_KEYS = [
  "ph",
  "tss",
  "tds",
  "cod",
  "bod",
  "conductivity",
  "turbidity",
  "alkalinity",
  "totalNitrates",
  "totalPhosphates",
  "totalColor",
  "totalZinc",
] as const;

export const parameterKeySchema = z.enum(PARAMETER_KEYS);
export type ParameterKey = z.infer<typeof parameterKeySchema>;

/**
 * Plan selector. Plan 1 is the four-unit train, Plan 2 the six-unit
 * chemically assisted train.
 */
export const planSchema = z.union([z.literal(1), z.literal(2)]);
export type Plan = z.infer<typeof planSchema>;
export const PLANS: readonly Plan[] = [1, 2];

/**
 * Treatment unit identities. The pipeline builder dispatches on these.
 */
export const STAGE_IDS = [
  "fine_screen",
  "plain_sedimentation",
  "coagulation_tank",
  "flocculation_chamber",
  "sedimentation",
  "electrocoagulation",
  "rapid_sand_filter",
] as const;

export const stageIdSchema = z.enum(STAGE_IDS);
export type StageId = z.infer<typeof stageIdSchema>;

const concentrationValueSchema = z.number().finite().nonnegative();

/**
 * Concentration vector: one value per tracked parameter.
 * pH is on the 0-14 scale, everything else is a non-negative concentration.
 */
export const concentrationVectorSchema = z.object({
  ph: z.number().min(0).max(14),
  tss: concentrationValueSchema,
  tds: concentrationValueSchema,
  cod: concentrationValueSchema,
  bod: concentrationValueSchema,
  conductivity: concentrationValueSchema,
  turbidity: concentrationValueSchema,
  alkalinity: concentrationValueSchema,
  totalNitrates: concentrationValueSchema,
  totalPhosphates: concentrationValueSchema,
  totalColor: concentrationValueSchema,
  totalZinc: concentrationValueSchema,
}).strict();

export type ConcentrationVector = z.infer<typeof concentrationVectorSchema>;

/**
 * Removal profile: fraction removed per parameter for one treatment unit.
 * Parameters left out are passed through unchanged.
 */
export const removalProfileSchema = z.record(parameterKeySchema, z.number().min(0).max(1));
export type RemovalProfile = z.infer<typeof removalProfileSchema>;

/**
 * Effluent limit: either a ceiling or an inclusive range (alkalinity).
 */
export const effluentLimitSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("ceiling"), max: z.number().nonnegative() }),
  z.object({ kind: z.literal("range"), min: z.number().nonnegative(), max: z.number().nonnegative() }),
]).refine(l => l.kind !== "range" || l.min <= l.max, { message: "Range limit min must not exceed max" });

export type EffluentLimit = z.infer<typeof effluentLimitSchema>;
export type EffluentLimits = Partial<Record<ParameterKey, EffluentLimit>>;

/**
 * Profile sets are keyed by exactly the units of each plan's train, so a
 * missing or unexpected unit rejects the constants document.
 */
const plan1ProfileSetSchema = z.object({
  fine_screen: removalProfileSchema,
  plain_sedimentation: removalProfileSchema,
  electrocoagulation: removalProfileSchema,
  rapid_sand_filter: removalProfileSchema,
}).strict();

const plan2ProfileSetSchema = z.object({
  fine_screen: removalProfileSchema,
  coagulation_tank: removalProfileSchema,
  flocculation_chamber: removalProfileSchema,
  sedimentation: removalProfileSchema,
  electrocoagulation: removalProfileSchema,
  rapid_sand_filter: removalProfileSchema,
}).strict();

/**
 * Shape of shared/treatment-constants.json. Raw influent and removal profiles
 * are kept per plan so that no stage has to branch on the plan itself.
 */
export const treatmentConstantsSchema = z.object({
  plant: z.object({
    name: z.string().min(1),
    flowRate: z.number().positive(), // m³/day
  }),
  rawWastewater: z.object({
    "1": concentrationVectorSchema,
    "2": concentrationVectorSchema,
  }),
  effluentLimits: z.record(parameterKeySchema, effluentLimitSchema),
  removalProfiles: z.object({
    "1": plan1ProfileSetSchema,
    "2": plan2ProfileSetSchema,
  }),
});

export type TreatmentConstants = z.infer<typeof treatmentConstantsSchema>;

/**
 * StageHistoryEntry: the concentration vector leaving one unit.
 * The first entry of every history is the raw wastewater.
 */
export type StageHistoryEntry = {
  readonly stage: string;
  readonly values: Readonly<ConcentrationVector>;
};

/**
 * ComplianceRecord: final effluent value for a parameter and whether it meets
 * its limit. pH has no enforced limit and always passes.
 */
export type ComplianceRecord = {
  value: number;
  passes: boolean;
  limit: EffluentLimit | null;
};

export type ComplianceReport = Partial<Record<ParameterKey, ComplianceRecord>>;

/**
 * SimulationSummary: everything an external renderer needs for one plan.
 */
export type SimulationSummary = {
  plan: Plan;
  plant: {
    name: string;
    flowRate: number; // m³/day
    hourlyFlow: number; // m³/hour
  };
  stages: string[];
  history: readonly StageHistoryEntry[];
  compliance: ComplianceReport;
  passed: boolean;
  failedParameters: ParameterKey[];
};

// Plan as it arrives over HTTP: a JSON number, or the digit 1 or 2 as a string
export const planSelectorSchema = z
  .union([z.number(), z.string().regex(/^[12]$/, "Plan must be 1 or 2")])
  .transform(Number);

// Request body for POST /api/simulations
export const simulationRequestSchema = z.object({
  plan: planSelectorSchema,
});
