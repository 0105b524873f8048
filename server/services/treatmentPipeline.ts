import {
  planSchema,
  type ConcentrationVector,
  type Plan,
  type RemovalProfile,
  type StageHistoryEntry,
  type StageId,
  type TreatmentConstants,
} from "@shared/schema";
import { applyElectrocoagulationPH, applyRemoval } from "./stageTransform";
import { TREATMENT_CONSTANTS } from "./treatmentLibrary";

export const RAW_WASTEWATER_STAGE = "Raw Wastewater";

export class InvalidPlanError extends Error {
  readonly plan: unknown;

  constructor(plan: unknown) {
    super(`Invalid treatment plan: ${String(plan)}. Must be 1 or 2.`);
    this.name = "InvalidPlanError";
    this.plan = plan;
  }
}

type PostTransform = (influent: ConcentrationVector, effluent: ConcentrationVector) => ConcentrationVector;

interface StageDefinition {
  name: string;
  postTransform?: PostTransform;
}

export interface TreatmentStage {
  id: StageId;
  name: string;
  removal: RemovalProfile;
  postTransform?: PostTransform;
}

export type Pipeline = readonly TreatmentStage[];

export const STAGE_DEFINITIONS: Record<StageId, StageDefinition> = {
  fine_screen: { name: "Fine Screen" },
  plain_sedimentation: { name: "Plain Sedimentation" },
  coagulation_tank: { name: "Coagulation Tank" },
  flocculation_chamber: { name: "Flocculation Chamber" },
  sedimentation: { name: "Sedimentation" },
  electrocoagulation: { name: "Electrocoagulation", postTransform: applyElectrocoagulationPH },
  rapid_sand_filter: { name: "Rapid Sand Filter" },
};

export const TREATMENT_TRAINS = {
  1: ["fine_screen", "plain_sedimentation", "electrocoagulation", "rapid_sand_filter"],
  2: [
    "fine_screen",
    "coagulation_tank",
    "flocculation_chamber",
    "sedimentation",
    "electrocoagulation",
    "rapid_sand_filter",
  ],
} as const satisfies Record<Plan, readonly StageId[]>;

/**
 * Narrows an arbitrary plan selector to 1 or 2, throwing InvalidPlanError
 * for anything else.
 */
export function resolvePlan(plan: unknown): Plan {
  const parsed = planSchema.safeParse(plan);
  if (!parsed.success) {
    throw new InvalidPlanError(plan);
  }
  return parsed.data;
}

function bindStages<K extends StageId>(train: readonly K[], profiles: Record<K, RemovalProfile>): Pipeline {
  const stages = train.map((id): TreatmentStage => {
    const definition = STAGE_DEFINITIONS[id];
    return Object.freeze({
      id,
      name: definition.name,
      removal: profiles[id],
      postTransform: definition.postTransform,
    });
  });

  return Object.freeze(stages);
}

export function buildPipeline(plan: unknown, constants: TreatmentConstants = TREATMENT_CONSTANTS): Pipeline {
  const resolved = resolvePlan(plan);
  return resolved === 1
    ? bindStages(TREATMENT_TRAINS[1], constants.removalProfiles[1])
    : bindStages(TREATMENT_TRAINS[2], constants.removalProfiles[2]);
}

export function runStage(stage: TreatmentStage, influent: ConcentrationVector): ConcentrationVector {
  const effluent = applyRemoval(influent, stage.removal);
  return stage.postTransform ? stage.postTransform(influent, effluent) : effluent;
}

function historyEntry(stage: string, values: ConcentrationVector): StageHistoryEntry {
  return Object.freeze({ stage, values: Object.freeze({ ...values }) });
}

/**
 * Threads the raw vector through every stage in order. The history holds the
 * raw entry first, then one entry per stage; the array, its entries and their
 * vectors are frozen.
 */
export function runPipeline(raw: ConcentrationVector, pipeline: Pipeline): readonly StageHistoryEntry[] {
  const history: StageHistoryEntry[] = [historyEntry(RAW_WASTEWATER_STAGE, raw)];
  let current = raw;

  for (const stage of pipeline) {
    current = runStage(stage, current);
    history.push(historyEntry(stage.name, current));
  }

  return Object.freeze(history);
}
