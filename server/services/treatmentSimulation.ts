import type {
  ComplianceReport,
  ConcentrationVector,
  Plan,
  SimulationSummary,
  StageHistoryEntry,
  TreatmentConstants,
} from "@shared/schema";
import { evaluateCompliance, failedParameters } from "./compliance";
import { buildPipeline, resolvePlan, runPipeline, type Pipeline } from "./treatmentPipeline";
import { TREATMENT_CONSTANTS } from "./treatmentLibrary";

/**
 * One treatment plan run end to end: raw influent, the plan's pipeline and the
 * resulting stage history. Instances share no state, so Plan 1 and Plan 2 can
 * be simulated side by side.
 */
export class TreatmentSimulation {
  readonly plan: Plan;
  readonly pipeline: Pipeline;
  private readonly constants: TreatmentConstants;
  private history: readonly StageHistoryEntry[] | null = null;

  constructor(plan: unknown, constants: TreatmentConstants = TREATMENT_CONSTANTS) {
    this.plan = resolvePlan(plan);
    this.constants = constants;
    this.pipeline = buildPipeline(this.plan, constants);
  }

  get rawWastewater(): ConcentrationVector {
    return { ...this.constants.rawWastewater[this.plan] };
  }

  get flowRate(): number {
    return this.constants.plant.flowRate;
  }

  get hourlyFlow(): number {
    return this.flowRate / 24;
  }

  runSimulation(): readonly StageHistoryEntry[] {
    this.history = runPipeline(this.rawWastewater, this.pipeline);
    return this.history;
  }

  getHistory(): readonly StageHistoryEntry[] {
    return this.history ?? this.runSimulation();
  }

  getFinalEffluent(): Readonly<ConcentrationVector> {
    const history = this.getHistory();
    return history[history.length - 1].values;
  }

  evaluateCompliance(): ComplianceReport {
    return evaluateCompliance(this.getFinalEffluent(), this.constants.effluentLimits);
  }

  getSummary(): SimulationSummary {
    const compliance = this.evaluateCompliance();
    const failed = failedParameters(compliance);

    return {
      plan: this.plan,
      plant: {
        name: this.constants.plant.name,
        flowRate: this.flowRate,
        hourlyFlow: this.hourlyFlow,
      },
      stages: this.pipeline.map(stage => stage.name),
      history: this.getHistory(),
      compliance,
      passed: failed.length === 0,
      failedParameters: failed,
    };
  }
}
