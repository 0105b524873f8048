import type { ConcentrationVector, RemovalProfile } from "@shared/schema";

const PH_NEUTRAL_CEILING = 7.0;
const PH_ALKALINE_FLOOR = 7.5;

function remaining(value: number, fraction: number | undefined): number {
  return value * (1 - (fraction ?? 0));
}

/**
 * Applies a unit's removal fractions to every parameter. Parameters the
 * profile does not list pass through unchanged. Always returns a new vector.
 */
export function applyRemoval(influent: ConcentrationVector, removal: RemovalProfile): ConcentrationVector {
  return {
    ph: remaining(influent.ph, removal.ph),
    tss: remaining(influent.tss, removal.tss),
    tds: remaining(influent.tds, removal.tds),
    cod: remaining(influent.cod, removal.cod),
    bod: remaining(influent.bod, removal.bod),
    conductivity: remaining(influent.conductivity, removal.conductivity),
    turbidity: remaining(influent.turbidity, removal.turbidity),
    alkalinity: remaining(influent.alkalinity, removal.alkalinity),
    totalNitrates: remaining(influent.totalNitrates, removal.totalNitrates),
    totalPhosphates: remaining(influent.totalPhosphates, removal.totalPhosphates),
    totalColor: remaining(influent.totalColor, removal.totalColor),
    totalZinc: remaining(influent.totalZinc, removal.totalZinc),
  };
}

/**
 * Electrocoagulation pH drift: acidic water rises toward neutral (capped at
 * 7.0), basic water above 8 falls (floored at 7.5), 7-8 is left alone.
 */
export function adjustPH(currentPH: number): number {
  if (currentPH < 7) {
    return Math.min(currentPH * 1.1, PH_NEUTRAL_CEILING);
  }
  if (currentPH > 8) {
    return Math.max(currentPH * 0.95, PH_ALKALINE_FLOOR);
  }
  return currentPH;
}

// Post-transform hook for electrocoagulation: pH comes from the rule, not the profile.
export function applyElectrocoagulationPH(
  influent: ConcentrationVector,
  effluent: ConcentrationVector,
): ConcentrationVector {
  return { ...effluent, ph: adjustPH(influent.ph) };
}
