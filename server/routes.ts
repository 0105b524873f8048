/**
 * REST API routes for the effluent treatment simulator.
 *
 * The engine is exposed read-only:
 * - the parameter table with units and discharge limits
 * - the treatment train of each plan
 * - a full simulation run (stage history plus compliance report) per plan
 */
import type { Express, Request, Response } from "express";
import type { Server } from "http";
import { log } from "./log";
import { PLANS, planSelectorSchema, simulationRequestSchema, PARAMETER_KEYS } from "@shared/schema";
import { PARAMETER_LIBRARY, parameterGroupLabels } from "@shared/parameter-library";
import { describeLimit } from "./services/compliance";
import { TREATMENT_CONSTANTS } from "./services/treatmentLibrary";
import { InvalidPlanError, buildPipeline } from "./services/treatmentPipeline";
import { TreatmentSimulation } from "./services/treatmentSimulation";

function simulate(plan: unknown, req: Request, res: Response) {
  try {
    const simulation = new TreatmentSimulation(plan);
    const summary = simulation.getSummary();
    if (req.app.get("logRequests") === true) {
      log(`plan ${summary.plan} ran ${summary.stages.length} stages, ${summary.failedParameters.length} limits failed`, "treatment");
    }
    res.json(summary);
  } catch (error) {
    if (error instanceof InvalidPlanError) {
      return res.status(400).json({ error: error.message });
    }
    console.error("Error running treatment simulation:", error);
    res.status(500).json({ error: "Failed to run treatment simulation" });
  }
}

export async function registerRoutes(
  httpServer: Server,
  app: Express
): Promise<Server> {
  app.get("/api/health", (_req: Request, res: Response) => {
    res.json({ status: "ok" });
  });

  // =========================================================================
  // Reference data
  // =========================================================================

  app.get("/api/parameters", (_req: Request, res: Response) => {
    const parameters = PARAMETER_KEYS.map(key => {
      const definition = PARAMETER_LIBRARY[key];
      const limit = TREATMENT_CONSTANTS.effluentLimits[key] ?? null;
      return {
        key,
        ...definition,
        groupLabel: parameterGroupLabels[definition.group] ?? definition.group,
        limit,
        limitLabel: describeLimit(limit),
      };
    });
    res.json(parameters);
  });

  app.get("/api/plans", (_req: Request, res: Response) => {
    const plans = PLANS.map(plan => ({
      plan,
      stages: buildPipeline(plan).map(stage => stage.name),
    }));
    res.json(plans);
  });

  // =========================================================================
  // Simulation
  // =========================================================================

  app.post("/api/simulations", (req: Request, res: Response) => {
    const parsed = simulationRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: "Invalid simulation request", details: parsed.error.issues });
    }
    simulate(parsed.data.plan, req, res);
  });

  app.get("/api/plans/:plan/simulation", (req: Request, res: Response) => {
    const parsed = planSelectorSchema.safeParse(req.params.plan);
    if (!parsed.success) {
      return res.status(400).json({ error: "Invalid plan", details: parsed.error.issues });
    }
    simulate(parsed.data, req, res);
  });

  return httpServer;
}
