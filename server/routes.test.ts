import type { Server } from "http";
import { afterAll, afterEach, beforeAll, describe, expect, it, vi } from "vitest";
import { createApp } from "./app";

let server: Server;
let baseUrl: string;

beforeAll(async () => {
  server = await createApp({ logRequests: false });
  await new Promise<void>(resolve => server.listen(0, "127.0.0.1", () => resolve()));
  const address = server.address();
  if (!address || typeof address === "string") {
    throw new Error("Test server did not bind to a TCP port");
  }
  baseUrl = `http://127.0.0.1:${address.port}`;
});

afterAll(async () => {
  await new Promise<void>((resolve, reject) => server.close(err => (err ? reject(err) : resolve())));
});

afterEach(() => {
  vi.restoreAllMocks();
});

function postJson(path: string, body: string) {
  return fetch(`${baseUrl}${path}`, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body,
  });
}

describe("treatment API", () => {
  it("reports health", async () => {
    const res = await fetch(`${baseUrl}/api/health`);
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: "ok" });
  });

  it("lists both plans with their stages", async () => {
    const res = await fetch(`${baseUrl}/api/plans`);
    expect(await res.json()).toEqual([
      { plan: 1, stages: ["Fine Screen", "Plain Sedimentation", "Electrocoagulation", "Rapid Sand Filter"] },
      {
        plan: 2,
        stages: [
          "Fine Screen",
          "Coagulation Tank",
          "Flocculation Chamber",
          "Sedimentation",
          "Electrocoagulation",
          "Rapid Sand Filter",
        ],
      },
    ]);
  });

  it("lists parameters with limit labels", async () => {
    const res = await fetch(`${baseUrl}/api/parameters`);
    const body = await res.json();

    expect(body).toHaveLength(12);
    expect(body).toEqual(expect.arrayContaining([
      expect.objectContaining({ key: "ph", displayName: "pH", limit: null, limitLabel: "N/A" }),
      expect.objectContaining({ key: "alkalinity", limitLabel: "50-150" }),
      expect.objectContaining({ key: "bod", unit: "mg/L", groupLabel: "Organic Load", limitLabel: "≤30" }),
    ]));
  });

  it("runs a simulation for a posted plan", async () => {
    const res = await postJson("/api/simulations", JSON.stringify({ plan: 2 }));
    const body = await res.json();

    expect(res.status).toBe(200);
    expect(body).toMatchObject({
      plan: 2,
      passed: false,
      failedParameters: ["bod", "totalNitrates", "totalColor"],
      compliance: { ph: { value: 7.5, passes: true, limit: null } },
    });
    expect(body).toHaveProperty("history.length", 7);
    expect(body).toHaveProperty("history.0.stage", "Raw Wastewater");
  });

  it("accepts the plan as a string", async () => {
    const res = await postJson("/api/simulations", JSON.stringify({ plan: "1" }));
    const body = await res.json();

    expect(res.status).toBe(200);
    expect(body).toHaveProperty("history.length", 5);
  });

  it("runs a simulation from the path", async () => {
    const res = await fetch(`${baseUrl}/api/plans/1/simulation`);
    const body = await res.json();

    expect(res.status).toBe(200);
    expect(body).toMatchObject({ plan: 1, passed: false });
    expect(body).toHaveProperty("stages.length", 4);
  });

  it("rejects an unknown plan with 400", async () => {
    const res = await postJson("/api/simulations", JSON.stringify({ plan: 3 }));
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "Invalid treatment plan: 3. Must be 1 or 2." });

    const fromPath = await fetch(`${baseUrl}/api/plans/9/simulation`);
    expect(fromPath.status).toBe(400);
  });

  it("rejects a body without a numeric plan", async () => {
    const res = await postJson("/api/simulations", JSON.stringify({ plan: "abc" }));
    const body = await res.json();

    expect(res.status).toBe(400);
    expect(body).toMatchObject({ error: "Invalid simulation request", details: [{ path: ["plan"] }] });
  });

  it.each([
    ["a boolean", "true"],
    ["an array", "[1]"],
    ["a hex string", JSON.stringify("0x2")],
    ["a padded string", JSON.stringify(" 1")],
  ])("rejects %s as the plan", async (_label, plan) => {
    const res = await postJson("/api/simulations", `{"plan":${plan}}`);

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ error: "Invalid simulation request", details: [{ path: ["plan"] }] });
  });

  it("rejects a path plan that is not 1 or 2", async () => {
    const res = await fetch(`${baseUrl}/api/plans/0x2/simulation`);

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ error: "Invalid plan" });
  });

  it("stays quiet when request logging is off", async () => {
    const consoleLog = vi.spyOn(console, "log").mockImplementation(() => {});

    const res = await fetch(`${baseUrl}/api/plans/2/simulation`);
    await res.json();

    expect(res.status).toBe(200);
    expect(consoleLog).not.toHaveBeenCalled();
  });

  it("rejects malformed JSON", async () => {
    const res = await postJson("/api/simulations", "{plan:");
    expect(res.status).toBe(400);
  });
});
