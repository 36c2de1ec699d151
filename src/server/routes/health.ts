import { Hono } from "hono";

import type { Controller } from "@/worker/controller";

export interface HealthRouteDeps {
  controller: Pick<Controller, "isRunning" | "getLastTickAt">;
  /** The loop counts as stalled when its last tick is older than this. */
  staleAfterMs: number;
  now?: () => number;
}

interface ControlLoopCheck {
  status: "healthy" | "unhealthy";
  lastTickAt: string | null;
  ageMs: number | null;
  error?: string;
}

const checkControlLoop = (deps: HealthRouteDeps, nowMs: number): ControlLoopCheck => {
  const lastTickAt = deps.controller.getLastTickAt();
  if (!deps.controller.isRunning()) {
    return { status: "unhealthy", lastTickAt: null, ageMs: null, error: "Control loop is not running" };
  }
  if (lastTickAt === null) {
    return { status: "unhealthy", lastTickAt: null, ageMs: null, error: "No tick yet" };
  }

  const ageMs = nowMs - lastTickAt;
  const check: ControlLoopCheck = {
    status: ageMs <= deps.staleAfterMs ? "healthy" : "unhealthy",
    lastTickAt: new Date(lastTickAt).toISOString(),
    ageMs,
  };
  if (check.status === "unhealthy") {
    check.error = `Last tick ${ageMs}ms ago`;
  }
  return check;
};

export const createHealthRoute = (deps: HealthRouteDeps): Hono => {
  const health = new Hono();
  const now = deps.now ?? Date.now;

  health.get("/", (c) => {
    const nowMs = now();
    const controlLoop = checkControlLoop(deps, nowMs);

    return c.json(
      {
        status: controlLoop.status,
        timestamp: new Date(nowMs).toISOString(),
        checks: { controlLoop },
      },
      controlLoop.status === "healthy" ? 200 : 503,
    );
  });

  return health;
};
