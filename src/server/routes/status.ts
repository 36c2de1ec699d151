import { Hono } from "hono";

import type { DeliveryMachine } from "@/domains/delivery";
import type { StatusBoard } from "@/worker/status-board";

export interface StatusRouteDeps {
  status: StatusBoard;
  machine: Pick<DeliveryMachine, "getSnapshot" | "getTickCount" | "transitions">;
  /** Transitions included in the response (default: 10) */
  recentLimit?: number;
}

export const createStatusRoute = (deps: StatusRouteDeps): Hono => {
  const route = new Hono();
  const recentLimit = deps.recentLimit ?? 10;

  route.get("/", (c) => {
    const published = deps.status.getSnapshot();
    const snapshot = deps.machine.getSnapshot();

    return c.json({
      status: published.status,
      publishedAt: published.publishedAt?.toISOString() ?? null,
      tickCount: deps.machine.getTickCount(),
      activeOrderId: snapshot.activeOrder?.id ?? null,
      navigation: snapshot.navigation
        ? { handle: snapshot.navigation.goal.id, target: snapshot.navigation.goal.target }
        : null,
      transitions: deps.machine.transitions.recent(recentLimit).map((transition) => ({
        ...transition,
        timestamp: transition.timestamp.toISOString(),
      })),
    });
  });

  return route;
};
