import { serve } from "@hono/node-server";
import { Hono } from "hono";

import type { DeliveryMachine } from "@/domains/delivery";
import type { Logger } from "@/lib/logger";
import { incrementMetric, recordDuration } from "@/lib/metrics";
import type { ButtonInput } from "@/worker/button-input";
import type { Controller } from "@/worker/controller";
import type { OrderDesk } from "@/worker/order-desk";
import type { StatusBoard } from "@/worker/status-board";

import { createButtonsRoute } from "./routes/buttons";
import { createHealthRoute } from "./routes/health";
import { metrics } from "./routes/metrics";
import { createOrdersRoute } from "./routes/orders";
import { createStatusRoute } from "./routes/status";

export interface AppDeps {
  logger: Logger;
  machine: Pick<DeliveryMachine, "getSnapshot" | "getTickCount" | "transitions">;
  controller: Pick<Controller, "isRunning" | "getLastTickAt">;
  orders: OrderDesk;
  status: StatusBoard;
  buttons: ButtonInput;
  staleAfterMs: number;
}

export interface ServerDeps extends AppDeps {
  port: number;
}

export interface HttpServer {
  port: number;
  close: () => Promise<void>;
}

export const createApp = (deps: AppDeps): Hono => {
  const app = new Hono();

  // Request logging middleware
  app.use("*", async (c, next) => {
    const start = Date.now();
    await next();
    const duration = Date.now() - start;
    deps.logger.info("HTTP request", {
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: duration,
    });
    incrementMetric("httpRequestsTotal");
    recordDuration(duration);
  });

  app.get("/", (c) => c.json({ message: "Delivery Robot API" }));
  app.route("/health", createHealthRoute({ controller: deps.controller, staleAfterMs: deps.staleAfterMs }));
  app.route("/metrics", metrics);
  app.route("/orders", createOrdersRoute(deps.orders));
  app.route("/buttons", createButtonsRoute(deps.buttons));
  app.route("/status", createStatusRoute({ status: deps.status, machine: deps.machine }));

  return app;
};

export const startHttpServer = async (deps: ServerDeps): Promise<HttpServer> => {
  const app = createApp(deps);

  const server = serve(
    {
      fetch: app.fetch,
      port: deps.port,
    },
    (info) => {
      deps.logger.info(`HTTP server listening on port ${info.port}`);
    },
  );

  return {
    port: deps.port,
    close: async (): Promise<void> => {
      return new Promise<void>((resolve) => {
        server.close(() => {
          deps.logger.info("HTTP server closed");
          resolve();
        });
      });
    },
  };
};
