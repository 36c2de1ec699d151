import { Hono } from "hono";
import * as v from "valibot";

import type { OrderDesk } from "@/worker/order-desk";

import { readJson } from "./read-json";

export const orderRequestSchema = v.object({
  destination: v.pipe(v.string(), v.trim(), v.nonEmpty("destination is required")),
});

export const createOrdersRoute = (orders: OrderDesk): Hono => {
  const route = new Hono();

  route.post("/", async (c) => {
    const parsed = v.safeParse(orderRequestSchema, await readJson(c.req.raw));
    if (!parsed.success) {
      return c.json(
        { error: "Invalid order", issues: parsed.issues.map((issue) => issue.message) },
        400,
      );
    }

    const result = orders.submitOrder(parsed.output.destination);
    if (!result.accepted) {
      return c.json(
        { accepted: false, orderId: result.orderId, code: result.code, message: result.message },
        409,
      );
    }
    return c.json({ accepted: true, orderId: result.orderId }, 202);
  });

  route.delete("/current", (c) => c.json({ preempted: orders.preemptOrder() }));

  route.get("/:id", (c) => {
    const order = orders.getOrder(c.req.param("id"));
    if (!order) {
      return c.json({ error: "Order not found" }, 404);
    }
    return c.json({
      ...order,
      submittedAt: order.submittedAt.toISOString(),
      updatedAt: order.updatedAt.toISOString(),
    });
  });

  return route;
};
