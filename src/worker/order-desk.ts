/**
 * Order gateway facing the kitchen.
 *
 * Accepts or rejects submissions synchronously through the event inbox and
 * keeps a bounded record of every order it has seen, including the progress
 * text and the single terminal result the core reports for it.
 */

import { randomUUID } from "node:crypto";

import type { OrderReporter } from "@/adapters/types";
import type { EventInbox, Location, OrderRejectCode } from "@/domains/delivery";
import type { Logger } from "@/lib/logger";
import { incrementMetric } from "@/lib/metrics";

export type OrderStatus = "accepted" | "succeeded" | "failed" | "rejected";

export interface OrderRecord {
  id: string;
  destination: Location;
  status: OrderStatus;
  progress: string | null;
  result: { success: boolean; message: string } | null;
  rejectCode: OrderRejectCode | null;
  submittedAt: Date;
  updatedAt: Date;
}

export type SubmitResult =
  | { accepted: true; orderId: string }
  | { accepted: false; orderId: string; code: OrderRejectCode; message: string };

export interface OrderDesk extends OrderReporter {
  submitOrder(destination: Location): SubmitResult;
  /** Accepted orders run to completion; always returns false. */
  preemptOrder(): boolean;
  getOrder(id: string): Readonly<OrderRecord> | null;
  listOrders(): readonly Readonly<OrderRecord>[];
}

export interface OrderDeskDeps {
  inbox: Pick<EventInbox, "setOrderRequest" | "setOrderPreempted">;
  logger: Logger;
  /** Records kept before the oldest are forgotten (default: 100) */
  capacity?: number;
}

export const createOrderDesk = (deps: OrderDeskDeps): OrderDesk => {
  const { inbox, logger, capacity = 100 } = deps;
  const orders = new Map<string, OrderRecord>();

  const remember = (record: OrderRecord): void => {
    orders.set(record.id, record);
    while (orders.size > capacity) {
      const oldest = orders.keys().next();
      if (oldest.done) break;
      orders.delete(oldest.value);
    }
  };

  const submitOrder = (destination: Location): SubmitResult => {
    const decision = inbox.setOrderRequest(destination);
    const now = new Date();

    if (!decision.accepted) {
      const id = randomUUID();
      incrementMetric("ordersRejected");
      remember({
        id,
        destination,
        status: "rejected",
        progress: null,
        result: { success: false, message: decision.message },
        rejectCode: decision.code,
        submittedAt: now,
        updatedAt: now,
      });
      return { accepted: false, orderId: id, code: decision.code, message: decision.message };
    }

    incrementMetric("ordersAccepted");
    remember({
      id: decision.order.id,
      destination,
      status: "accepted",
      progress: null,
      result: null,
      rejectCode: null,
      submittedAt: now,
      updatedAt: now,
    });
    return { accepted: true, orderId: decision.order.id };
  };

  const reportProgress = (orderId: string, text: string): void => {
    const record = orders.get(orderId);
    if (!record || record.result) return;
    record.progress = text;
    record.updatedAt = new Date();
  };

  const reportResult = (orderId: string, success: boolean, message: string): void => {
    const record = orders.get(orderId);
    if (!record) {
      logger.warn("Result for unknown order", { orderId, success, message });
      return;
    }
    if (record.result) {
      logger.warn("Order already has a result", { orderId, status: record.status });
      return;
    }
    record.result = { success, message };
    record.status = success ? "succeeded" : "failed";
    record.updatedAt = new Date();
    logger.info("Order finished", { orderId, success, message });
  };

  return {
    submitOrder,
    preemptOrder: (): boolean => {
      inbox.setOrderPreempted();
      return false;
    },
    reportProgress,
    reportResult,
    getOrder: (id: string): Readonly<OrderRecord> | null => orders.get(id) ?? null,
    listOrders: (): readonly Readonly<OrderRecord>[] => Array.from(orders.values()),
  };
};
