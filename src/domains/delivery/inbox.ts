/**
 * Shared event state between event-source callbacks and the control tick.
 *
 * Callbacks only call the `set*` writers. The tick drains flags with the
 * `take*` readers, each of which clears what it returns, so an event is
 * handled exactly once. Node runs callbacks and ticks to completion on one
 * thread, so no lock is needed around the fields.
 */

import { randomUUID } from "node:crypto";

import type { Logger } from "@/lib/logger";

import { ORDER_REJECT_MESSAGES, type OrderRejectCode } from "./errors";
import type { DeliveryOrder, Location, RobotState } from "./types";

/**
 * Read-only view of tick-owned state used to gate incoming events.
 */
export interface MachineView {
  state: RobotState;
  hasActiveOrder: boolean;
}

export type OrderDecision =
  | { accepted: true; order: DeliveryOrder }
  | { accepted: false; code: OrderRejectCode; message: string };

export interface NavigationOutcome {
  handle: string;
  success: boolean;
  message: string;
}

export interface NavigationProgress {
  handle: string;
  distance: number;
  message: string;
  /** Retry notifications received since the last take. */
  retrySignals: number;
}

export interface EventInbox {
  setGreenEdge(): void;
  setOrderRequest(destination: Location): OrderDecision;
  /** Accepted orders cannot be cancelled; kept so gateways have something to call. */
  setOrderPreempted(): void;
  setLocalized(): void;
  /** The localization request could not be started. */
  setLocalizationFailed(message: string): void;
  setNavigationOutcome(handle: string, success: boolean, message: string): void;
  setNavigationFeedback(
    handle: string,
    distance: number,
    message: string,
    retrySignal: boolean,
  ): void;

  takeConfirmation(): boolean;
  takeReinit(): boolean;
  takeLocalized(): boolean;
  takeLocalizationFailure(): string | null;
  takePendingOrder(): DeliveryOrder | null;
  takeNavigationOutcome(): NavigationOutcome | null;
  takeNavigationFeedback(): NavigationProgress | null;

  /** Register the goal whose callbacks are accepted from now on. */
  expectNavigation(handle: string): void;
  /** Stop accepting callbacks for the outstanding goal. */
  abandonNavigation(): void;
  hasPendingOrder(): boolean;
}

export interface EventInboxDeps {
  view: () => MachineView;
  logger: Logger;
  generateOrderId?: () => string;
}

export const createEventInbox = (deps: EventInboxDeps): EventInbox => {
  const { view, logger, generateOrderId = randomUUID } = deps;

  let confirmation = false;
  let reinit = false;
  let localized = false;
  let localizationFailure: string | null = null;
  let pendingOrder: DeliveryOrder | null = null;
  let expectedHandle: string | null = null;
  let outcome: NavigationOutcome | null = null;
  let progress: NavigationProgress | null = null;

  const reject = (code: OrderRejectCode): OrderDecision => {
    const message = ORDER_REJECT_MESSAGES[code];
    logger.warn("Order rejected", { code, message });
    return { accepted: false, code, message };
  };

  return {
    setGreenEdge: (): void => {
      const { state } = view();
      if (state === "AtDropoff") {
        confirmation = true;
      } else if (state === "Error") {
        reinit = true;
      } else {
        logger.debug("Green button ignored", { state });
      }
    },

    setOrderRequest: (destination: Location): OrderDecision => {
      const { state, hasActiveOrder } = view();
      if (state !== "AtPickup") {
        return reject("NOT_AT_PICKUP");
      }
      if (pendingOrder !== null || hasActiveOrder) {
        return reject("ORDER_IN_PROGRESS");
      }
      pendingOrder = { id: generateOrderId(), destination };
      logger.info("Order accepted", { orderId: pendingOrder.id, destination });
      return { accepted: true, order: pendingOrder };
    },

    setOrderPreempted: (): void => {
      logger.debug("Order preemption requested; accepted orders are not cancelable");
    },

    setLocalized: (): void => {
      localized = true;
    },

    setLocalizationFailed: (message: string): void => {
      localizationFailure = message;
    },

    setNavigationOutcome: (handle: string, success: boolean, message: string): void => {
      if (handle !== expectedHandle) {
        logger.debug("Dropping navigation result for stale goal", { handle, success });
        return;
      }
      expectedHandle = null;
      outcome = { handle, success, message };
    },

    setNavigationFeedback: (
      handle: string,
      distance: number,
      message: string,
      retrySignal: boolean,
    ): void => {
      if (handle !== expectedHandle) return;
      progress = {
        handle,
        distance,
        message,
        retrySignals: (progress?.retrySignals ?? 0) + (retrySignal ? 1 : 0),
      };
    },

    takeConfirmation: (): boolean => {
      const value = confirmation;
      confirmation = false;
      return value;
    },

    takeReinit: (): boolean => {
      const value = reinit;
      reinit = false;
      return value;
    },

    takeLocalized: (): boolean => {
      const value = localized;
      localized = false;
      return value;
    },

    takeLocalizationFailure: (): string | null => {
      const value = localizationFailure;
      localizationFailure = null;
      return value;
    },

    takePendingOrder: (): DeliveryOrder | null => {
      const value = pendingOrder;
      pendingOrder = null;
      return value;
    },

    takeNavigationOutcome: (): NavigationOutcome | null => {
      const value = outcome;
      outcome = null;
      return value;
    },

    takeNavigationFeedback: (): NavigationProgress | null => {
      const value = progress;
      progress = null;
      return value;
    },

    expectNavigation: (handle: string): void => {
      expectedHandle = handle;
      outcome = null;
      progress = null;
    },

    abandonNavigation: (): void => {
      expectedHandle = null;
      progress = null;
    },

    hasPendingOrder: (): boolean => pendingOrder !== null,
  };
};
