import { beforeEach, describe, expect, it } from "vitest";

import { createMockLogger } from "@/lib/logger/testing";

import { type EventInbox, type MachineView, createEventInbox } from "./inbox";

describe("createEventInbox", () => {
  let view: MachineView;
  let inbox: EventInbox;
  let nextId: number;

  beforeEach(() => {
    view = { state: "AtPickup", hasActiveOrder: false };
    nextId = 0;
    inbox = createEventInbox({
      view: () => view,
      logger: createMockLogger(),
      generateOrderId: () => `order-${++nextId}`,
    });
  });

  describe("setOrderRequest", () => {
    it("should accept an order at pickup when none is pending", () => {
      const decision = inbox.setOrderRequest("table-3");

      expect(decision).toEqual({
        accepted: true,
        order: { id: "order-1", destination: "table-3" },
      });
      expect(inbox.hasPendingOrder()).toBe(true);
    });

    it("should reject an order when not at pickup without touching the pending order", () => {
      view = { state: "GotoDropoff", hasActiveOrder: true };

      const decision = inbox.setOrderRequest("table-3");

      expect(decision).toEqual({
        accepted: false,
        code: "NOT_AT_PICKUP",
        message: "Robot is not at pickup. Ignore the order!",
      });
      expect(inbox.takePendingOrder()).toBeNull();
    });

    it("should reject every non-pickup state", () => {
      for (const state of ["Initialization", "GotoPickup", "GotoDropoff", "AtDropoff", "Error"] as const) {
        view = { state, hasActiveOrder: false };
        expect(inbox.setOrderRequest("table-1").accepted).toBe(false);
      }
      expect(inbox.hasPendingOrder()).toBe(false);
    });

    it("should reject a second order while the first is still pending", () => {
      inbox.setOrderRequest("table-1");

      const second = inbox.setOrderRequest("table-2");

      expect(second).toEqual({
        accepted: false,
        code: "ORDER_IN_PROGRESS",
        message: "Another order is already in progress",
      });
      expect(inbox.takePendingOrder()).toEqual({ id: "order-1", destination: "table-1" });
    });

    it("should reject an order while another delivery is active", () => {
      view = { state: "AtPickup", hasActiveOrder: true };

      expect(inbox.setOrderRequest("table-2").accepted).toBe(false);
    });
  });

  describe("setGreenEdge", () => {
    it("should raise the confirmation flag at the drop-off point", () => {
      view = { state: "AtDropoff", hasActiveOrder: true };

      inbox.setGreenEdge();

      expect(inbox.takeConfirmation()).toBe(true);
      expect(inbox.takeReinit()).toBe(false);
    });

    it("should raise the re-initialization flag in Error", () => {
      view = { state: "Error", hasActiveOrder: false };

      inbox.setGreenEdge();

      expect(inbox.takeReinit()).toBe(true);
      expect(inbox.takeConfirmation()).toBe(false);
    });

    it("should ignore the button in other states", () => {
      view = { state: "GotoPickup", hasActiveOrder: false };

      inbox.setGreenEdge();

      expect(inbox.takeConfirmation()).toBe(false);
      expect(inbox.takeReinit()).toBe(false);
    });
  });

  describe("read-and-clear", () => {
    it("should return no event on the second take without a new set", () => {
      view = { state: "AtDropoff", hasActiveOrder: true };
      inbox.setGreenEdge();
      inbox.setLocalized();

      expect(inbox.takeConfirmation()).toBe(true);
      expect(inbox.takeConfirmation()).toBe(false);
      expect(inbox.takeLocalized()).toBe(true);
      expect(inbox.takeLocalized()).toBe(false);
    });

    it("should hand out a localization failure once", () => {
      inbox.setLocalizationFailed("sensor offline");

      expect(inbox.takeLocalizationFailure()).toBe("sensor offline");
      expect(inbox.takeLocalizationFailure()).toBeNull();
    });

    it("should hand out a pending order once", () => {
      inbox.setOrderRequest("table-4");

      expect(inbox.takePendingOrder()).not.toBeNull();
      expect(inbox.takePendingOrder()).toBeNull();
    });
  });

  describe("navigation callbacks", () => {
    it("should keep the terminal result of the expected goal", () => {
      inbox.expectNavigation("nav-1");

      inbox.setNavigationOutcome("nav-1", true, "arrived");

      expect(inbox.takeNavigationOutcome()).toEqual({
        handle: "nav-1",
        success: true,
        message: "arrived",
      });
      expect(inbox.takeNavigationOutcome()).toBeNull();
    });

    it("should drop results for other handles", () => {
      inbox.expectNavigation("nav-2");

      inbox.setNavigationOutcome("nav-1", false, "late");

      expect(inbox.takeNavigationOutcome()).toBeNull();
    });

    it("should accept only one terminal result per goal", () => {
      inbox.expectNavigation("nav-1");
      inbox.setNavigationOutcome("nav-1", true, "arrived");

      inbox.setNavigationOutcome("nav-1", false, "duplicate");

      expect(inbox.takeNavigationOutcome()).toEqual({
        handle: "nav-1",
        success: true,
        message: "arrived",
      });
    });

    it("should drop results after the goal was abandoned", () => {
      inbox.expectNavigation("nav-1");
      inbox.abandonNavigation();

      inbox.setNavigationOutcome("nav-1", true, "too late");

      expect(inbox.takeNavigationOutcome()).toBeNull();
    });

    it("should keep the latest progress and count retry signals", () => {
      inbox.expectNavigation("nav-1");

      inbox.setNavigationFeedback("nav-1", 7, "moving", false);
      inbox.setNavigationFeedback("nav-1", 6, "blocked", true);
      inbox.setNavigationFeedback("nav-1", 5, "retrying", true);

      expect(inbox.takeNavigationFeedback()).toEqual({
        handle: "nav-1",
        distance: 5,
        message: "retrying",
        retrySignals: 2,
      });
      expect(inbox.takeNavigationFeedback()).toBeNull();
    });

    it("should ignore progress for goals that are not outstanding", () => {
      inbox.expectNavigation("nav-3");

      inbox.setNavigationFeedback("nav-2", 1, "old", true);

      expect(inbox.takeNavigationFeedback()).toBeNull();
    });
  });

  it("should treat order preemption as a no-op", () => {
    inbox.setOrderRequest("table-1");

    inbox.setOrderPreempted();

    expect(inbox.takePendingOrder()).toEqual({ id: "order-1", destination: "table-1" });
  });
});
