import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import type { NavigationGoal } from "@/domains/delivery";
import { DEFAULT_DELIVERY_CONFIG, RobotError, createDeliveryMachine } from "@/domains/delivery";
import { createMockLogger } from "@/lib/logger/testing";
import { getMetricsSnapshot, resetMetrics } from "@/lib/metrics";

import { type ControllerDeps, createController } from "./controller";

const TICK_MS = 100;

describe("createController", () => {
  let clock: number;

  const setup = (overrides: Partial<ControllerDeps> = {}) => {
    const logger = createMockLogger();
    let orderSeq = 0;
    const machine = createDeliveryMachine({
      config: DEFAULT_DELIVERY_CONFIG,
      logger,
      generateOrderId: () => `order-${++orderSeq}`,
    });
    const navigation = {
      request: vi.fn((goal: NavigationGoal) => goal.id),
      shutdown: vi.fn(),
    };
    const localization = { requestLocalize: vi.fn(), shutdown: vi.fn() };
    const feedback = { setIndicator: vi.fn() };
    const cues = { enqueue: vi.fn(() => true) };
    const status = { publish: vi.fn() };
    const orders = { reportProgress: vi.fn(), reportResult: vi.fn() };

    const controller = createController({
      machine,
      navigation,
      localization,
      feedback,
      cues,
      status,
      orders,
      logger,
      tickIntervalMs: TICK_MS,
      feedbackEveryTicks: 5,
      now: () => clock,
      ...overrides,
    });

    const step = () => {
      clock += TICK_MS;
      return controller.runOnce();
    };

    return { logger, machine, navigation, localization, feedback, cues, status, orders, controller, step };
  };

  beforeEach(() => {
    clock = 1_000;
    resetMetrics();
  });

  describe("effects", () => {
    it("should request localization and play the confirmation cue on the first tick", () => {
      const { localization, cues, step } = setup();

      const result = step();

      expect(result.transitioned).toBe(false);
      expect(localization.requestLocalize).toHaveBeenCalledTimes(1);
      expect(cues.enqueue).toHaveBeenCalledWith("confirmation");
    });

    it("should send the pickup goal once localized", () => {
      const { machine, navigation, step } = setup();

      step();
      machine.inbox.setLocalized();
      const result = step();

      expect(result.to).toBe("GotoPickup");
      expect(navigation.request).toHaveBeenCalledTimes(1);
      expect(navigation.request).toHaveBeenCalledWith({
        id: "nav-1",
        target: "kitchen",
        approachMode: "on",
        retryBudget: 3,
        timeoutSeconds: 300,
        minApproachDistance: 0,
      });
      expect(getMetricsSnapshot().counters).toMatchObject({ ticksTotal: 2, transitionsTotal: 1 });
    });

    it("should report order results through the order reporter", () => {
      const { machine, orders, step } = setup();

      step();
      machine.inbox.setLocalized();
      step();
      machine.inbox.setNavigationOutcome("nav-1", true, "Arrived at kitchen");
      step();
      machine.inbox.setOrderRequest("table-1");
      step();
      machine.inbox.setNavigationOutcome("nav-2", false, "No path to table-1 after 3 retries");
      const result = step();

      expect(result.to).toBe("Error");
      expect(orders.reportResult).toHaveBeenCalledTimes(1);
      expect(orders.reportResult).toHaveBeenCalledWith(
        "order-1",
        false,
        "Delivery failed: No path to table-1 after 3 retries",
      );
      expect(getMetricsSnapshot().counters.navigationFailures).toBe(1);
    });

    it("should keep executing effects after one fails", () => {
      const { localization, cues, logger, step } = setup();
      localization.requestLocalize.mockImplementation(() => {
        throw new Error("localizer offline");
      });

      step();

      expect(cues.enqueue).toHaveBeenCalledWith("confirmation");
      expect(getMetricsSnapshot().counters.effectFailures).toBe(1);
      expect(logger.error).toHaveBeenCalledWith("Effect failed", expect.any(RobotError), {
        effect: "localize",
      });
    });

    it("should move to Error when localization cannot be requested and retry after re-init", () => {
      const { machine, localization, cues, step } = setup();
      localization.requestLocalize.mockImplementationOnce(() => {
        throw new Error("localizer offline");
      });

      step();
      const failed = step();

      expect(failed).toMatchObject({ from: "Initialization", to: "Error", trigger: "localizationFailed" });
      expect(cues.enqueue).toHaveBeenCalledWith("failure");
      expect(getMetricsSnapshot().counters.navigationFailures).toBe(0);

      machine.inbox.setGreenEdge();
      step();
      step();

      expect(localization.requestLocalize).toHaveBeenCalledTimes(2);
      expect(machine.getSnapshot().state).toBe("Initialization");
    });

    it("should fail the goal when the navigation request throws", () => {
      const { machine, navigation, orders, step } = setup();
      navigation.request.mockImplementation(() => {
        throw new Error("planner unavailable");
      });

      step();
      machine.inbox.setLocalized();
      expect(step().to).toBe("GotoPickup");
      const failed = step();

      expect(failed).toMatchObject({ from: "GotoPickup", to: "Error", trigger: "navigationFailed" });
      expect(orders.reportResult).not.toHaveBeenCalled();
      expect(getMetricsSnapshot().counters).toMatchObject({ effectFailures: 1, navigationFailures: 1 });
    });

    it("should fail the drop-off goal and its order when the request throws", () => {
      const { machine, navigation, orders, step } = setup();

      step();
      machine.inbox.setLocalized();
      step();
      machine.inbox.setNavigationOutcome("nav-1", true, "Arrived at kitchen");
      step();
      navigation.request.mockImplementation(() => {
        throw new Error("planner unavailable");
      });
      machine.inbox.setOrderRequest("table-1");
      step();
      const failed = step();

      expect(failed.to).toBe("Error");
      expect(orders.reportResult).toHaveBeenCalledWith(
        "order-1",
        false,
        "Delivery failed: Navigation request failed: planner unavailable",
      );
    });

    it("should fail a goal the navigation service answers with another handle", () => {
      const { machine, navigation, logger, step } = setup();
      navigation.request.mockReturnValue("server-42");

      step();
      machine.inbox.setLocalized();
      step();
      machine.inbox.setNavigationOutcome("server-42", true, "Arrived at kitchen");
      const failed = step();

      expect(failed).toMatchObject({ from: "GotoPickup", to: "Error", trigger: "navigationFailed" });
      expect(logger.error).toHaveBeenCalledWith("Effect failed", expect.any(RobotError), {
        effect: "navigate",
      });
    });

    it("should warn when a cue is dropped", () => {
      const { logger, step } = setup({ cues: { enqueue: vi.fn(() => false) } });

      step();

      expect(logger.warn).toHaveBeenCalledWith("Cue dropped", { cue: "confirmation" });
    });
  });

  describe("feedback", () => {
    it("should publish status and indicators on the fourth tick", () => {
      const { status, feedback, step } = setup();

      step();
      step();
      step();
      expect(status.publish).not.toHaveBeenCalled();

      step();

      expect(status.publish).toHaveBeenCalledWith("Initialization");
      expect(feedback.setIndicator).toHaveBeenCalledWith("led1", "off");
      expect(feedback.setIndicator).toHaveBeenCalledWith("led2", "green");
    });

    it("should alternate the indicators every emission", () => {
      const { feedback, step } = setup();

      for (let i = 0; i < 9; i++) step();

      expect(feedback.setIndicator.mock.calls).toEqual([
        ["led1", "off"],
        ["led2", "green"],
        ["led1", "green"],
        ["led2", "off"],
      ]);
    });

    it("should report progress only while an order is active", () => {
      const { machine, orders, step } = setup();

      step();
      machine.inbox.setLocalized();
      step();
      machine.inbox.setNavigationOutcome("nav-1", true, "Arrived at kitchen");
      step();
      machine.inbox.setOrderRequest("table-1");
      step();

      expect(orders.reportProgress).toHaveBeenCalledTimes(1);
      expect(orders.reportProgress).toHaveBeenCalledWith("order-1", "Status : GotoDropoff  []");
    });

    it("should log indicator failures", async () => {
      const { logger, step } = setup({
        feedback: { setIndicator: vi.fn(() => Promise.reject(new Error("led driver"))) },
      });

      for (let i = 0; i < 4; i++) step();

      await vi.waitFor(() => {
        expect(logger.error).toHaveBeenCalledTimes(2);
      });
      expect(logger.error).toHaveBeenCalledWith("Indicator update failed", new Error("led driver"), {
        channel: "led1",
        color: "off",
      });
    });
  });

  describe("loop", () => {
    beforeEach(() => {
      vi.useFakeTimers();
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it("should tick at the configured interval until stopped", () => {
      const { controller, machine } = setup({ now: Date.now });

      controller.start();
      expect(controller.isRunning()).toBe(true);
      expect(controller.getLastTickAt()).toBeNull();

      vi.advanceTimersByTime(TICK_MS * 3);
      expect(machine.getTickCount()).toBe(3);
      expect(controller.getLastTickAt()).toBe(Date.now());

      controller.stop();
      vi.advanceTimersByTime(TICK_MS * 3);

      expect(controller.isRunning()).toBe(false);
      expect(machine.getTickCount()).toBe(3);
    });

    it("should ignore a second start", () => {
      const { controller, machine } = setup({ now: Date.now });

      controller.start();
      controller.start();
      vi.advanceTimersByTime(TICK_MS);

      expect(machine.getTickCount()).toBe(1);
      controller.stop();
    });
  });
});
