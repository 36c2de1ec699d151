/**
 * Control loop driving the delivery machine.
 *
 * A self-rescheduling timer ticks the machine at a fixed rate, executes the
 * effects each tick returns, and emits status, order progress and indicator
 * feedback every few ticks. Nothing thrown by a collaborator escapes a tick.
 * A localization or navigation request that cannot be started is reported
 * back to the machine, which moves to Error on its next tick.
 */

import type {
  FeedbackSink,
  LocalizationService,
  NavigationService,
  OrderReporter,
  StatusChannel,
} from "@/adapters/types";
import {
  type BlinkPhase,
  type DeliveryMachine,
  type Effect,
  type IndicatorChannel,
  type TickResult,
  RobotError,
  createFeedbackCadence,
  renderFeedback,
} from "@/domains/delivery";
import { type Logger, toError } from "@/lib/logger";
import { incrementMetric } from "@/lib/metrics";

import type { CueQueue } from "./cue-queue";

export interface ControllerDeps {
  machine: DeliveryMachine;
  navigation: NavigationService;
  localization: LocalizationService;
  feedback: Pick<FeedbackSink, "setIndicator">;
  cues: Pick<CueQueue, "enqueue">;
  status: StatusChannel;
  orders: OrderReporter;
  logger: Logger;
  tickIntervalMs: number;
  feedbackEveryTicks: number;
  now?: () => number;
}

export interface Controller {
  start(): void;
  stop(): void;
  /** Run a single tick outside the timer. */
  runOnce(): TickResult;
  isRunning(): boolean;
  /** Wall-clock time of the last completed tick, or null before the first. */
  getLastTickAt(): number | null;
}

const INDICATOR_CHANNELS: readonly IndicatorChannel[] = ["led1", "led2"];

export const createController = (deps: ControllerDeps): Controller => {
  const { machine, navigation, localization, feedback, cues, status, orders, logger } = deps;
  const now = deps.now ?? Date.now;
  const cadence = createFeedbackCadence(deps.feedbackEveryTicks);
  const slowTickWarnMs = deps.tickIntervalMs;

  let tickTimeout: NodeJS.Timeout | null = null;
  let running = false;
  let lastTickAt: number | null = null;

  const executeEffect = (effect: Effect): void => {
    switch (effect.type) {
      case "localize":
        localization.requestLocalize();
        return;
      case "navigate": {
        const handle = navigation.request(effect.goal);
        logger.info("Navigation goal sent", {
          handle,
          target: effect.goal.target,
          retryBudget: effect.goal.retryBudget,
          timeoutSeconds: effect.goal.timeoutSeconds,
        });
        if (handle !== effect.goal.id) {
          // Callbacks are matched on the goal id, so this goal would never resolve
          throw new RobotError(
            `Navigation service answered with handle ${handle} instead of ${effect.goal.id}`,
            "NAVIGATION_FAILED",
          );
        }
        return;
      }
      case "cue":
        if (!cues.enqueue(effect.cue)) {
          logger.warn("Cue dropped", { cue: effect.cue });
        }
        return;
      case "orderResult":
        orders.reportResult(effect.orderId, effect.success, effect.message);
        return;
    }
  };

  /** Feed a failed request back so the machine leaves the state waiting on it. */
  const reportEffectFailure = (effect: Effect, error: Error): void => {
    switch (effect.type) {
      case "localize":
        machine.inbox.setLocalizationFailed(error.message);
        return;
      case "navigate":
        machine.inbox.setNavigationOutcome(
          effect.goal.id,
          false,
          `Navigation request failed: ${error.message}`,
        );
        return;
      case "cue":
      case "orderResult":
        return;
    }
  };

  const runEffects = (effects: readonly Effect[]): void => {
    for (const effect of effects) {
      try {
        executeEffect(effect);
      } catch (error) {
        incrementMetric("effectFailures");
        const cause = toError(error);
        const err = new RobotError(`Effect ${effect.type} failed`, "EFFECT_FAILED", cause);
        logger.error("Effect failed", err, { effect: effect.type });
        reportEffectFailure(effect, cause);
      }
    }
  };

  const emitFeedback = (phase: BlinkPhase): void => {
    const snapshot = machine.getSnapshot();
    const frame = renderFeedback(snapshot, phase);

    try {
      status.publish(frame.status);
      if (frame.progress !== null && snapshot.activeOrder) {
        orders.reportProgress(snapshot.activeOrder.id, frame.progress);
      }
    } catch (error) {
      incrementMetric("effectFailures");
      logger.error("Feedback publish failed", toError(error), { status: frame.status });
    }

    for (const channel of INDICATOR_CHANNELS) {
      const color = frame.indicators[channel];
      const run = async (): Promise<void> => {
        await feedback.setIndicator(channel, color);
      };
      void run().catch((error: unknown) => {
        incrementMetric("effectFailures");
        logger.error("Indicator update failed", toError(error), { channel, color });
      });
    }
  };

  const runOnce = (): TickResult => {
    const result = machine.tick(now());
    incrementMetric("ticksTotal");

    if (result.transitioned) {
      incrementMetric("transitionsTotal");
      if (result.trigger === "navigationFailed" || result.trigger === "navigationTimeout") {
        incrementMetric("navigationFailures");
      }
    }

    runEffects(result.effects);

    const phase = cadence.advance();
    if (phase !== null) {
      emitFeedback(phase);
    }

    lastTickAt = now();
    return result;
  };

  const scheduleNextTick = (): void => {
    if (!running) return;
    tickTimeout = setTimeout(() => {
      const startMs = performance.now();
      try {
        runOnce();
      } catch (error) {
        logger.error("Tick failed", toError(error));
      } finally {
        const latencyMs = performance.now() - startMs;
        if (latencyMs > slowTickWarnMs) {
          logger.warn("Tick took too long", { latencyMs });
        }
        scheduleNextTick();
      }
    }, deps.tickIntervalMs);
  };

  return {
    start: (): void => {
      if (running) return;
      running = true;
      scheduleNextTick();
      logger.info("Control loop started", {
        tickIntervalMs: deps.tickIntervalMs,
        state: machine.getSnapshot().state,
      });
    },
    stop: (): void => {
      running = false;
      if (tickTimeout !== null) {
        clearTimeout(tickTimeout);
        tickTimeout = null;
      }
      logger.info("Control loop stopped", { ticks: machine.getTickCount() });
    },
    runOnce,
    isRunning: (): boolean => running,
    getLastTickAt: (): number | null => lastTickAt,
  };
};
