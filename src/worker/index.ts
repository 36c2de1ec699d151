import {
  createLoggingFeedbackSink,
  createSimulatedLocalization,
  createSimulatedNavigation,
} from "@/adapters";
import { type DeliveryMachine, createDeliveryMachine } from "@/domains/delivery";
import type { AppConfig } from "@/lib/config";
import type { Logger } from "@/lib/logger";

import { type ButtonInput, createButtonInput } from "./button-input";
import { type Controller, createController } from "./controller";
import { createCueQueue } from "./cue-queue";
import { type OrderDesk, createOrderDesk } from "./order-desk";
import { type StatusBoard, createStatusBoard } from "./status-board";

export interface WorkerConfig {
  config: Readonly<AppConfig>;
  logger: Logger;
}

export interface Worker {
  machine: DeliveryMachine;
  controller: Controller;
  orders: OrderDesk;
  status: StatusBoard;
  buttons: ButtonInput;
  shutdown: () => Promise<void>;
}

/**
 * Wire the delivery machine to the simulated robot and start the control loop.
 */
export const startWorker = async (workerConfig: WorkerConfig): Promise<Worker> => {
  const { config, logger } = workerConfig;

  const machine = createDeliveryMachine({
    config: config.delivery,
    logger: logger.child("state-machine"),
    startState: config.controlLoop.startState,
  });
  const { inbox } = machine;

  const navigation = createSimulatedNavigation({
    locations: config.simulation.locations,
    startLocation: config.delivery.pickupLocation,
    speedMps: config.simulation.speedMps,
    logger: logger.child("navigation"),
    listener: {
      onTerminal: (handle, success, message) => inbox.setNavigationOutcome(handle, success, message),
      onProgress: (handle, distance, message, retrySignal) =>
        inbox.setNavigationFeedback(handle, distance, message, retrySignal),
    },
  });

  const localization = createSimulatedLocalization({
    delayMs: config.simulation.localizeDelayMs,
    logger: logger.child("localization"),
    listener: { onLocalized: () => inbox.setLocalized() },
  });

  const sink = createLoggingFeedbackSink({
    resourcePath: config.feedback.resourcePath,
    logger: logger.child("feedback"),
  });
  const cues = createCueQueue(sink, logger.child("cues"));

  const orders = createOrderDesk({ inbox, logger: logger.child("orders") });
  const status = createStatusBoard();
  const buttons = createButtonInput({ inbox, logger: logger.child("buttons") });

  const controller = createController({
    machine,
    navigation,
    localization,
    feedback: sink,
    cues,
    status,
    orders,
    logger: logger.child("controller"),
    tickIntervalMs: config.controlLoop.tickIntervalMs,
    feedbackEveryTicks: config.controlLoop.feedbackEveryTicks,
  });

  controller.start();

  const shutdown = async (): Promise<void> => {
    logger.info("Worker shutting down...");
    controller.stop();
    navigation.shutdown();
    localization.shutdown();
    cues.clear();
    await cues.waitForIdle();
    logger.info("Worker shutdown complete");
  };

  return { machine, controller, orders, status, buttons, shutdown };
};

export * from "./button-input";
export * from "./controller";
export * from "./cue-queue";
export * from "./order-desk";
export * from "./status-board";
