/**
 * Periodic feedback: status text, order progress and the two-LED blink pattern.
 */

import type { MachineState, RobotState } from "./types";

export type IndicatorChannel = "led1" | "led2";

export type IndicatorColor = "off" | "green" | "red";

/** Alternation phase; flips every emission. */
export type BlinkPhase = 1 | 2;

export interface FeedbackFrame {
  status: RobotState;
  /** Progress line for the order gateway, present only while an order is active. */
  progress: string | null;
  indicators: Record<IndicatorChannel, IndicatorColor>;
}

export const nextBlinkPhase = (phase: BlinkPhase): BlinkPhase => (phase === 1 ? 2 : 1);

/**
 * Pure function of the robot state and the blink phase: red/off while in
 * Error, green/off otherwise, the two LEDs in opposition.
 */
export const renderIndicators = (
  state: RobotState,
  phase: BlinkPhase,
): Record<IndicatorChannel, IndicatorColor> => {
  const color: IndicatorColor = state === "Error" ? "red" : "green";
  return phase === 1 ? { led1: "off", led2: color } : { led1: color, led2: "off" };
};

export const formatOrderProgress = (state: RobotState, lastProgress: string): string =>
  `Status : ${state}  [${lastProgress}]`;

export const renderFeedback = (
  snapshot: Pick<MachineState, "state" | "activeOrder" | "lastProgress">,
  phase: BlinkPhase,
): FeedbackFrame => ({
  status: snapshot.state,
  progress: snapshot.activeOrder ? formatOrderProgress(snapshot.state, snapshot.lastProgress) : null,
  indicators: renderIndicators(snapshot.state, phase),
});

export interface FeedbackCadence {
  /** Advance one tick; returns the blink phase when feedback is due, else null. */
  advance(): BlinkPhase | null;
}

/**
 * Feedback runs every `everyTicks` ticks. The counter starts one step in, so
 * with the default of 5 the first emission lands on the 4th tick.
 */
export const createFeedbackCadence = (everyTicks: number): FeedbackCadence => {
  let counter = Math.min(2, everyTicks);
  let phase: BlinkPhase = 2;

  return {
    advance: (): BlinkPhase | null => {
      counter = (counter % everyTicks) + 1;
      if (counter !== 1) return null;
      phase = nextBlinkPhase(phase);
      return phase;
    },
  };
};
