/**
 * In-memory audit trail of robot state transitions.
 */

import { randomUUID } from "node:crypto";

import type { RobotState } from "./types";

export type TransitionTrigger =
  | "localized"
  | "arrived"
  | "orderReceived"
  | "customerConfirmed"
  | "navigationFailed"
  | "navigationTimeout"
  | "localizationFailed"
  | "operatorReinit";

export interface StateTransition {
  id: string;
  timestamp: Date;
  tick: number;
  from: RobotState;
  to: RobotState;
  trigger: TransitionTrigger;
  orderId: string | null;
}

export interface TransitionLog {
  record(params: Omit<StateTransition, "id" | "timestamp">): StateTransition;
  /** Most recent transitions, oldest first. */
  recent(limit?: number): readonly StateTransition[];
  count(): number;
  clear(): void;
}

/**
 * Create a bounded transition log that keeps the last `capacity` entries.
 */
export const createTransitionLog = (capacity = 200): TransitionLog => {
  const transitions: StateTransition[] = [];
  let total = 0;

  return {
    record: (params): StateTransition => {
      const transition: StateTransition = {
        id: randomUUID(),
        timestamp: new Date(),
        ...params,
      };
      transitions.push(transition);
      if (transitions.length > capacity) {
        transitions.shift();
      }
      total++;
      return transition;
    },

    recent: (limit = capacity): readonly StateTransition[] =>
      limit <= 0 ? [] : transitions.slice(-limit),

    count: (): number => total,

    clear: (): void => {
      transitions.length = 0;
      total = 0;
    },
  };
};
