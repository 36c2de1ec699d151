/**
 * Shared types for the delivery state machine.
 */

import * as v from "valibot";

import type { TransitionTrigger } from "./transitions";

/**
 * Operating state of the robot. Exactly one is current; only the tick changes it.
 */
export type RobotState =
  | "Initialization"
  | "GotoPickup"
  | "AtPickup"
  | "GotoDropoff"
  | "AtDropoff"
  | "Error";

export const ROBOT_STATES: readonly RobotState[] = [
  "Initialization",
  "GotoPickup",
  "AtPickup",
  "GotoDropoff",
  "AtDropoff",
  "Error",
] as const;

export const robotStateSchema = v.picklist([
  "Initialization",
  "GotoPickup",
  "AtPickup",
  "GotoDropoff",
  "AtDropoff",
  "Error",
] as const);

export const isRobotState = (value: unknown): value is RobotState => v.is(robotStateSchema, value);

/** Named waypoint understood by the navigation service (e.g. "kitchen", "table-3"). */
export type Location = string;

/** Final-approach behaviour at the target. */
export type ApproachMode = "on" | "near";

export interface NavigationGoal {
  /** Handle used to match callbacks to this goal, `nav-<n>`. */
  id: string;
  target: Location;
  approachMode: ApproachMode;
  retryBudget: number;
  timeoutSeconds: number;
  minApproachDistance: number;
}

export interface InFlightNavigation {
  goal: NavigationGoal;
  issuedAtMs: number;
}

export interface DeliveryOrder {
  id: string;
  destination: Location;
}

/**
 * Audible cues, one per well-defined transition point.
 */
export type Cue = "confirmation" | "retry" | "failure" | "orderReceived" | "arrival" | "enjoyMeal";

export const CUES: readonly Cue[] = [
  "confirmation",
  "retry",
  "failure",
  "orderReceived",
  "arrival",
  "enjoyMeal",
] as const;

/**
 * Side effects produced by a tick and executed by the control loop.
 */
export type Effect =
  | { type: "localize" }
  | { type: "navigate"; goal: NavigationGoal }
  | { type: "cue"; cue: Cue }
  | { type: "orderResult"; orderId: string; success: boolean; message: string };

/**
 * State owned by the tick. Never written from an event-source callback.
 */
export interface MachineState {
  state: RobotState;
  /** Localization already requested for the current stay in Initialization. */
  localizeRequested: boolean;
  /** Order being delivered, from acceptance at pickup until the robot is back. */
  activeOrder: DeliveryOrder | null;
  navigation: InFlightNavigation | null;
  /** Terminal success of the last goal, consumed by the travelling handlers. */
  arrived: boolean;
  /** Latest navigation progress text, e.g. "Distance : 2.5, Message : moving". */
  lastProgress: string;
  navigationSeq: number;
}

export interface TickResult {
  tick: number;
  from: RobotState;
  to: RobotState;
  transitioned: boolean;
  /** What caused the transition, null when the state did not change. */
  trigger: TransitionTrigger | null;
  effects: Effect[];
}
