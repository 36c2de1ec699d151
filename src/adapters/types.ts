/**
 * Interfaces of the collaborators around the delivery core.
 *
 * Implementations deliver their callbacks asynchronously; the core only
 * reacts to them on its next tick.
 */

import type {
  Cue,
  IndicatorChannel,
  IndicatorColor,
  NavigationGoal,
  RobotState,
} from "@/domains/delivery";

export interface NavigationListener {
  /** Exactly once per goal. */
  onTerminal(handle: string, success: boolean, message: string): void;
  /** Zero or more times before the terminal call. */
  onProgress(handle: string, distance: number, message: string, retrySignal: boolean): void;
}

export interface NavigationService {
  /**
   * Start travelling to `goal.target`. Returns the handle used in callbacks,
   * which must be `goal.id`; any other handle fails the goal.
   */
  request(goal: NavigationGoal): string;
  /** Stop timers and drop the outstanding goal without reporting it. */
  shutdown(): void;
}

export interface LocalizationListener {
  onLocalized(): void;
}

export interface LocalizationService {
  requestLocalize(): void;
  shutdown(): void;
}

export interface FeedbackSink {
  setIndicator(channel: IndicatorChannel, color: IndicatorColor): void | Promise<void>;
  playCue(cue: Cue): void | Promise<void>;
}

export interface StatusChannel {
  publish(status: RobotState): void;
}

/**
 * Where the core reports on orders it accepted.
 */
export interface OrderReporter {
  reportProgress(orderId: string, text: string): void;
  /** Exactly once per accepted order. */
  reportResult(orderId: string, success: boolean, message: string): void;
}
