/**
 * Error types for the delivery core and its collaborators.
 */

export type RobotErrorCode =
  | "NOT_AT_PICKUP"
  | "ORDER_IN_PROGRESS"
  | "NAVIGATION_FAILED"
  | "NAVIGATION_TIMEOUT"
  | "UNKNOWN_LOCATION"
  | "EFFECT_FAILED";

export class RobotError extends Error {
  public override readonly name = "RobotError";

  constructor(
    message: string,
    public readonly code: RobotErrorCode,
    public override readonly cause?: unknown,
  ) {
    super(message, { cause });
  }
}

export type OrderRejectCode = Extract<RobotErrorCode, "NOT_AT_PICKUP" | "ORDER_IN_PROGRESS">;

export const ORDER_REJECT_MESSAGES: Record<OrderRejectCode, string> = {
  NOT_AT_PICKUP: "Robot is not at pickup. Ignore the order!",
  ORDER_IN_PROGRESS: "Another order is already in progress",
};
