export type { ButtonEdge, ButtonEdgeDetector, ButtonSample } from "./buttons";
export { buttonSampleSchema, createButtonEdgeDetector } from "./buttons";

export type { DeliveryConfig } from "./config";
export { DEFAULT_DELIVERY_CONFIG } from "./config";

export type { OrderRejectCode, RobotErrorCode } from "./errors";
export { ORDER_REJECT_MESSAGES, RobotError } from "./errors";

export type {
  EventInbox,
  MachineView,
  NavigationOutcome,
  NavigationProgress,
  OrderDecision,
} from "./inbox";
export { createEventInbox } from "./inbox";

export type {
  BlinkPhase,
  FeedbackCadence,
  FeedbackFrame,
  IndicatorChannel,
  IndicatorColor,
} from "./indicators";
export {
  createFeedbackCadence,
  formatOrderProgress,
  nextBlinkPhase,
  renderFeedback,
  renderIndicators,
} from "./indicators";

export type { DeliveryMachine, DeliveryMachineDeps, StartState } from "./machine";
export {
  createDeliveryMachine,
  createInitialMachineState,
  DELIVERY_SUCCESS_MESSAGE,
  formatProgress,
} from "./machine";

export type { StateTransition, TransitionLog, TransitionTrigger } from "./transitions";
export { createTransitionLog } from "./transitions";

export type {
  ApproachMode,
  Cue,
  DeliveryOrder,
  Effect,
  InFlightNavigation,
  Location,
  MachineState,
  NavigationGoal,
  RobotState,
  TickResult,
} from "./types";
export { CUES, isRobotState, ROBOT_STATES, robotStateSchema } from "./types";
