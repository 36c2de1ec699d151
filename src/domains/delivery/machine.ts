/**
 * Delivery state machine.
 *
 * One `tick()` per control-loop cycle. Each tick drains the event inbox in a
 * fixed order (navigation progress, terminal result, localization failure,
 * timeout watchdog, operator re-initialization) and then runs the handler of the current
 * state. The first transition ends the tick, so the state changes at most
 * once per call. Handlers never perform I/O: they return effects that the
 * control loop executes.
 */

import type { Logger } from "@/lib/logger";

import type { DeliveryConfig } from "./config";
import { type EventInbox, type MachineView, createEventInbox } from "./inbox";
import { type TransitionLog, type TransitionTrigger, createTransitionLog } from "./transitions";
import type {
  Effect,
  Location,
  MachineState,
  NavigationGoal,
  RobotState,
  TickResult,
} from "./types";

export const DELIVERY_SUCCESS_MESSAGE = "Delivery Success!";

export type StartState = Extract<RobotState, "Initialization" | "Error">;

export interface DeliveryMachineDeps {
  config: DeliveryConfig;
  logger: Logger;
  startState?: StartState;
  transitionLog?: TransitionLog;
  generateOrderId?: () => string;
}

export interface DeliveryMachine {
  /** Writer side for event sources. */
  readonly inbox: EventInbox;
  readonly transitions: TransitionLog;
  tick(nowMs: number): TickResult;
  getSnapshot(): Readonly<MachineState>;
  getTickCount(): number;
}

interface HandlerContext {
  machine: Readonly<MachineState>;
  inbox: EventInbox;
  config: DeliveryConfig;
  nowMs: number;
}

interface HandlerOutcome {
  machine: MachineState;
  effects: Effect[];
  trigger?: TransitionTrigger;
}

type StateHandler = (ctx: HandlerContext) => HandlerOutcome;

type GoalParams = Omit<NavigationGoal, "id">;

export const createInitialMachineState = (state: StartState = "Initialization"): MachineState => ({
  state,
  localizeRequested: false,
  activeOrder: null,
  navigation: null,
  arrived: false,
  lastProgress: "",
  navigationSeq: 0,
});

export const formatProgress = (distance: number, message: string): string =>
  `Distance : ${distance}, Message : ${message}`;

const unchanged = (machine: Readonly<MachineState>): HandlerOutcome => ({
  machine: { ...machine },
  effects: [],
});

const isNavigationIdle = (machine: Readonly<MachineState>): boolean => machine.navigation === null;

/**
 * Allocate a handle for a new goal and register it with the inbox before the
 * service is called, so an early callback still matches.
 */
const issueGoal = (
  ctx: HandlerContext,
  machine: MachineState,
  params: GoalParams,
): { machine: MachineState; effect: Effect } => {
  const navigationSeq = machine.navigationSeq + 1;
  const goal: NavigationGoal = { id: `nav-${navigationSeq}`, ...params };
  ctx.inbox.expectNavigation(goal.id);
  return {
    machine: {
      ...machine,
      navigationSeq,
      navigation: { goal, issuedAtMs: ctx.nowMs },
      arrived: false,
    },
    effect: { type: "navigate", goal },
  };
};

const pickupGoal = (
  pickupLocation: Location,
  retryBudget: number,
  timeoutSeconds: number,
): GoalParams => ({
  target: pickupLocation,
  approachMode: "on",
  retryBudget,
  timeoutSeconds,
  minApproachDistance: 0,
});

const handleInitialization: StateHandler = (ctx) => {
  let machine: MachineState = { ...ctx.machine };
  const effects: Effect[] = [];

  if (!machine.localizeRequested) {
    // A completion left over from an earlier stay must not count
    ctx.inbox.takeLocalized();
    effects.push({ type: "localize" }, { type: "cue", cue: "confirmation" });
    machine.localizeRequested = true;
  }

  if (!isNavigationIdle(machine) || !ctx.inbox.takeLocalized()) {
    return { machine, effects };
  }

  const { config } = ctx;
  const issued = issueGoal(
    ctx,
    { ...machine, localizeRequested: false },
    pickupGoal(config.pickupLocation, config.navRetry, config.navPickupTimeoutSeconds),
  );
  machine = { ...issued.machine, state: "GotoPickup" };
  effects.push(issued.effect);
  return { machine, effects, trigger: "localized" };
};

const handleGotoPickup: StateHandler = (ctx) => {
  if (!ctx.machine.arrived) return unchanged(ctx.machine);

  const effects: Effect[] = [];
  const { activeOrder } = ctx.machine;
  if (activeOrder) {
    effects.push({
      type: "orderResult",
      orderId: activeOrder.id,
      success: ctx.config.deliverySuccessFlag,
      message: DELIVERY_SUCCESS_MESSAGE,
    });
  }
  effects.push({ type: "cue", cue: "arrival" });

  return {
    machine: { ...ctx.machine, state: "AtPickup", arrived: false, activeOrder: null },
    effects,
    trigger: "arrived",
  };
};

const handleAtPickup: StateHandler = (ctx) => {
  if (!isNavigationIdle(ctx.machine)) return unchanged(ctx.machine);

  const order = ctx.inbox.takePendingOrder();
  if (!order) return unchanged(ctx.machine);

  const { config } = ctx;
  const issued = issueGoal(
    ctx,
    { ...ctx.machine, activeOrder: order },
    {
      target: order.destination,
      approachMode: "on",
      retryBudget: config.navRetry,
      timeoutSeconds: config.navDropoffTimeoutSeconds,
      minApproachDistance: config.navDropoffDistance,
    },
  );

  return {
    machine: { ...issued.machine, state: "GotoDropoff", lastProgress: "" },
    effects: [issued.effect, { type: "cue", cue: "orderReceived" }],
    trigger: "orderReceived",
  };
};

const handleGotoDropoff: StateHandler = (ctx) => {
  if (!ctx.machine.arrived) return unchanged(ctx.machine);

  return {
    machine: { ...ctx.machine, state: "AtDropoff", arrived: false },
    effects: [{ type: "cue", cue: "arrival" }],
    trigger: "arrived",
  };
};

const handleAtDropoff: StateHandler = (ctx) => {
  if (!isNavigationIdle(ctx.machine) || !ctx.inbox.takeConfirmation()) {
    return unchanged(ctx.machine);
  }

  const { config } = ctx;
  const issued = issueGoal(
    ctx,
    { ...ctx.machine },
    pickupGoal(config.pickupLocation, config.returnRetry, config.returnTimeoutSeconds),
  );

  return {
    machine: { ...issued.machine, state: "GotoPickup" },
    effects: [{ type: "cue", cue: "enjoyMeal" }, issued.effect],
    trigger: "customerConfirmed",
  };
};

// Leaving Error is handled at tick start, before any handler runs
const handleError: StateHandler = (ctx) => unchanged(ctx.machine);

const STATE_HANDLERS: Record<RobotState, StateHandler> = {
  Initialization: handleInitialization,
  GotoPickup: handleGotoPickup,
  AtPickup: handleAtPickup,
  GotoDropoff: handleGotoDropoff,
  AtDropoff: handleAtDropoff,
  Error: handleError,
};

/**
 * Force the Error state. Any order the robot was carrying, or had accepted
 * but not yet started, gets its terminal failure result here.
 */
const enterError = (
  machine: Readonly<MachineState>,
  inbox: EventInbox,
  reason: string,
): { machine: MachineState; effects: Effect[] } => {
  const effects: Effect[] = [{ type: "cue", cue: "failure" }];
  const message = `Delivery failed: ${reason}`;

  if (machine.activeOrder) {
    effects.push({ type: "orderResult", orderId: machine.activeOrder.id, success: false, message });
  }
  const pending = inbox.takePendingOrder();
  if (pending) {
    effects.push({ type: "orderResult", orderId: pending.id, success: false, message });
  }

  return {
    machine: {
      ...machine,
      state: "Error",
      localizeRequested: false,
      activeOrder: null,
      navigation: null,
      arrived: false,
    },
    effects,
  };
};

/**
 * Create a delivery state machine together with its event inbox.
 */
export const createDeliveryMachine = (deps: DeliveryMachineDeps): DeliveryMachine => {
  const { config, logger, startState = "Initialization" } = deps;
  const transitions = deps.transitionLog ?? createTransitionLog();

  let machine = createInitialMachineState(startState);
  let tickCount = 0;

  const view = (): MachineView => ({
    state: machine.state,
    hasActiveOrder: machine.activeOrder !== null,
  });

  const inbox = createEventInbox({
    view,
    logger: logger.child("inbox"),
    generateOrderId: deps.generateOrderId,
  });

  /**
   * Apply everything that may preempt the state handler. Returns the trigger
   * when one of them forced a transition.
   */
  const applyInterrupts = (
    current: MachineState,
    effects: Effect[],
    nowMs: number,
  ): { machine: MachineState; trigger?: TransitionTrigger } => {
    let next = current;

    const progress = inbox.takeNavigationFeedback();
    if (progress) {
      next = { ...next, lastProgress: formatProgress(progress.distance, progress.message) };
      logger.debug("Navigation progress", { handle: progress.handle, progress: next.lastProgress });
      for (let i = 0; i < progress.retrySignals; i++) {
        effects.push({ type: "cue", cue: "retry" });
      }
    }

    const outcome = inbox.takeNavigationOutcome();
    if (outcome && next.navigation?.goal.id === outcome.handle) {
      logger.info("Navigation result", {
        handle: outcome.handle,
        success: outcome.success,
        message: outcome.message,
      });
      next = { ...next, navigation: null };
      if (outcome.success) {
        next = { ...next, arrived: true };
      } else if (next.state !== "Error") {
        const failed = enterError(next, inbox, outcome.message);
        effects.push(...failed.effects);
        return { machine: failed.machine, trigger: "navigationFailed" };
      }
    }

    const localizationFailure = inbox.takeLocalizationFailure();
    if (localizationFailure !== null) {
      if (next.state === "Initialization") {
        logger.warn("Localization failed", { message: localizationFailure });
        const failed = enterError(next, inbox, `Localization failed: ${localizationFailure}`);
        effects.push(...failed.effects);
        return { machine: failed.machine, trigger: "localizationFailed" };
      }
      logger.debug("Dropping localization failure outside Initialization", {
        state: next.state,
        message: localizationFailure,
      });
    }

    const inFlight = next.navigation;
    if (inFlight) {
      const { goal, issuedAtMs } = inFlight;
      const limitMs = (goal.timeoutSeconds + config.navTimeoutGraceSeconds) * 1000;
      if (nowMs - issuedAtMs > limitMs) {
        logger.warn("Navigation timed out", { handle: goal.id, target: goal.target });
        inbox.abandonNavigation();
        const failed = enterError(
          next,
          inbox,
          `Navigation to ${goal.target} timed out after ${goal.timeoutSeconds}s`,
        );
        effects.push(...failed.effects);
        return { machine: failed.machine, trigger: "navigationTimeout" };
      }
    }

    if (next.state === "Error" && inbox.takeReinit()) {
      return {
        machine: { ...next, state: "Initialization", localizeRequested: false },
        trigger: "operatorReinit",
      };
    }

    return { machine: next };
  };

  const tick = (nowMs: number): TickResult => {
    tickCount++;
    const from = machine.state;
    const effects: Effect[] = [];

    const interrupted = applyInterrupts(machine, effects, nowMs);
    let next = interrupted.machine;
    let trigger = interrupted.trigger;

    if (next.state === from) {
      const outcome = STATE_HANDLERS[from]({ machine: next, inbox, config, nowMs });
      next = outcome.machine;
      trigger = outcome.trigger;
      effects.push(...outcome.effects);
    }

    const previous = machine;
    machine = next;
    const transitioned = next.state !== from;
    const cause = transitioned && trigger ? trigger : null;

    if (cause) {
      const orderId = next.activeOrder?.id ?? previous.activeOrder?.id ?? null;
      transitions.record({ tick: tickCount, from, to: next.state, trigger: cause, orderId });
      logger.info("State transition", { tick: tickCount, from, to: next.state, trigger: cause, orderId });
    }

    return { tick: tickCount, from, to: next.state, transitioned, trigger: cause, effects };
  };

  return {
    inbox,
    transitions,
    tick,
    getSnapshot: (): Readonly<MachineState> => machine,
    getTickCount: (): number => tickCount,
  };
};
