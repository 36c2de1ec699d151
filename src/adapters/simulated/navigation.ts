/**
 * Simulated navigation service.
 *
 * Stand-in for the real navigation stack: waypoints sit on a line at a fixed
 * distance from the pickup point and the robot moves at constant speed.
 * Blocked attempts can be configured per location to exercise the retry
 * path: each one emits a retry progress notification and backs off until the
 * goal's retry budget is spent.
 */

import { RobotError } from "@/domains/delivery/errors";
import type { Location, NavigationGoal } from "@/domains/delivery/types";
import { type BackoffConfig, DEFAULT_BACKOFF_CONFIG, calculateBackoffMs } from "@/lib/backoff";
import type { Logger } from "@/lib/logger";

import type { NavigationListener, NavigationService } from "../types";

export interface SimulatedNavigationConfig {
  /** Position of each waypoint along the route, in metres. */
  locations: Record<Location, number>;
  startLocation: Location;
  speedMps: number;
  listener: NavigationListener;
  logger: Logger;
  /** Progress notification period (default: 1000ms) */
  progressIntervalMs?: number;
  /** Number of blocked attempts the next goals to a location run into. */
  obstacles?: Record<Location, number>;
  backoff?: BackoffConfig;
}

export interface SimulatedNavigation extends NavigationService {
  getLocation(): Location;
  /** Block the next `attempts` moves towards `location`. */
  addObstacle(location: Location, attempts: number): void;
}

interface ActiveGoal {
  goal: NavigationGoal;
  remaining: number;
  retries: number;
  startedAt: number;
  timer: NodeJS.Timeout | null;
}

const roundMetres = (value: number): number => Math.round(value * 100) / 100;

export const createSimulatedNavigation = (
  config: SimulatedNavigationConfig,
): SimulatedNavigation => {
  const { locations, speedMps, listener, logger, backoff = DEFAULT_BACKOFF_CONFIG } = config;
  const progressIntervalMs = config.progressIntervalMs ?? 1000;
  const obstacles = new Map<Location, number>(Object.entries(config.obstacles ?? {}));

  let location = config.startLocation;
  let active: ActiveGoal | null = null;

  const finish = (run: ActiveGoal, success: boolean, message: string): void => {
    if (run.timer) clearTimeout(run.timer);
    if (active === run) active = null;
    if (success) location = run.goal.target;
    logger.info("Navigation finished", { handle: run.goal.id, success, message });
    listener.onTerminal(run.goal.id, success, message);
  };

  const schedule = (run: ActiveGoal, delayMs: number): void => {
    run.timer = setTimeout(() => {
      advance(run);
    }, delayMs);
  };

  const advance = (run: ActiveGoal): void => {
    const { goal } = run;

    if (Date.now() - run.startedAt > goal.timeoutSeconds * 1000) {
      finish(run, false, `Timed out after ${goal.timeoutSeconds}s`);
      return;
    }

    const blocked = obstacles.get(goal.target) ?? 0;
    if (blocked > 0) {
      obstacles.set(goal.target, blocked - 1);
      run.retries++;
      if (run.retries > goal.retryBudget) {
        finish(run, false, `No path to ${goal.target} after ${goal.retryBudget} retries`);
        return;
      }
      listener.onProgress(
        goal.id,
        roundMetres(run.remaining),
        `Path blocked, retry ${run.retries}/${goal.retryBudget}`,
        true,
      );
      schedule(run, calculateBackoffMs(run.retries - 1, backoff));
      return;
    }

    run.remaining = Math.max(0, run.remaining - (speedMps * progressIntervalMs) / 1000);
    if (run.remaining <= goal.minApproachDistance) {
      finish(run, true, `Arrived at ${goal.target}`);
      return;
    }

    listener.onProgress(goal.id, roundMetres(run.remaining), "Moving", false);
    schedule(run, progressIntervalMs);
  };

  const request = (goal: NavigationGoal): string => {
    if (active) {
      logger.warn("Goal preempted by a newer one", { previous: active.goal.id, next: goal.id });
      finish(active, false, `Preempted by ${goal.id}`);
    }

    const from = locations[location];
    const to = locations[goal.target];
    const run: ActiveGoal = {
      goal,
      remaining: from !== undefined && to !== undefined ? Math.abs(to - from) : 0,
      retries: 0,
      startedAt: Date.now(),
      timer: null,
    };
    active = run;

    if (to === undefined) {
      const error = new RobotError(`Unknown location: ${goal.target}`, "UNKNOWN_LOCATION");
      logger.warn("Navigation goal rejected", { handle: goal.id, error: error.message });
      run.timer = setTimeout(() => {
        finish(run, false, error.message);
      }, 0);
      return goal.id;
    }

    logger.info("Navigation started", {
      handle: goal.id,
      from: location,
      to: goal.target,
      distance: roundMetres(run.remaining),
    });
    schedule(run, progressIntervalMs);
    return goal.id;
  };

  return {
    request,

    shutdown: (): void => {
      if (active?.timer) clearTimeout(active.timer);
      active = null;
    },

    getLocation: (): Location => location,

    addObstacle: (target: Location, attempts: number): void => {
      obstacles.set(target, (obstacles.get(target) ?? 0) + attempts);
    },
  };
};
