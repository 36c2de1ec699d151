import type { DeliveryConfig } from "@/domains/delivery/config";
import { DEFAULT_DELIVERY_CONFIG } from "@/domains/delivery/config";
import type { RobotState } from "@/domains/delivery/types";

import type { Env } from "./env";
import type { LogFormat, LogLevel } from "./logger";

export interface SimulationConfig {
  /** Straight-line distance from the pickup point to each known waypoint, in metres. */
  locations: Record<string, number>;
  /** Travel speed in metres per second. */
  speedMps: number;
  localizeDelayMs: number;
}

export interface AppConfig {
  server: {
    port: number;
    nodeEnv: Env["NODE_ENV"];
  };
  logging: {
    level: LogLevel;
    format: LogFormat;
  };
  delivery: DeliveryConfig;
  controlLoop: {
    tickIntervalMs: number;
    feedbackEveryTicks: number;
    /** Health turns unhealthy once the last tick is older than this. */
    staleAfterMs: number;
    startState: Extract<RobotState, "Initialization" | "Error">;
  };
  feedback: {
    resourcePath: string;
  };
  simulation: SimulationConfig;
}

const DEFAULT_SIM_LOCATIONS = "kitchen:0,table-1:6,table-2:8,table-3:10,table-4:12";

/**
 * Parse `name:metres` pairs, e.g. `kitchen:0,table-3:10`.
 */
export const parseLocations = (raw: string): Record<string, number> => {
  const locations: Record<string, number> = {};
  for (const pair of raw.split(",")) {
    const [name, metres] = pair.split(":").map((part) => part.trim());
    const distance = Number(metres);
    if (!name || metres === undefined || metres === "" || !Number.isFinite(distance) || distance < 0) {
      throw new Error(`Invalid location entry "${pair}", expected name:metres`);
    }
    locations[name] = distance;
  }
  return locations;
};

/**
 * Build the immutable application configuration from a validated environment.
 */
export const loadConfig = (env: Env): Readonly<AppConfig> => {
  const tickHz = env.TICK_HZ ?? 10;
  const tickIntervalMs = Math.round(1000 / tickHz);

  const config: AppConfig = {
    server: {
      port: env.PORT ?? 8080,
      nodeEnv: env.NODE_ENV,
    },
    logging: {
      level: env.LOG_LEVEL ?? (env.NODE_ENV === "production" ? "info" : "debug"),
      format: env.NODE_ENV === "development" ? "pretty" : "json",
    },
    delivery: {
      pickupLocation: env.PICKUP_LOCATION ?? DEFAULT_DELIVERY_CONFIG.pickupLocation,
      navRetry: env.NAV_RETRY ?? DEFAULT_DELIVERY_CONFIG.navRetry,
      navPickupTimeoutSeconds: env.NAV_PICKUP_TIMEOUT ?? DEFAULT_DELIVERY_CONFIG.navPickupTimeoutSeconds,
      navDropoffTimeoutSeconds:
        env.NAV_DROPOFF_TIMEOUT ?? DEFAULT_DELIVERY_CONFIG.navDropoffTimeoutSeconds,
      navDropoffDistance: env.NAV_DROPOFF_DISTANCE ?? DEFAULT_DELIVERY_CONFIG.navDropoffDistance,
      returnRetry: env.NAV_RETURN_RETRY ?? DEFAULT_DELIVERY_CONFIG.returnRetry,
      returnTimeoutSeconds: env.NAV_RETURN_TIMEOUT ?? DEFAULT_DELIVERY_CONFIG.returnTimeoutSeconds,
      navTimeoutGraceSeconds: env.NAV_TIMEOUT_GRACE ?? DEFAULT_DELIVERY_CONFIG.navTimeoutGraceSeconds,
      deliverySuccessFlag: env.DELIVERY_SUCCESS_FLAG ?? DEFAULT_DELIVERY_CONFIG.deliverySuccessFlag,
    },
    controlLoop: {
      tickIntervalMs,
      staleAfterMs: Math.max(1000, tickIntervalMs * 20),
      feedbackEveryTicks: env.FEEDBACK_EVERY_TICKS ?? 5,
      startState: env.START_STATE ?? "Initialization",
    },
    feedback: {
      resourcePath: env.RESOURCE_PATH,
    },
    simulation: {
      locations: parseLocations(env.SIM_LOCATIONS ?? DEFAULT_SIM_LOCATIONS),
      speedMps: env.SIM_SPEED ?? 0.5,
      localizeDelayMs: env.SIM_LOCALIZE_MS ?? 2000,
    },
  };

  // Sections are handed out by reference (the machine keeps `delivery`)
  const sections = [
    config.server,
    config.logging,
    config.delivery,
    config.controlLoop,
    config.feedback,
    config.simulation,
    config.simulation.locations,
  ];
  for (const section of sections) {
    Object.freeze(section);
  }

  return Object.freeze(config);
};
