import * as v from "valibot";

import { logLevelSchema } from "../logger/schema";

const numberFromString = (min: number) =>
  v.pipe(v.string(), v.transform(Number), v.number(), v.minValue(min));

const booleanFromString = v.pipe(
  v.picklist(["true", "false"]),
  v.transform((value) => value === "true"),
);

export const envSchema = v.object({
  // Server
  PORT: v.optional(
    v.pipe(v.string(), v.transform(Number), v.number(), v.minValue(1), v.maxValue(65535)),
  ),
  NODE_ENV: v.picklist(["development", "production", "test"]),

  // Logging
  LOG_LEVEL: v.optional(v.pipe(v.string(), logLevelSchema)),

  // Feedback
  RESOURCE_PATH: v.pipe(v.string(), v.minLength(1)),

  // Navigation policy
  PICKUP_LOCATION: v.optional(v.pipe(v.string(), v.minLength(1))),
  NAV_PICKUP_TIMEOUT: v.optional(numberFromString(1)),
  NAV_DROPOFF_TIMEOUT: v.optional(numberFromString(1)),
  NAV_RETRY: v.optional(v.pipe(numberFromString(0), v.integer())),
  NAV_DROPOFF_DISTANCE: v.optional(numberFromString(0)),
  NAV_RETURN_RETRY: v.optional(v.pipe(numberFromString(0), v.integer())),
  NAV_RETURN_TIMEOUT: v.optional(numberFromString(1)),
  NAV_TIMEOUT_GRACE: v.optional(numberFromString(0)),

  // Control loop
  TICK_HZ: v.optional(v.pipe(numberFromString(1), v.maxValue(100))),
  FEEDBACK_EVERY_TICKS: v.optional(v.pipe(numberFromString(1), v.integer())),
  START_STATE: v.optional(v.picklist(["Initialization", "Error"])),
  DELIVERY_SUCCESS_FLAG: v.optional(booleanFromString),

  // Simulated collaborators
  SIM_LOCATIONS: v.optional(v.pipe(v.string(), v.minLength(1))),
  SIM_SPEED: v.optional(numberFromString(0.01)),
  SIM_LOCALIZE_MS: v.optional(numberFromString(0)),
});

export type Env = v.InferOutput<typeof envSchema>;
