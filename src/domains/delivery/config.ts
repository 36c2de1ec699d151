import type { Location } from "./types";

/**
 * Navigation and reporting policy for the delivery cycle.
 */
export interface DeliveryConfig {
  pickupLocation: Location;
  /** Retry budget for the pickup leg after localization and for the drop-off leg. */
  navRetry: number;
  navPickupTimeoutSeconds: number;
  navDropoffTimeoutSeconds: number;
  /** Minimum approach distance at the drop-off point. */
  navDropoffDistance: number;
  /** Retry budget for the return leg after the customer confirms. */
  returnRetry: number;
  returnTimeoutSeconds: number;
  /** Added to a goal's timeout before the watchdog gives up on it. */
  navTimeoutGraceSeconds: number;
  /** `success` value reported to the order gateway when a delivery completes. */
  deliverySuccessFlag: boolean;
}

export const DEFAULT_DELIVERY_CONFIG: DeliveryConfig = {
  pickupLocation: "kitchen",
  navRetry: 3,
  navPickupTimeoutSeconds: 300,
  navDropoffTimeoutSeconds: 300,
  navDropoffDistance: 5,
  returnRetry: 3,
  returnTimeoutSeconds: 300,
  navTimeoutGraceSeconds: 5,
  deliverySuccessFlag: true,
};
