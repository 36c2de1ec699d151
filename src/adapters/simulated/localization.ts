import type { Logger } from "@/lib/logger";

import type { LocalizationListener, LocalizationService } from "../types";

export interface SimulatedLocalizationConfig {
  delayMs: number;
  listener: LocalizationListener;
  logger: Logger;
}

/**
 * Localization that always succeeds after a fixed delay. Requests made while
 * one is running share its completion.
 */
export const createSimulatedLocalization = (
  config: SimulatedLocalizationConfig,
): LocalizationService => {
  const { delayMs, listener, logger } = config;
  let pending: NodeJS.Timeout | null = null;

  return {
    requestLocalize: (): void => {
      if (pending) return;
      logger.info("Localization requested", { delayMs });
      pending = setTimeout(() => {
        pending = null;
        logger.info("Robot localized");
        listener.onLocalized();
      }, delayMs);
    },

    shutdown: (): void => {
      if (pending) {
        clearTimeout(pending);
        pending = null;
      }
    },
  };
};
