/**
 * Feedback sink that logs what a physical robot would show and play.
 *
 * Cues are resolved to sound files under the configured resource directory,
 * indicator writes are logged only when a channel actually changes colour.
 */

import { join } from "node:path";

import type { Cue, IndicatorChannel, IndicatorColor } from "@/domains/delivery";
import type { Logger } from "@/lib/logger";

import type { FeedbackSink } from "../types";

export const DEFAULT_CUE_FILES: Record<Cue, string> = {
  confirmation: "kaku.wav",
  retry: "moo.wav",
  failure: "angry_cat.wav",
  orderReceived: "kaku.wav",
  arrival: "lion.wav",
  enjoyMeal: "meow.wav",
};

export interface LoggingFeedbackSinkConfig {
  resourcePath: string;
  logger: Logger;
  cueFiles?: Partial<Record<Cue, string>>;
}

export interface LoggingFeedbackSink extends FeedbackSink {
  resolveCue(cue: Cue): string;
  getIndicators(): Readonly<Record<IndicatorChannel, IndicatorColor>>;
}

export const createLoggingFeedbackSink = (config: LoggingFeedbackSinkConfig): LoggingFeedbackSink => {
  const { resourcePath, logger } = config;
  const cueFiles: Record<Cue, string> = { ...DEFAULT_CUE_FILES, ...config.cueFiles };
  const indicators: Record<IndicatorChannel, IndicatorColor> = { led1: "off", led2: "off" };

  const resolveCue = (cue: Cue): string => join(resourcePath, cueFiles[cue]);

  return {
    resolveCue,

    setIndicator: (channel: IndicatorChannel, color: IndicatorColor): void => {
      if (indicators[channel] === color) return;
      indicators[channel] = color;
      logger.debug("Indicator changed", { channel, color });
    },

    playCue: (cue: Cue): void => {
      logger.info("Playing cue", { cue, file: resolveCue(cue) });
    },

    getIndicators: (): Readonly<Record<IndicatorChannel, IndicatorColor>> => ({ ...indicators }),
  };
};
