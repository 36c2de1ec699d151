/**
 * Serial playback queue for audible cues.
 *
 * The tick hands cues over without waiting; the sink plays them one at a
 * time. When the sink falls behind, new cues are dropped once the queue is
 * full.
 */

import PQueue from "p-queue";

import type { FeedbackSink } from "@/adapters/types";
import type { Cue } from "@/domains/delivery";
import { type Logger, toError } from "@/lib/logger";

export interface CueQueueConfig {
  /** Max cues waiting or playing before new ones are dropped (default: 8) */
  maxQueueSize?: number;
  /** Called when a cue is dropped because the queue is full */
  onDrop?: (cue: Cue, dropped: number) => void;
  /** Called when the sink fails to play a cue */
  onError?: (cue: Cue, error: Error) => void;
}

export interface CueQueue {
  /** Queue a cue; returns false when it was dropped. */
  enqueue(cue: Cue): boolean;
  getQueueSize(): number;
  getDroppedCount(): number;
  waitForIdle(): Promise<void>;
  clear(): void;
}

/**
 * @example
 * ```typescript
 * const cues = createCueQueue(sink, logger, {
 *   onDrop: (cue, n) => logger.warn("Cue dropped", { cue, dropped: n }),
 * });
 * cues.enqueue("arrival");
 * ```
 */
export const createCueQueue = (
  sink: Pick<FeedbackSink, "playCue">,
  logger: Logger,
  config?: CueQueueConfig,
): CueQueue => {
  const { maxQueueSize = 8, onDrop, onError } = config ?? {};

  const queue = new PQueue({ concurrency: 1 });
  let droppedCount = 0;
  let currentQueueSize = 0;

  const enqueue = (cue: Cue): boolean => {
    if (currentQueueSize >= maxQueueSize) {
      droppedCount++;
      onDrop?.(cue, droppedCount);
      return false;
    }

    currentQueueSize++;

    void queue
      .add(async () => {
        try {
          await sink.playCue(cue);
        } finally {
          currentQueueSize--;
        }
      })
      .catch((error: unknown) => {
        const err = toError(error);
        logger.error("Cue playback failed", err, { cue });
        onError?.(cue, err);
      });

    return true;
  };

  return {
    enqueue,
    getQueueSize: (): number => currentQueueSize,
    getDroppedCount: (): number => droppedCount,
    waitForIdle: async (): Promise<void> => {
      await queue.onIdle();
    },
    clear: (): void => {
      queue.clear();
      currentQueueSize = queue.pending;
    },
  };
};
