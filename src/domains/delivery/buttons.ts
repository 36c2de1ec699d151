/**
 * Rising-edge detection over the two-channel button input.
 */

import * as v from "valibot";

export const buttonSampleSchema = v.object({
  green: v.boolean(),
  red: v.boolean(),
});

/** Raw digital sample, `true` while the button is held. */
export type ButtonSample = v.InferOutput<typeof buttonSampleSchema>;

export interface ButtonEdge {
  greenPressed: boolean;
  redPressed: boolean;
}

export interface ButtonEdgeDetector {
  /**
   * Feed the next raw sample. Returns null for the first sample, which only
   * primes the detector.
   */
  sample(next: ButtonSample): ButtonEdge | null;
}

export const createButtonEdgeDetector = (): ButtonEdgeDetector => {
  let previous: ButtonSample | null = null;

  return {
    sample: (next: ButtonSample): ButtonEdge | null => {
      const last = previous;
      previous = { green: next.green, red: next.red };
      if (last === null) return null;
      return {
        greenPressed: !last.green && next.green,
        redPressed: !last.red && next.red,
      };
    },
  };
};
