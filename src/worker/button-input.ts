import {
  type ButtonEdge,
  type ButtonSample,
  type EventInbox,
  createButtonEdgeDetector,
} from "@/domains/delivery";
import type { Logger } from "@/lib/logger";

export interface ButtonInput {
  /** Feed one raw sample; returns the derived edges, or null while priming. */
  handleSample(sample: ButtonSample): ButtonEdge | null;
}

/**
 * Turns raw button samples into inbox events. Only the green button has a
 * meaning for the delivery cycle; red edges are logged.
 */
export const createButtonInput = (deps: {
  inbox: Pick<EventInbox, "setGreenEdge">;
  logger: Logger;
}): ButtonInput => {
  const { inbox, logger } = deps;
  const detector = createButtonEdgeDetector();

  return {
    handleSample: (sample: ButtonSample): ButtonEdge | null => {
      const edge = detector.sample(sample);
      if (!edge) return null;
      if (edge.greenPressed) {
        inbox.setGreenEdge();
      }
      if (edge.redPressed) {
        logger.debug("Red button pressed");
      }
      return edge;
    },
  };
};
