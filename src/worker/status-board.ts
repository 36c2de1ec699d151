import type { StatusChannel } from "@/adapters/types";
import type { RobotState } from "@/domains/delivery";

export interface StatusSnapshot {
  status: RobotState | null;
  publishedAt: Date | null;
  publishCount: number;
}

export interface StatusBoard extends StatusChannel {
  getSnapshot(): StatusSnapshot;
}

/**
 * Status channel that keeps the latest published state for HTTP readers.
 */
export const createStatusBoard = (): StatusBoard => {
  let snapshot: StatusSnapshot = { status: null, publishedAt: null, publishCount: 0 };

  return {
    publish: (status: RobotState): void => {
      snapshot = { status, publishedAt: new Date(), publishCount: snapshot.publishCount + 1 };
    },
    getSnapshot: (): StatusSnapshot => snapshot,
  };
};
