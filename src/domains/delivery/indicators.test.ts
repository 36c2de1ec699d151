import { describe, expect, it } from "vitest";

import {
  type BlinkPhase,
  createFeedbackCadence,
  nextBlinkPhase,
  renderFeedback,
  renderIndicators,
} from "./indicators";

describe("renderIndicators", () => {
  it("should alternate red and off with period 2 in Error", () => {
    let phase: BlinkPhase = 2;
    const frames = Array.from({ length: 6 }, () => {
      phase = nextBlinkPhase(phase);
      return renderIndicators("Error", phase);
    });

    expect(frames).toEqual([
      { led1: "off", led2: "red" },
      { led1: "red", led2: "off" },
      { led1: "off", led2: "red" },
      { led1: "red", led2: "off" },
      { led1: "off", led2: "red" },
      { led1: "red", led2: "off" },
    ]);
  });

  it("should alternate green and off in every other state", () => {
    for (const state of ["Initialization", "GotoPickup", "AtPickup", "GotoDropoff", "AtDropoff"] as const) {
      expect(renderIndicators(state, 1)).toEqual({ led1: "off", led2: "green" });
      expect(renderIndicators(state, 2)).toEqual({ led1: "green", led2: "off" });
    }
  });
});

describe("renderFeedback", () => {
  it("should include order progress only while an order is active", () => {
    const withOrder = renderFeedback(
      {
        state: "GotoDropoff",
        activeOrder: { id: "order-1", destination: "table-3" },
        lastProgress: "Distance : 2.5, Message : moving",
      },
      2,
    );
    const withoutOrder = renderFeedback(
      { state: "AtPickup", activeOrder: null, lastProgress: "" },
      2,
    );

    expect(withOrder).toEqual({
      status: "GotoDropoff",
      progress: "Status : GotoDropoff  [Distance : 2.5, Message : moving]",
      indicators: { led1: "green", led2: "off" },
    });
    expect(withoutOrder.progress).toBeNull();
    expect(withoutOrder.status).toBe("AtPickup");
  });
});

describe("createFeedbackCadence", () => {
  it("should emit on the 4th tick and every 5th tick after that", () => {
    const cadence = createFeedbackCadence(5);
    const due: number[] = [];

    for (let tick = 1; tick <= 15; tick++) {
      if (cadence.advance() !== null) due.push(tick);
    }

    expect(due).toEqual([4, 9, 14]);
  });

  it("should flip the blink phase on each emission", () => {
    const cadence = createFeedbackCadence(2);
    const phases: BlinkPhase[] = [];

    for (let tick = 0; tick < 8; tick++) {
      const phase = cadence.advance();
      if (phase !== null) phases.push(phase);
    }

    expect(phases).toEqual([1, 2, 1, 2]);
  });
});
