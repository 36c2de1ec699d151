import { describe, expect, it, vi } from "vitest";

import { createMockLogger } from "@/lib/logger/testing";

import { createButtonInput } from "./button-input";

describe("createButtonInput", () => {
  const setup = () => {
    const inbox = { setGreenEdge: vi.fn() };
    const logger = createMockLogger();
    return { inbox, logger, input: createButtonInput({ inbox, logger }) };
  };

  it("should only prime on the first sample", () => {
    const { inbox, input } = setup();

    expect(input.handleSample({ green: true, red: false })).toBeNull();
    expect(inbox.setGreenEdge).not.toHaveBeenCalled();
  });

  it("should signal a green rising edge once", () => {
    const { inbox, input } = setup();

    input.handleSample({ green: false, red: false });
    input.handleSample({ green: true, red: false });
    input.handleSample({ green: true, red: false });

    expect(inbox.setGreenEdge).toHaveBeenCalledTimes(1);
  });

  it("should not signal on release", () => {
    const { inbox, input } = setup();

    input.handleSample({ green: true, red: false });
    const edge = input.handleSample({ green: false, red: false });

    expect(edge).toEqual({ greenPressed: false, redPressed: false });
    expect(inbox.setGreenEdge).not.toHaveBeenCalled();
  });

  it("should only log red presses", () => {
    const { inbox, logger, input } = setup();

    input.handleSample({ green: false, red: false });
    input.handleSample({ green: false, red: true });

    expect(inbox.setGreenEdge).not.toHaveBeenCalled();
    expect(logger.debug).toHaveBeenCalledWith("Red button pressed");
  });
});
