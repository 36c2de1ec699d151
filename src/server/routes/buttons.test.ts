import { describe, expect, it, vi } from "vitest";

import { createButtonsRoute } from "./buttons";

const postJson = (body: unknown): Request =>
  new Request("http://localhost/", {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(body),
  });

describe("buttons route", () => {
  it("should forward a raw sample", async () => {
    const buttons = { handleSample: vi.fn(() => null) };
    const app = createButtonsRoute(buttons);

    const res = await app.fetch(postJson({ green: true, red: false }));

    expect(res.status).toBe(204);
    expect(buttons.handleSample).toHaveBeenCalledWith({ green: true, red: false });
  });

  it("should return 400 for an invalid sample", async () => {
    const buttons = { handleSample: vi.fn(() => null) };
    const app = createButtonsRoute(buttons);

    const res = await app.fetch(postJson({ green: "yes" }));

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "Expected { green: boolean, red: boolean }" });
    expect(buttons.handleSample).not.toHaveBeenCalled();
  });
});
