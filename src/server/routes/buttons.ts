import { Hono } from "hono";
import * as v from "valibot";

import { buttonSampleSchema } from "@/domains/delivery";
import type { ButtonInput } from "@/worker/button-input";

import { readJson } from "./read-json";

/**
 * Raw button samples from the operator panel. Edges are derived downstream.
 */
export const createButtonsRoute = (buttons: ButtonInput): Hono => {
  const route = new Hono();

  route.post("/", async (c) => {
    const parsed = v.safeParse(buttonSampleSchema, await readJson(c.req.raw));
    if (!parsed.success) {
      return c.json({ error: "Expected { green: boolean, red: boolean }" }, 400);
    }

    buttons.handleSample(parsed.output);
    return c.body(null, 204);
  });

  return route;
};
