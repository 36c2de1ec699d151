/**
 * Request body as parsed JSON, or undefined when it is missing or malformed.
 * Callers validate the result with valibot.
 */
export const readJson = async (request: Request): Promise<unknown> => {
  try {
    return await request.json();
  } catch {
    return undefined;
  }
};
