import { z } from "zod";

const OnOffSchema = z
  .string()
  .transform((value) => value.trim().toUpperCase())
  .pipe(z.enum(["ON", "OFF"]));

/**
 * Body of a light set command (Home Assistant JSON schema, the HTTP API and
 * WebSocket clients). Extra keys such as `transition` are dropped.
 */
export const LightCommandSchema = z.object({
  state: OnOffSchema.optional(),
  brightness: z.number().optional(),
});

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
