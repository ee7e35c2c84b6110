/**
 * Venue descriptor validation schemas.
 */

import * as v from "valibot";

export const VenueConfigSchema = v.object({
  id: v.pipe(v.string(), v.minLength(1)),
  leverage: v.optional(v.pipe(v.number(), v.minValue(1)), 1),
  marginMode: v.optional(v.picklist(["isolated", "cross"]), "isolated"),
  connection: v.optional(v.picklist(["rest", "stream"]), "rest"),
});

export type VenueConfig = v.InferOutput<typeof VenueConfigSchema>;

export const parseVenueConfig = (config: unknown): VenueConfig =>
  v.parse(VenueConfigSchema, config);

export const isVenueConfig = (value: unknown): value is VenueConfig =>
  v.is(VenueConfigSchema, value);
