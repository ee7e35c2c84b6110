/**
 * Binds a validated venue descriptor to its connectivity client.
 */

import { parseVenueConfig } from "./config";
import type { Venue, VenueClient } from "./types";

/**
 * Create a venue from a raw descriptor and a client.
 *
 * @throws {ValiError} If the descriptor is invalid
 */
export const createVenue = (config: unknown, client: VenueClient): Venue => {
  const { id, leverage, marginMode, connection } = parseVenueConfig(config);
  return { id, client, leverage, marginMode, connection };
};
