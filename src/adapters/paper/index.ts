export { createPaperVenueClient } from "./adapter";
export type { PaperMethod, PaperVenueClient, PaperVenueClientConfig } from "./adapter";
