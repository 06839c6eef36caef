import type { SessionStores } from "./sessions.js";

// Handed to every route plugin via register() options
export interface RouteDeps {
  stores: SessionStores;
  clock: () => Date;
}

export type View = "json" | "html";
