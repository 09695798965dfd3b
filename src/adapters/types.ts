import type { OrganizationLookup } from "../config/sourceTables";
import type { QuakeEvent } from "../types/quake";

export type AdapterFamily = "fanstudio" | "wolfx" | "nied" | "p2pquake" | "p2pquake_tsunami";

export interface AdapterContext {
  zone: string;
  organizationOf: OrganizationLookup;
  now: () => number;
}

/** Vendor payload → QuakeEvent. Implementations are pure and never throw. */
export interface Adapter {
  readonly family: AdapterFamily;
  parse(raw: unknown): QuakeEvent | null;
  parseAll(raw: unknown): QuakeEvent[];
}
