import { readFileSync } from "node:fs";
import { z } from "zod";
import type { TimezoneCatalogEntry } from "./types.js";

const CatalogSchema = z
  .array(z.object({ id: z.string().min(1), label: z.string().min(1) }))
  .refine((items) => new Set(items.map((i) => i.id)).size === items.length, {
    message: "timezone ids must be unique",
  });

// Hand-curated; ids are not checked against the zone database here.
const CATALOG: readonly Readonly<TimezoneCatalogEntry>[] = Object.freeze(
  CatalogSchema.parse(
    JSON.parse(
      readFileSync(new URL("./timezones.json", import.meta.url), "utf8"),
    ),
  ).map((entry) => Object.freeze(entry)),
);

const LABELS = new Map(CATALOG.map((e) => [e.id, e.label]));

export function listTimezones(): readonly Readonly<TimezoneCatalogEntry>[] {
  return CATALOG;
}

/** Display label for a timezone id; unknown ids fall back to the id itself. */
export function timezoneLabel(timezoneId: string): string {
  return LABELS.get(timezoneId) ?? timezoneId;
}
