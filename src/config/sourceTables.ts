import { readFileSync } from "node:fs";
import { z } from "zod";

const priorityTableSchema = z.record(z.string(), z.number().int().nonnegative());
const organizationTableSchema = z.record(z.string(), z.string().min(1));

export type PriorityTable = z.infer<typeof priorityTableSchema>;
export type OrganizationTable = z.infer<typeof organizationTableSchema>;

const FALLBACK_PRIORITY = 99;

function readTable<T>(file: string, schema: z.ZodType<T>): T {
  const raw: unknown = JSON.parse(readFileSync(new URL(file, import.meta.url), "utf8"));
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid table ${file}: ${parsed.error.issues.map((i) => i.message).join("; ")}`);
  }
  return parsed.data;
}

export const SOURCE_PRIORITY: PriorityTable = readTable("./source-priority.json", priorityTableSchema);
export const ORGANIZATIONS: OrganizationTable = readTable("./organizations.json", organizationTableSchema);

export type PriorityLookup = (source: string) => number;
export type OrganizationLookup = (source: string) => string;

export function createPriorityLookup(table: PriorityTable = SOURCE_PRIORITY): PriorityLookup {
  const fallback = table.default ?? FALLBACK_PRIORITY;
  return (source) => table[source] ?? fallback;
}

export function createOrganizationLookup(table: OrganizationTable = ORGANIZATIONS): OrganizationLookup {
  return (source) => table[source] ?? source;
}
