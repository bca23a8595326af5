import { z } from "zod";
import { splitSkills } from "./gridParser";
import { RosterEntry } from "./types";

const SkillListSchema = z
  .union([z.array(z.string()), z.string()])
  .transform((value) => (typeof value === "string" ? splitSkills(value) : splitSkills(value.join(" "))));

export const RosterEntrySchema = z
  .object({
    id: z.string().trim().min(1, "Resource id is required"),
    kind: z.enum(["crew", "appliance"]).default("crew"),
    name: z.string().trim().min(1, "Name is required"),
    role: z.string().trim().min(1).optional().nullable(),
    skills: SkillListSchema.optional().default([]),
    contractHours: z
      .union([z.string(), z.number()])
      .transform((value) => String(value).trim())
      .optional()
      .nullable(),
  })
  .transform((entry): RosterEntry => {
    const resource: RosterEntry = {
      id: entry.id,
      kind: entry.kind,
      name: entry.name,
      skills: entry.kind === "crew" ? entry.skills : [],
    };
    if (entry.kind === "crew" && entry.role) {
      resource.role = entry.role.toUpperCase();
    }
    if (entry.kind === "crew" && entry.contractHours) {
      resource.contractHours = entry.contractHours;
    }
    return resource;
  });

export const RosterPayloadSchema = z.union([
  z.array(RosterEntrySchema),
  z.object({ resources: z.array(RosterEntrySchema) }).transform((payload) => payload.resources),
]);

/**
 * Validates a roster list as delivered by the portal (an array, or
 * `{ resources: [...] }`). Skills may be a list or a "BA LGV" string.
 */
export function parseRoster(payload: unknown): RosterEntry[] {
  const entries = RosterPayloadSchema.parse(payload);

  const ids = new Set<string>();
  for (const entry of entries) {
    if (ids.has(entry.id)) {
      throw new Error(`Duplicate roster id "${entry.id}"`);
    }
    ids.add(entry.id);
  }

  return entries;
}
