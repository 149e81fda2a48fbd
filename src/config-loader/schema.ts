import { z } from "zod";

const rulesFileSchema = z.object({
  rules: z
    .array(z.string().trim().min(1, "rules must be non-empty strings"))
    .default([]),
});

export type RulesFile = z.infer<typeof rulesFileSchema>;

/** An empty document (`null`/`undefined` from the YAML parser) has no rules. */
export function parseRulesFile(raw: unknown): RulesFile {
  if (raw === null || raw === undefined) return { rules: [] };
  return rulesFileSchema.parse(raw);
}
