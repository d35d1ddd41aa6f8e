import { z } from "zod";

import { MAX_LEVEL } from "@/rules/schema";

import { InvalidConfigurationError } from "./errors";

export const MAX_TECH_LEVEL = 5;
export const DEFAULT_TECH_LEVEL = 4;
export const MAX_PARTY_SIZE = 20;

export const generationConfigSchema = z
  .object({
    name: z.string().trim().min(1).optional(),
    level: z.number().int().min(1).max(MAX_LEVEL).default(1),
    attributeMethod: z.enum(["roll", "array"]).default("roll"),
    powerType: z.enum(["normal", "magic", "psionic"]).optional(),
    className: z.string().min(1).optional(),
    background: z.string().min(1).optional(),
    useQuickSkills: z.boolean().default(true),
    quickSkill: z.string().min(1).optional(),
    techLevel: z.number().int().min(0).max(MAX_TECH_LEVEL).default(DEFAULT_TECH_LEVEL),
    seed: z.union([z.string(), z.number()]).optional(),
  })
  .strict();

/** What callers pass; every field is optional. */
export type GenerationConfig = z.input<typeof generationConfigSchema>;
export type ResolvedConfig = z.output<typeof generationConfigSchema>;

export function parseConfig(raw: unknown): ResolvedConfig {
  const parsed = generationConfigSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const [issue] = parsed.error.issues;
    const path = issue.path.join(".");
    throw new InvalidConfigurationError(path ? `${path}: ${issue.message}` : issue.message);
  }
  return parsed.data;
}

export function parsePartySize(count: number): number {
  if (!Number.isInteger(count) || count < 1 || count > MAX_PARTY_SIZE) {
    throw new InvalidConfigurationError(
      `Party size must be an integer between 1 and ${MAX_PARTY_SIZE}, got ${count}`,
    );
  }
  return count;
}
