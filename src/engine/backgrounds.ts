import { getBackground } from "@/rules/store";
import {
  ANY_COMBAT,
  ANY_SKILL,
  COMBAT_SKILLS,
  type Background,
  type RuleTableStore,
} from "@/rules/types";

import { InvalidConfigurationError } from "./errors";
import { pick, type Rng } from "./random";
import type { SkillGrant } from "./types";

export interface BackgroundChoice {
  useQuickSkills: boolean;
  quickSkill?: string;
}

export function isPlaceholder(skill: string): boolean {
  return skill === ANY_COMBAT || skill === ANY_SKILL;
}

/** Skills `AnySkill` may resolve to: every skill that is not a psychic discipline. */
export function generalSkillNames(rules: RuleTableStore): string[] {
  const disciplines = new Set(rules.disciplineNames);
  return rules.skillNames.filter((name) => !disciplines.has(name));
}

export function resolvePlaceholder(rules: RuleTableStore, skill: string, random: Rng): string {
  if (skill === ANY_COMBAT) {
    return pick(random, COMBAT_SKILLS) ?? COMBAT_SKILLS[0];
  }
  if (skill === ANY_SKILL) {
    const pool = generalSkillNames(rules);
    const resolved = pick(random, pool);
    if (resolved === undefined) {
      throw new InvalidConfigurationError("No skills available to resolve AnySkill");
    }
    return resolved;
  }
  return skill;
}

export function chooseQuickSkill(
  background: Background,
  choice: BackgroundChoice,
  random: Rng,
): string {
  const { quickSkills } = background;
  if (choice.quickSkill !== undefined) {
    if (!quickSkills.includes(choice.quickSkill)) {
      throw new InvalidConfigurationError(
        `Background "${background.name}" does not offer quick skill "${choice.quickSkill}"`,
      );
    }
    return choice.quickSkill;
  }
  if (!choice.useQuickSkills) {
    return quickSkills[0];
  }
  return pick(random, quickSkills) ?? quickSkills[0];
}

/**
 * Expands a background into its free skill and one quick skill, both at
 * level 0 and with placeholders resolved to concrete skill names.
 */
export function resolveBackground(
  rules: RuleTableStore,
  background: Background,
  choice: BackgroundChoice,
  random: Rng,
): SkillGrant[] {
  const free = resolvePlaceholder(rules, background.freeSkill, random);
  const quick = resolvePlaceholder(rules, chooseQuickSkill(background, choice, random), random);
  return [
    { skill: free, level: 0, source: "free" },
    { skill: quick, level: 0, source: "quick" },
  ];
}

export function backgroundsForClass(rules: RuleTableStore, className: string): Background[] {
  return [...rules.backgrounds.values()].filter(
    (background) =>
      background.classSpecific === undefined || background.classSpecific === className,
  );
}

/**
 * A named background wins. Otherwise draws among the class's backgrounds,
 * narrowed to those offering `quickSkill` when one is requested.
 */
export function chooseBackground(
  rules: RuleTableStore,
  className: string,
  random: Rng,
  requested?: string,
  quickSkill?: string,
): Background {
  if (requested !== undefined) {
    return getBackground(rules, requested);
  }
  const candidates = backgroundsForClass(rules, className).filter(
    (background) => quickSkill === undefined || background.quickSkills.includes(quickSkill),
  );
  if (candidates.length === 0) {
    throw new InvalidConfigurationError(
      quickSkill === undefined
        ? `No background available for class ${className}`
        : `No background for class ${className} offers quick skill "${quickSkill}"`,
    );
  }
  return pick(random, candidates) ?? candidates[0];
}
