import { getDiscipline } from "@/rules/store";
import type { Discipline, RuleTableStore, Technique } from "@/rules/types";

import { pick, type Rng } from "../random";
import type { Attributes, LearnedTechnique, PsychicProfile, SkillGrant, SkillSet } from "../types";

export const MAX_DISCIPLINE_LEVEL = 4;

/**
 * Rolls discipline picks with replacement. A second pick on the same
 * discipline raises it a level instead of adding a new one.
 */
export function pickDisciplines(
  rules: RuleTableStore,
  picks: number,
  random: Rng,
): SkillGrant[] {
  const levels = new Map<string, number>();
  for (let i = 0; i < picks; i += 1) {
    const name = pick(random, rules.disciplineNames);
    if (name === undefined) {
      break;
    }
    const current = levels.get(name);
    levels.set(name, current === undefined ? 0 : Math.min(MAX_DISCIPLINE_LEVEL, current + 1));
  }
  return [...levels].map(([skill, level]): SkillGrant => ({ skill, level, source: "power" }));
}

function nextTechnique(
  discipline: Discipline,
  level: number,
  chosen: ReadonlySet<string>,
  random: Rng,
): Technique | undefined {
  const open = discipline.techniques.filter((technique) => !chosen.has(technique.name));
  const exact = open.filter((technique) => technique.level === level);
  if (exact.length > 0) {
    return pick(random, exact);
  }
  return pick(
    random,
    open.filter((technique) => technique.level < level),
  );
}

export function learnTechniques(
  discipline: Discipline,
  skillLevel: number,
  random: Rng,
): LearnedTechnique[] {
  const learned: LearnedTechnique[] = [{ ...discipline.core, discipline: discipline.name }];
  const chosen = new Set<string>([discipline.core.name]);
  for (let level = 1; level <= skillLevel; level += 1) {
    const technique = nextTechnique(discipline, level, chosen, random);
    if (!technique) {
      break;
    }
    chosen.add(technique.name);
    learned.push({ ...technique, discipline: discipline.name });
  }
  return learned;
}

export function psychicEffort(disciplines: Record<string, number>, attributes: Attributes): number {
  const levels = Object.values(disciplines);
  const highest = levels.length > 0 ? Math.max(...levels) : 0;
  const bonus = Math.max(attributes.modifiers.WIS, attributes.modifiers.CON);
  return Math.max(1, 1 + highest + bonus);
}

/** Builds the profile from final skill levels, after allocation has run. */
export function buildPsychicProfile(
  rules: RuleTableStore,
  skills: SkillSet,
  attributes: Attributes,
  random: Rng,
): PsychicProfile {
  const disciplines: Record<string, number> = {};
  const techniques: LearnedTechnique[] = [];
  for (const name of rules.disciplineNames) {
    const level = skills[name];
    if (level === undefined || level < 0) {
      continue;
    }
    disciplines[name] = level;
    techniques.push(...learnTechniques(getDiscipline(rules, name), level, random));
  }
  return { disciplines, techniques, effort: psychicEffort(disciplines, attributes) };
}
