import type { ClassDefinition, RuleTableStore } from "@/rules/types";

import { skillCapForLevel, skillPointsForLevelUp } from "./math";
import type { SkillAllocation, SkillGrant, SkillSet } from "./types";

export const UNSKILLED = -1;

export interface AllocationInput {
  rules: RuleTableStore;
  classDef: ClassDefinition;
  level: number;
  intModifier: number;
  /** Skills already held from background and power grants. */
  skills: SkillSet;
  /** Skills the class's power relies on; spent on before anything else. */
  powerSkills?: readonly string[];
}

export function skillBudget(classDef: ClassDefinition, level: number, intModifier: number): number {
  let points = Math.max(1, classDef.skillPoints + intModifier);
  for (let current = 1; current < level; current += 1) {
    points += skillPointsForLevelUp(current);
  }
  return points;
}

export function applyGrants(skills: SkillSet, grants: readonly SkillGrant[]): SkillSet {
  const next = { ...skills };
  for (const grant of grants) {
    next[grant.skill] = Math.max(next[grant.skill] ?? UNSKILLED, grant.level);
  }
  return next;
}

function isHeld(skills: SkillSet, name: string): boolean {
  return (skills[name] ?? UNSKILLED) >= 0;
}

/** The order skill points are spent in, without duplicates. */
export function spendOrder(input: AllocationInput): string[] {
  const { rules, classDef, skills, powerSkills = [] } = input;
  const disciplines = new Set(rules.disciplineNames);
  const order: string[] = [];
  const seen = new Set<string>();
  const push = (name: string) => {
    if (seen.has(name)) {
      return;
    }
    if (disciplines.has(name) && !isHeld(skills, name)) {
      return;
    }
    seen.add(name);
    order.push(name);
  };

  powerSkills.forEach(push);
  classDef.prioritySkills.filter((name) => isHeld(skills, name)).forEach(push);
  classDef.prioritySkills.filter((name) => !isHeld(skills, name)).forEach(push);
  Object.keys(skills)
    .filter((name) => isHeld(skills, name))
    .forEach(push);

  const general = [...rules.skills.values()];
  const combatFirst = classDef.archetype === "combat";
  general.filter((skill) => skill.combat === combatFirst).forEach((skill) => push(skill.name));
  general.filter((skill) => skill.combat !== combatFirst).forEach((skill) => push(skill.name));

  return order;
}

/**
 * Spends the level-scaled budget one rank at a time, raising each skill in
 * spend order to the cap before moving on. Points that cannot be placed are
 * reported as unspent.
 */
export function allocateSkills(input: AllocationInput): SkillAllocation {
  const budget = skillBudget(input.classDef, input.level, input.intModifier);
  const cap = skillCapForLevel(input.level);
  const skills: SkillSet = { ...input.skills };
  let remaining = budget;

  for (const name of spendOrder(input)) {
    if (remaining <= 0) {
      break;
    }
    let current = skills[name] ?? UNSKILLED;
    while (current < cap && remaining > 0) {
      current += 1;
      remaining -= 1;
    }
    if (current >= 0) {
      skills[name] = current;
    }
  }

  return { skills, spent: budget - remaining, unspent: remaining, budget, cap };
}
