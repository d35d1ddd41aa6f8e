import type { ClassDefinition, FocusDefinition, RuleTableStore } from "@/rules/types";

import { pick, type Rng } from "./random";
import type { Focus, PowerType } from "./types";

/** Character levels that grant an extra focus pick. */
export const FOCUS_LEVELS: readonly number[] = [2, 5, 7, 10];

/** Odds that a level-gained pick raises a held focus when a new one is also open. */
export const UPGRADE_CHANCE = 0.5;

interface HeldFocus {
  definition: FocusDefinition;
  level: 1 | 2;
}

export function focusPickCount(classDef: ClassDefinition, level: number): number {
  const bonus = classDef.foci.bonus === null ? 0 : 1;
  return classDef.foci.base + bonus + FOCUS_LEVELS.filter((gain) => gain <= level).length;
}

function compatible(candidate: FocusDefinition, held: readonly HeldFocus[]): boolean {
  return held.every(
    ({ definition }) =>
      definition.name !== candidate.name &&
      !definition.incompatibleWith.includes(candidate.name) &&
      !candidate.incompatibleWith.includes(definition.name),
  );
}

export function availableFoci(
  rules: RuleTableStore,
  classDef: ClassDefinition,
  powerType: PowerType,
): FocusDefinition[] {
  const psychic = powerType === "psionic";
  return [...rules.foci.values()].filter(
    (focus) =>
      (!focus.psychicOnly || psychic) &&
      (focus.allowedClasses === undefined || focus.allowedClasses.includes(classDef.name)),
  );
}

function toFocus({ definition, level }: HeldFocus): Focus {
  return {
    name: definition.name,
    level,
    description: level === 2 ? `${definition.levelOne} ${definition.levelTwo}` : definition.levelOne,
  };
}

export function selectFoci(
  rules: RuleTableStore,
  classDef: ClassDefinition,
  level: number,
  powerType: PowerType,
  random: Rng,
): Focus[] {
  const pool = availableFoci(rules, classDef, powerType);
  const held: HeldFocus[] = [];
  const take = (filter: (focus: FocusDefinition) => boolean): boolean => {
    const choice = pick(
      random,
      pool.filter((focus) => filter(focus) && compatible(focus, held)),
    );
    if (!choice) {
      return false;
    }
    held.push({ definition: choice, level: 1 });
    return true;
  };

  for (let i = 0; i < classDef.foci.base; i += 1) {
    take(() => true);
  }

  if (classDef.foci.bonus === "combat") {
    take((focus) => focus.combat);
  } else if (classDef.foci.bonus === "non-combat") {
    take((focus) => !focus.combat && !focus.psychicOnly);
  }

  for (const gain of FOCUS_LEVELS) {
    if (gain > level) {
      break;
    }
    const hasNew = pool.some((focus) => compatible(focus, held));
    const upgradable = held.filter((entry) => entry.level === 1);
    const upgrade = !hasNew || (upgradable.length > 0 && random() < UPGRADE_CHANCE);
    if (!upgrade) {
      take(() => true);
      continue;
    }
    const target = pick(random, upgradable);
    if (target) {
      target.level = 2;
    }
  }

  return held.map(toFocus);
}
