import type { ClassDefinition } from "@/rules/types";

import { rollDie } from "./math";
import type { Rng } from "./random";
import type { Attributes, Loadout, SavingThrows } from "./types";

export const UNARMORED_AC = 10;
export const SAVE_BASE = 16;

export function rollHitPoints(
  classDef: ClassDefinition,
  level: number,
  conModifier: number,
  random: Rng,
): number {
  let total = 0;
  for (let current = 1; current <= level; current += 1) {
    total += Math.max(1, rollDie(classDef.hitDie.sides, random) + classDef.hitDie.bonus + conModifier);
  }
  return total;
}

export function attackBonus(classDef: ClassDefinition, level: number): number {
  return classDef.attack === "full" ? level : Math.floor(level / 2);
}

export function armorClass(loadout: Loadout, attributes: Attributes): number {
  return (loadout.armor?.ac ?? UNARMORED_AC) + attributes.modifiers.DEX;
}

export function savingThrows(level: number, attributes: Attributes): SavingThrows {
  const { modifiers } = attributes;
  const save = (first: number, second: number) => SAVE_BASE - level - Math.max(first, second);
  return {
    physical: save(modifiers.STR, modifiers.CON),
    evasion: save(modifiers.DEX, modifiers.INT),
    mental: save(modifiers.WIS, modifiers.CHA),
  };
}
