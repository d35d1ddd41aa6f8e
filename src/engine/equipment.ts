import type {
  ClassDefinition,
  EquipmentCategory,
  EquipmentItem,
  RuleTableStore,
} from "@/rules/types";

import type { Loadout } from "./types";

export const CREDITS_PER_LEVEL = 500;

export interface CategoryStep {
  category: EquipmentCategory;
  cap: number;
}

export const COMBAT_PLAN: readonly CategoryStep[] = [
  { category: "armor", cap: 1 },
  { category: "weapon", cap: 2 },
  { category: "tool", cap: 1 },
  { category: "gear", cap: 3 },
];

export const NON_COMBAT_PLAN: readonly CategoryStep[] = [
  { category: "tool", cap: 2 },
  { category: "armor", cap: 1 },
  { category: "weapon", cap: 1 },
  { category: "gear", cap: 3 },
];

export function startingBudget(classDef: ClassDefinition, level: number): number {
  return classDef.startingCredits + level * CREDITS_PER_LEVEL;
}

export function equipmentPool(
  rules: RuleTableStore,
  classDef: ClassDefinition,
  techLevel: number,
): EquipmentItem[] {
  const limit = classDef.armorEncumbranceLimit;
  return rules.equipment.filter((item) => {
    if (item.techLevel > techLevel) {
      return false;
    }
    return !(item.category === "armor" && limit !== undefined && item.encumbrance > limit);
  });
}

function byCost(a: EquipmentItem, b: EquipmentItem): number {
  return a.cost - b.cost || a.name.localeCompare(b.name);
}

/**
 * Greedy fill: categories in plan order, cheapest first within each,
 * skipping what the remaining credits cannot cover.
 */
export function selectEquipment(
  rules: RuleTableStore,
  classDef: ClassDefinition,
  level: number,
  techLevel: number,
): Loadout {
  const budget = startingBudget(classDef, level);
  const pool = equipmentPool(rules, classDef, techLevel);
  const plan = classDef.archetype === "combat" ? COMBAT_PLAN : NON_COMBAT_PLAN;
  const chosen: Record<EquipmentCategory, EquipmentItem[]> = {
    armor: [],
    weapon: [],
    tool: [],
    gear: [],
  };
  let remaining = budget;

  for (const { category, cap } of plan) {
    const candidates = pool.filter((item) => item.category === category).sort(byCost);
    for (const item of candidates) {
      if (chosen[category].length >= cap) {
        break;
      }
      if (item.cost > remaining) {
        continue;
      }
      chosen[category].push(item);
      remaining -= item.cost;
    }
  }

  const all = [...chosen.armor, ...chosen.weapon, ...chosen.tool, ...chosen.gear];
  return {
    armor: chosen.armor[0] ?? null,
    weapons: chosen.weapon,
    tools: chosen.tool,
    gear: chosen.gear,
    budget,
    spent: budget - remaining,
    remaining,
    encumbrance: all.reduce((sum, item) => sum + item.encumbrance, 0),
  };
}
