import { describe, expect, it } from "vitest";

import { equipmentPool, selectEquipment, startingBudget } from "@/engine";
import { createRuleTableStore, getClass, getDefaultRuleTables } from "@/rules";

import { minimalTables } from "@/rules/__tests__/fixtures";

const rules = getDefaultRuleTables();
const names = (items: readonly { name: string }[]) => items.map((item) => item.name);

describe("startingBudget", () => {
  it("adds 500 credits per level to the class tier", () => {
    expect(startingBudget(getClass(rules, "Warrior"), 1)).toBe(2000);
    expect(startingBudget(getClass(rules, "Expert"), 4)).toBe(4000);
  });
});

describe("equipmentPool", () => {
  it("drops items above the tech level", () => {
    const pool = equipmentPool(rules, getClass(rules, "Warrior"), 0);
    expect(pool.every((item) => item.techLevel === 0)).toBe(true);
    expect(pool.some((item) => item.range === "ranged")).toBe(false);
  });

  it("drops armor heavier than the class allows", () => {
    const armor = equipmentPool(rules, getClass(rules, "Arcanist"), 5).filter(
      (item) => item.category === "armor",
    );
    expect(names(armor)).toEqual(["Secure Clothing", "Armored Undersuit"]);
  });
});

describe("selectEquipment", () => {
  it("equips a combat class armor and weapons first", () => {
    const loadout = selectEquipment(rules, getClass(rules, "Warrior"), 1, 0);
    expect(loadout.armor?.name).toBe("Leather Jack");
    expect(names(loadout.weapons)).toEqual(["Club", "Knife"]);
    expect(names(loadout.tools)).toEqual(["Herbal Remedies"]);
    expect(names(loadout.gear)).toEqual(["Torches", "Backpack", "Rope"]);
    expect(loadout).toMatchObject({ budget: 2000, spent: 30, remaining: 1970, encumbrance: 6 });
  });

  it("equips a non-combat class tools first", () => {
    const loadout = selectEquipment(rules, getClass(rules, "Expert"), 1, 4);
    expect(names(loadout.tools)).toEqual(["Herbal Remedies", "Basic Toolkit"]);
    expect(loadout.armor?.name).toBe("Leather Jack");
    expect(names(loadout.weapons)).toEqual(["Club"]);
    expect(loadout).toMatchObject({ budget: 2500, spent: 50, remaining: 2450 });
  });

  it("keeps casters in unencumbering armor", () => {
    const loadout = selectEquipment(rules, getClass(rules, "Arcanist"), 1, 4);
    expect(loadout.armor?.name).toBe("Secure Clothing");
    expect(loadout).toMatchObject({ budget: 1700, spent: 340, remaining: 1360, encumbrance: 5 });
  });

  it("skips items the budget cannot cover", () => {
    const minimal = createRuleTableStore(minimalTables());
    const loadout = selectEquipment(minimal, getClass(minimal, "Vagrant"), 1, 5);
    expect(loadout.armor).toBeNull();
    expect(loadout).toMatchObject({ budget: 1500, spent: 0, remaining: 1500, encumbrance: 0 });
  });

  it("never overspends at any level or tech level", () => {
    for (const definition of rules.classes.values()) {
      for (const techLevel of [0, 3, 5]) {
        for (const level of [1, 10]) {
          const loadout = selectEquipment(rules, definition, level, techLevel);
          expect(loadout.spent).toBeLessThanOrEqual(loadout.budget);
          expect(loadout.spent + loadout.remaining).toBe(loadout.budget);
        }
      }
    }
  });
});
