import { describe, expect, it } from "vitest";

import { availableFoci, createRng, focusPickCount, selectFoci } from "@/engine";
import { createRuleTableStore, getClass, getDefaultRuleTables } from "@/rules";

import { minimalTables } from "@/rules/__tests__/fixtures";

const rules = getDefaultRuleTables();

describe("focusPickCount", () => {
  it("counts base, bonus and level picks", () => {
    expect(focusPickCount(getClass(rules, "Warrior"), 1)).toBe(2);
    expect(focusPickCount(getClass(rules, "Warrior"), 10)).toBe(6);
    expect(focusPickCount(getClass(rules, "Psychic"), 1)).toBe(1);
    expect(focusPickCount(getClass(rules, "Adventurer"), 5)).toBe(4);
  });
});

describe("availableFoci", () => {
  it("keeps psychic foci for psionic characters", () => {
    const names = (powerType: "normal" | "psionic") =>
      availableFoci(rules, getClass(rules, "Psychic"), powerType).map((focus) => focus.name);
    expect(names("psionic")).toContain("Psychic Training");
    expect(names("normal")).not.toContain("Psychic Training");
    expect(names("normal")).toHaveLength(22);
  });

  it("keeps class-restricted foci for their classes", () => {
    const sunblade = availableFoci(rules, getClass(rules, "Sunblade"), "magic").map(
      (focus) => focus.name,
    );
    expect(sunblade).toContain("Blade Ward");
    expect(sunblade).toContain("Arcane Physique");
    expect(sunblade).not.toContain("Armored Technique");
    expect(sunblade).toHaveLength(24);
  });
});

describe("selectFoci", () => {
  it("takes a base pick and a combat bonus pick", () => {
    const foci = selectFoci(rules, getClass(rules, "Warrior"), 1, "normal", () => 0);
    expect(foci.map((focus) => [focus.name, focus.level])).toEqual([
      ["Alert", 1],
      ["Armsman", 1],
    ]);
  });

  it("never holds incompatible or duplicate foci", () => {
    for (let seed = 0; seed < 30; seed += 1) {
      const foci = selectFoci(rules, getClass(rules, "Warrior"), 10, "normal", createRng(`foci-${seed}`));
      const names = foci.map((focus) => focus.name);
      const upgraded = foci.filter((focus) => focus.level === 2).length;
      expect(names.length + upgraded).toBe(6);
      expect(new Set(names).size).toBe(names.length);
      expect(names.includes("Assassin") && names.includes("Close Combatant")).toBe(false);
    }
  });

  it("raises a held focus at a level-gained pick on a low roll", () => {
    const alert = rules.foci.get("Alert");
    const foci = selectFoci(rules, getClass(rules, "Warrior"), 2, "normal", () => 0);
    expect(foci).toEqual([
      { name: "Alert", level: 2, description: `${alert?.levelOne} ${alert?.levelTwo}` },
      { name: "Armsman", level: 1, description: rules.foci.get("Armsman")?.levelOne },
    ]);
  });

  it("takes a new focus at a level-gained pick on a high roll", () => {
    const foci = selectFoci(rules, getClass(rules, "Warrior"), 2, "normal", () => 0.9);
    expect(foci.map((focus) => [focus.name, focus.level])).toEqual([
      ["Tinker", 1],
      ["Unarmed Combatant", 1],
      ["Starfarer", 1],
    ]);
  });

  it("mixes new and raised foci across level 10 characters", () => {
    let raised = 0;
    let fresh = 0;
    for (let seed = 0; seed < 40; seed += 1) {
      const foci = selectFoci(rules, getClass(rules, "Warrior"), 10, "normal", createRng(`mix-${seed}`));
      raised += foci.filter((focus) => focus.level === 2).length;
      fresh += foci.length;
    }
    expect(raised).toBeGreaterThan(0);
    expect(fresh).toBeGreaterThan(80);
  });

  it("upgrades a held focus when no new one is available", () => {
    const minimal = createRuleTableStore(minimalTables());
    const foci = selectFoci(minimal, getClass(minimal, "Vagrant"), 10, "normal", () => 0);
    expect(foci).toEqual([
      { name: "Lucky", level: 2, description: "Reroll once per day. Reroll twice per day." },
    ]);
  });
});
