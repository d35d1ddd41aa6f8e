import { describe, expect, it } from "vitest";

import { DataIntegrityError, UnknownClassOrTraditionError } from "@/engine/errors";
import {
  createRuleTableStore,
  getClass,
  getDefaultRawTables,
  getDefaultRuleTables,
  getTrack,
  getTradition,
} from "@/rules";

import { minimalTables } from "./fixtures";

describe("bundled rule tables", () => {
  const rules = getDefaultRuleTables();

  it("loads every table", () => {
    expect(rules.classes.size).toBe(12);
    expect(rules.skills.size).toBe(19);
    expect(rules.disciplineNames).toEqual([
      "Biopsionics",
      "Metapsionics",
      "Precognition",
      "Telekinesis",
      "Telepathy",
      "Teleportation",
    ]);
    expect(rules.skillNames).toHaveLength(25);
  });

  it("returns the same frozen store on every call", () => {
    expect(getDefaultRuleTables()).toBe(rules);
    expect(Object.isFrozen(rules)).toBe(true);
    expect(Object.isFrozen(getClass(rules, "Warrior"))).toBe(true);
    expect(Object.isFrozen(getClass(rules, "Warrior").prioritySkills)).toBe(true);
  });

  it("keeps the literal progression tables", () => {
    const pacter = getTradition(rules, "Pacter");
    const arcanist = getTradition(rules, "Arcanist");
    if (pacter.style !== "fixed-known" || arcanist.style !== "open-library") {
      throw new Error("unexpected tradition styles");
    }
    expect(pacter.known[0]).toEqual([2, 0, 0, 0, 0]);
    expect(pacter.slots[0]).toEqual([3, 0, 0, 0, 0]);
    expect(pacter.known[9]).toEqual([5, 4, 3, 3, 2]);
    expect(pacter.slots[9]).toEqual([6, 6, 5, 4, 3]);
    expect(arcanist.prepared[0]).toEqual([1, 0, 0, 0, 0]);
    expect(arcanist.prepared[9]).toEqual([5, 4, 3, 3, 2]);
  });

  it("keeps starting credits within the 1000-2000 tier", () => {
    for (const definition of rules.classes.values()) {
      expect(definition.startingCredits).toBeGreaterThanOrEqual(1000);
      expect(definition.startingCredits).toBeLessThanOrEqual(2000);
    }
  });

  it("has no firearms or powered armor at tech level 0", () => {
    const primitive = rules.equipment.filter((item) => item.techLevel === 0);
    expect(primitive.some((item) => item.range === "ranged")).toBe(false);
    expect(primitive.some((item) => item.name === "Powered Assault Suit")).toBe(false);
  });
});

describe("createRuleTableStore", () => {
  it("builds a store from minimal tables", () => {
    const store = createRuleTableStore(minimalTables());
    expect([...store.classes.keys()]).toEqual(["Vagrant"]);
    expect(store.skillNames).toEqual(["Scout"]);
    expect(store.backgrounds.get("Drifter")?.description).toBe("");
  });

  it("rejects tables that fail the schema", () => {
    expect(() => createRuleTableStore({})).toThrow(DataIntegrityError);
  });

  it("reports the path of a missing field", () => {
    const tables = minimalTables();
    const raw = { ...tables, classes: [{ ...tables.classes[0], hitDie: undefined }] };
    expect(() => createRuleTableStore(raw)).toThrow(/^classes\.0\.hitDie: /);
  });

  it("rejects duplicate names", () => {
    const tables = minimalTables();
    const raw = { ...tables, classes: [tables.classes[0], tables.classes[0]] };
    expect(() => createRuleTableStore(raw)).toThrow('classes.1.name: duplicate entry "Vagrant"');
  });

  it("rejects backgrounds that grant unknown skills", () => {
    const tables = minimalTables();
    const raw = {
      ...tables,
      backgrounds: [{ name: "Ghost", freeSkill: "Haunt", quickSkills: ["Scout", "Scout", "Scout"] }],
    };
    expect(() => createRuleTableStore(raw)).toThrow('backgrounds.0: "Ghost" grants unknown skill "Haunt"');
  });

  it("rejects classes that reference a missing tradition", () => {
    const tables = minimalTables();
    const raw = {
      ...tables,
      classes: [{ ...tables.classes[0], power: { kind: "spellcasting", tradition: "Hedge Magic" } }],
    };
    expect(() => createRuleTableStore(raw)).toThrow(
      'classes.0.power.tradition: unknown tradition "Hedge Magic"',
    );
  });

  it("rejects skill-based effort on a track without a skill", () => {
    const tables = minimalTables();
    const raw = {
      ...tables,
      tracks: [
        {
          name: "Drift",
          style: "even-level",
          levelOne: [],
          effortAttributes: ["WIS", "CHA"],
          effortBase: "skill",
          pool: [],
        },
      ],
    };
    expect(() => createRuleTableStore(raw)).toThrow(
      'tracks.0.effortBase: "Drift" bases effort on a skill it does not name',
    );
  });

  it("records how each effort track counts its base", () => {
    const rules = getDefaultRuleTables();
    expect(getTrack(rules, "Sunblade").effortBase).toBe("skill");
    expect(getTrack(rules, "Free Nexus").effortBase).toBe("selected");
  });

  it("rejects armor without an AC", () => {
    const tables = minimalTables();
    const raw = {
      ...tables,
      equipment: [{ name: "Rags", category: "armor", techLevel: 0, cost: 1, encumbrance: 0 }],
    };
    expect(() => createRuleTableStore(raw)).toThrow('equipment.0.ac: armor "Rags" has no AC');
  });

  it("accepts the bundled raw tables", () => {
    expect(() => createRuleTableStore(getDefaultRawTables())).not.toThrow();
  });
});

describe("lookups", () => {
  const rules = getDefaultRuleTables();

  it("throws a typed error for unknown names", () => {
    expect(() => getClass(rules, "Bard")).toThrow(UnknownClassOrTraditionError);
    expect(() => getClass(rules, "Bard")).toThrow("Unknown class: Bard");
    expect(() => getTradition(rules, "Hedge Magic")).toThrow("Unknown tradition: Hedge Magic");
  });
});
