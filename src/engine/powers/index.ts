import { getTrack, getTradition } from "@/rules/store";
import type { ClassDefinition, RuleTableStore } from "@/rules/types";

import { UnknownClassOrTraditionError } from "../errors";
import type { Rng } from "../random";
import type { Attributes, PowerProfile, PowerType, SkillGrant, SkillSet } from "../types";
import { buildPsychicProfile, pickDisciplines } from "./psychic";
import { buildSpecialAbilities } from "./special";
import { buildSpellbook } from "./spells";

export * from "./psychic";
export * from "./special";
export * from "./spells";

/**
 * Affinity the class actually generates with. Power-bearing classes keep
 * their own affinity whatever was requested.
 */
export function resolvePowerType(classDef: ClassDefinition, requested?: PowerType): PowerType {
  switch (classDef.power.kind) {
    case "spellcasting":
    case "special":
      return "magic";
    case "psychic":
      return "psionic";
    case "none":
      if (requested === "magic") {
        throw new UnknownClassOrTraditionError(
          `Class ${classDef.name} has no spellcasting tradition`,
        );
      }
      return requested ?? "normal";
  }
}

/** Skill grants that come with the class's power, applied before allocation. */
export function grantPowerSkills(
  rules: RuleTableStore,
  classDef: ClassDefinition,
  powerType: PowerType,
  random: Rng,
): SkillGrant[] {
  const { power } = classDef;
  switch (power.kind) {
    case "none":
      return powerType === "psionic" ? pickDisciplines(rules, 1, random) : [];
    case "psychic":
      return pickDisciplines(rules, power.bonusPicks, random);
    case "spellcasting": {
      const tradition = getTradition(rules, power.tradition);
      return [{ skill: tradition.skill, level: 0, source: "power" }];
    }
    case "special": {
      const track = getTrack(rules, power.track);
      return track.skill ? [{ skill: track.skill, level: 0, source: "power" }] : [];
    }
  }
}

export interface PowerContext {
  rules: RuleTableStore;
  classDef: ClassDefinition;
  powerType: PowerType;
  level: number;
  skills: SkillSet;
  attributes: Attributes;
}

export function grantPowers(context: PowerContext, random: Rng): PowerProfile {
  const { rules, classDef, powerType, level, skills, attributes } = context;
  const { power } = classDef;
  switch (power.kind) {
    case "none":
      if (powerType !== "psionic") {
        return { kind: "none" };
      }
      return { kind: "psychic", psychic: buildPsychicProfile(rules, skills, attributes, random) };
    case "psychic":
      return { kind: "psychic", psychic: buildPsychicProfile(rules, skills, attributes, random) };
    case "spellcasting":
      return {
        kind: "spellbook",
        spellbook: buildSpellbook(getTradition(rules, power.tradition), level, random),
      };
    case "special":
      return {
        kind: "special",
        special: buildSpecialAbilities(
          getTrack(rules, power.track),
          level,
          attributes,
          random,
          skills,
        ),
      };
  }
}
