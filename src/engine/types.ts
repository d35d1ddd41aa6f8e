import type {
  Ability,
  AttributeName,
  EquipmentItem,
  SacredWeapon,
  Spell,
  Technique,
} from "@/rules/types";

export type { AttributeName } from "@/rules/types";

export const ATTRIBUTE_ORDER: readonly AttributeName[] = ["STR", "DEX", "CON", "INT", "WIS", "CHA"];

export type AttributeMethod = "roll" | "array";
export type PowerType = "normal" | "magic" | "psionic";

export interface Attributes {
  readonly scores: Readonly<Record<AttributeName, number>>;
  readonly modifiers: Readonly<Record<AttributeName, number>>;
}

/** Skill name to level, -1 unskilled through 4. */
export type SkillSet = Record<string, number>;

export type GrantSource = "free" | "quick" | "power";

export interface SkillGrant {
  skill: string;
  level: number;
  source: GrantSource;
}

export interface SkillAllocation {
  skills: SkillSet;
  spent: number;
  unspent: number;
  budget: number;
  cap: number;
}

export interface Spellbook {
  tradition: string;
  style: "fixed-known" | "open-library";
  known: Spell[];
  /** Spell level to slots (fixed-known) or prepared-per-day (open-library). */
  slots: Record<number, number>;
}

export interface LearnedTechnique extends Technique {
  discipline: string;
}

export interface PsychicProfile {
  disciplines: Record<string, number>;
  techniques: LearnedTechnique[];
  effort: number;
}

export interface AbilityGrant extends Ability {
  level: number;
  mode: "automatic" | "selected";
}

export interface SpecialAbilitySet {
  track: string;
  grants: AbilityGrant[];
  effort: number | null;
  hpBonus: number;
  sacredWeapon?: SacredWeapon;
}

export type PowerProfile =
  | { kind: "none" }
  | { kind: "spellbook"; spellbook: Spellbook }
  | { kind: "psychic"; psychic: PsychicProfile }
  | { kind: "special"; special: SpecialAbilitySet };

export interface Focus {
  name: string;
  level: 1 | 2;
  description: string;
}

export interface Loadout {
  armor: EquipmentItem | null;
  weapons: EquipmentItem[];
  tools: EquipmentItem[];
  gear: EquipmentItem[];
  budget: number;
  spent: number;
  remaining: number;
  encumbrance: number;
}

export interface SavingThrows {
  physical: number;
  evasion: number;
  mental: number;
}

export interface Character {
  name: string;
  level: number;
  className: string;
  background: string;
  powerType: PowerType;
  techLevel: number;
  attributes: Attributes;
  skills: SkillSet;
  grantedSkills: SkillGrant[];
  unspentSkillPoints: number;
  foci: Focus[];
  powers: PowerProfile;
  loadout: Loadout;
  hp: number;
  attackBonus: number;
  ac: number;
  savingThrows: SavingThrows;
}
