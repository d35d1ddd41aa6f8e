import type { z } from "zod";

import type {
  abilitySchema,
  abilityTrackSchema,
  attributeNameSchema,
  backgroundSchema,
  classSchema,
  disciplineSchema,
  equipmentItemSchema,
  focusSchema,
  namesSchema,
  powerDescriptorSchema,
  ruleTablesSchema,
  sacredWeaponSchema,
  skillSchema,
  spellSchema,
  techniqueSchema,
  traditionSchema,
} from "./schema";

export type AttributeName = z.infer<typeof attributeNameSchema>;

export type SkillDefinition = z.infer<typeof skillSchema>;
export type Background = z.infer<typeof backgroundSchema>;
export type PowerDescriptor = z.infer<typeof powerDescriptorSchema>;
export type ClassDefinition = z.infer<typeof classSchema>;
export type FocusDefinition = z.infer<typeof focusSchema>;
export type Spell = z.infer<typeof spellSchema>;
export type Tradition = z.infer<typeof traditionSchema>;
export type Technique = z.infer<typeof techniqueSchema>;
export type Discipline = z.infer<typeof disciplineSchema>;
export type Ability = z.infer<typeof abilitySchema>;
export type SacredWeapon = z.infer<typeof sacredWeaponSchema>;
export type AbilityTrack = z.infer<typeof abilityTrackSchema>;
export type EquipmentItem = z.infer<typeof equipmentItemSchema>;
export type EquipmentCategory = EquipmentItem["category"];
export type NameTable = z.infer<typeof namesSchema>;

export type RuleTables = z.infer<typeof ruleTablesSchema>;

/** Progression rows indexed by `[characterLevel - 1][spellLevel - 1]`. */
export type ProgressionTable = number[][];

export const ANY_COMBAT = "AnyCombat";
export const ANY_SKILL = "AnySkill";
export const COMBAT_SKILLS = ["Shoot", "Stab", "Punch"] as const;

export interface RuleTableStore {
  readonly skills: ReadonlyMap<string, SkillDefinition>;
  readonly backgrounds: ReadonlyMap<string, Background>;
  readonly classes: ReadonlyMap<string, ClassDefinition>;
  readonly foci: ReadonlyMap<string, FocusDefinition>;
  readonly traditions: ReadonlyMap<string, Tradition>;
  readonly disciplines: ReadonlyMap<string, Discipline>;
  readonly tracks: ReadonlyMap<string, AbilityTrack>;
  readonly equipment: readonly EquipmentItem[];
  readonly names: NameTable;
  /** General skills plus every psychic discipline. */
  readonly skillNames: readonly string[];
  readonly disciplineNames: readonly string[];
}
