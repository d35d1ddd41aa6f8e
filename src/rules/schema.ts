import { z } from "zod";

export const MAX_LEVEL = 10;
export const SPELL_LEVELS = 5;

export const attributeNameSchema = z.enum(["STR", "DEX", "CON", "INT", "WIS", "CHA"]);

export const skillSchema = z.object({
  name: z.string().min(1),
  combat: z.boolean(),
});

export const backgroundSchema = z.object({
  name: z.string().min(1),
  description: z.string().default(""),
  freeSkill: z.string().min(1),
  quickSkills: z.tuple([z.string().min(1), z.string().min(1), z.string().min(1)]),
  classSpecific: z.string().min(1).optional(),
});

export const powerDescriptorSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("none") }),
  z.object({ kind: z.literal("spellcasting"), tradition: z.string().min(1) }),
  z.object({ kind: z.literal("psychic"), bonusPicks: z.number().int().min(1).max(2) }),
  z.object({ kind: z.literal("special"), track: z.string().min(1) }),
]);

export const classSchema = z.object({
  name: z.string().min(1),
  description: z.string().default(""),
  hitDie: z.object({
    sides: z.number().int().min(1),
    bonus: z.number().int(),
  }),
  skillPoints: z.number().int().min(0),
  foci: z.object({
    base: z.number().int().min(0),
    bonus: z.enum(["combat", "non-combat"]).nullable(),
  }),
  archetype: z.enum(["combat", "non-combat"]),
  attack: z.enum(["full", "half"]),
  startingCredits: z.number().int().min(1000).max(2000),
  armorEncumbranceLimit: z.number().int().min(0).optional(),
  prioritySkills: z.array(z.string().min(1)),
  power: powerDescriptorSchema,
});

export const focusSchema = z.object({
  name: z.string().min(1),
  combat: z.boolean(),
  psychicOnly: z.boolean().default(false),
  allowedClasses: z.array(z.string().min(1)).optional(),
  incompatibleWith: z.array(z.string().min(1)).default([]),
  levelOne: z.string(),
  levelTwo: z.string(),
});

const spellRow = z.array(z.number().int().min(0)).length(SPELL_LEVELS);
const progressionTable = z.array(spellRow).length(MAX_LEVEL);

export const spellSchema = z.object({
  name: z.string().min(1),
  level: z.number().int().min(1).max(SPELL_LEVELS),
  effect: z.string(),
});

export const traditionSchema = z.discriminatedUnion("style", [
  z.object({
    name: z.string().min(1),
    style: z.literal("fixed-known"),
    skill: z.string().min(1),
    known: progressionTable,
    slots: progressionTable,
    spells: z.array(spellSchema),
  }),
  z.object({
    name: z.string().min(1),
    style: z.literal("open-library"),
    skill: z.string().min(1),
    prepared: progressionTable,
    spells: z.array(spellSchema),
  }),
]);

export const techniqueSchema = z.object({
  name: z.string().min(1),
  level: z.number().int().min(0).max(4),
  effort: z.number().int().min(0),
  description: z.string(),
});

export const disciplineSchema = z.object({
  name: z.string().min(1),
  description: z.string().default(""),
  core: techniqueSchema,
  techniques: z.array(techniqueSchema),
});

export const abilitySchema = z.object({
  name: z.string().min(1),
  description: z.string(),
});

export const sacredWeaponSchema = z.object({
  type: z.string().min(1),
  damage: z.string(),
  shock: z.string(),
  attribute: z.string(),
  range: z.string(),
});

const trackBase = {
  name: z.string().min(1),
  skill: z.string().min(1).optional(),
  levelOne: z.array(abilitySchema),
  effortAttributes: z.tuple([attributeNameSchema, attributeNameSchema]).optional(),
  /** What the attribute bonus is added to: the count of selected abilities or the track skill. */
  effortBase: z.enum(["selected", "skill"]).default("selected"),
  oddLevelHpBonus: z.number().int().min(0).default(0),
  sacredWeapons: z.array(sacredWeaponSchema).default([]),
};

export const abilityTrackSchema = z.discriminatedUnion("style", [
  z.object({
    ...trackBase,
    style: z.literal("automatic"),
    levels: z.array(
      z.object({
        level: z.number().int().min(2).max(MAX_LEVEL),
        abilities: z.array(abilitySchema).min(1),
      }),
    ),
  }),
  z.object({
    ...trackBase,
    style: z.literal("even-level"),
    pool: z.array(abilitySchema),
  }),
]);

export const equipmentItemSchema = z.object({
  name: z.string().min(1),
  category: z.enum(["armor", "weapon", "tool", "gear"]),
  techLevel: z.number().int().min(0).max(5),
  cost: z.number().int().min(0),
  encumbrance: z.number().int().min(0),
  ac: z.number().int().optional(),
  damage: z.string().optional(),
  range: z.enum(["melee", "ranged"]).optional(),
});

export const namesSchema = z.object({
  first: z.array(z.string().min(1)).min(1),
  last: z.array(z.string().min(1)).min(1),
});

export const ruleTablesSchema = z.object({
  skills: z.array(skillSchema).min(1),
  backgrounds: z.array(backgroundSchema).min(1),
  classes: z.array(classSchema).min(1),
  foci: z.array(focusSchema),
  traditions: z.array(traditionSchema),
  disciplines: z.array(disciplineSchema),
  tracks: z.array(abilityTrackSchema),
  equipment: z.array(equipmentItemSchema),
  names: namesSchema,
});
