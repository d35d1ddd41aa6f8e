import { getClass } from "@/rules/store";
import type { ClassDefinition, RuleTableStore } from "@/rules/types";
import { deepFreeze } from "@/lib/util";

import { generateAttributes } from "./attributes";
import { chooseBackground, resolveBackground } from "./backgrounds";
import { armorClass, attackBonus, rollHitPoints, savingThrows } from "./combat";
import { parseConfig, parsePartySize, type GenerationConfig } from "./config";
import { selectEquipment } from "./equipment";
import { UnknownClassOrTraditionError } from "./errors";
import { selectFoci } from "./foci";
import { grantPowerSkills, grantPowers, resolvePowerType } from "./powers";
import { createRng, pick, type Rng } from "./random";
import { allocateSkills, applyGrants } from "./skills";
import type { Character, PowerType } from "./types";

const POWER_KINDS: Record<PowerType, ReadonlyArray<ClassDefinition["power"]["kind"]>> = {
  normal: ["none"],
  magic: ["spellcasting", "special"],
  psionic: ["psychic", "none"],
};

export function chooseClass(
  rules: RuleTableStore,
  powerType: PowerType | undefined,
  random: Rng,
): ClassDefinition {
  const classes = [...rules.classes.values()];
  const candidates =
    powerType === undefined
      ? classes
      : classes.filter((definition) => POWER_KINDS[powerType].includes(definition.power.kind));
  const choice = pick(random, candidates);
  if (!choice) {
    throw new UnknownClassOrTraditionError(`No class available for power type ${powerType ?? "any"}`);
  }
  return choice;
}

export function randomName(rules: RuleTableStore, random: Rng): string {
  const first = pick(random, rules.names.first) ?? "";
  const last = pick(random, rules.names.last) ?? "";
  return `${first} ${last}`.trim();
}

/**
 * Runs the full pipeline for one character. Component errors propagate
 * unchanged. The returned record is deeply frozen.
 */
export function generateCharacter(
  rules: RuleTableStore,
  config: GenerationConfig = {},
  random?: Rng,
): Character {
  const options = parseConfig(config);
  const rng = random ?? createRng(options.seed);
  const { level, techLevel } = options;

  const name = options.name ?? randomName(rules, rng);
  const attributes = generateAttributes(options.attributeMethod, rng);
  const classDef = options.className
    ? getClass(rules, options.className)
    : chooseClass(rules, options.powerType, rng);
  const powerType = resolvePowerType(classDef, options.powerType);
  const background = chooseBackground(
    rules,
    classDef.name,
    rng,
    options.background,
    options.quickSkill,
  );

  const backgroundGrants = resolveBackground(
    rules,
    background,
    { useQuickSkills: options.useQuickSkills, quickSkill: options.quickSkill },
    rng,
  );
  const powerGrants = grantPowerSkills(rules, classDef, powerType, rng);
  const grantedSkills = [...backgroundGrants, ...powerGrants];

  const allocation = allocateSkills({
    rules,
    classDef,
    level,
    intModifier: attributes.modifiers.INT,
    skills: applyGrants({}, grantedSkills),
    powerSkills: powerGrants.map((grant) => grant.skill),
  });

  const powers = grantPowers(
    { rules, classDef, powerType, level, skills: allocation.skills, attributes },
    rng,
  );
  const foci = selectFoci(rules, classDef, level, powerType, rng);
  const loadout = selectEquipment(rules, classDef, level, techLevel);
  const hpBonus = powers.kind === "special" ? powers.special.hpBonus : 0;

  const character: Character = {
    name,
    level,
    className: classDef.name,
    background: background.name,
    powerType,
    techLevel,
    attributes,
    skills: allocation.skills,
    grantedSkills,
    unspentSkillPoints: allocation.unspent,
    foci,
    powers,
    loadout,
    hp: rollHitPoints(classDef, level, attributes.modifiers.CON, rng) + hpBonus,
    attackBonus: attackBonus(classDef, level),
    ac: armorClass(loadout, attributes),
    savingThrows: savingThrows(level, attributes),
  };
  return deepFreeze(character);
}

/** Generates `count` characters from one shared random source. */
export function generateParty(
  rules: RuleTableStore,
  count: number,
  config: GenerationConfig = {},
  random?: Rng,
): Character[] {
  const size = parsePartySize(count);
  const options = parseConfig(config);
  const rng = random ?? createRng(options.seed);
  return Array.from({ length: size }, () => generateCharacter(rules, config, rng));
}
