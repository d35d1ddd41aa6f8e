import {
  ATTRIBUTE_ORDER,
  type Character,
  type PowerProfile,
  type SavingThrows,
} from "@/engine/types";
import type { AttributeName, EquipmentItem } from "@/rules/types";

import { formatCredits, formatModifier } from "./util";

export type PowerRecord =
  | { kind: "none" }
  | {
      kind: "spellbook";
      tradition: string;
      style: "fixed-known" | "open-library";
      known: { name: string; level: number }[];
      slots: Record<string, number>;
    }
  | {
      kind: "psychic";
      disciplines: Record<string, number>;
      techniques: { discipline: string; name: string; level: number }[];
      effort: number;
    }
  | {
      kind: "special";
      track: string;
      abilities: { name: string; level: number }[];
      effort: number | null;
      hpBonus: number;
      sacredWeapon: string | null;
    };

/** Plain, JSON-ready view of a character. */
export interface CharacterRecord {
  name: string;
  level: number;
  className: string;
  background: string;
  powerType: string;
  techLevel: number;
  attributes: Record<AttributeName, { score: number; modifier: number }>;
  skills: Record<string, number>;
  foci: { name: string; level: number }[];
  powers: PowerRecord;
  equipment: {
    armor: string | null;
    weapons: string[];
    tools: string[];
    gear: string[];
    spent: number;
    remaining: number;
    encumbrance: number;
  };
  combat: {
    hp: number;
    attackBonus: number;
    ac: number;
    savingThrows: SavingThrows;
  };
}

function sortedSkills(skills: Record<string, number>): Record<string, number> {
  const sorted: Record<string, number> = {};
  for (const name of Object.keys(skills).sort()) {
    if (skills[name] >= 0) {
      sorted[name] = skills[name];
    }
  }
  return sorted;
}

function toPowerRecord(powers: PowerProfile): PowerRecord {
  switch (powers.kind) {
    case "none":
      return { kind: "none" };
    case "spellbook": {
      const { spellbook } = powers;
      return {
        kind: "spellbook",
        tradition: spellbook.tradition,
        style: spellbook.style,
        known: spellbook.known.map(({ name, level }) => ({ name, level })),
        slots: Object.fromEntries(Object.entries(spellbook.slots)),
      };
    }
    case "psychic": {
      const { psychic } = powers;
      return {
        kind: "psychic",
        disciplines: { ...psychic.disciplines },
        techniques: psychic.techniques.map(({ discipline, name, level }) => ({
          discipline,
          name,
          level,
        })),
        effort: psychic.effort,
      };
    }
    case "special": {
      const { special } = powers;
      return {
        kind: "special",
        track: special.track,
        abilities: special.grants.map(({ name, level }) => ({ name, level })),
        effort: special.effort,
        hpBonus: special.hpBonus,
        sacredWeapon: special.sacredWeapon?.type ?? null,
      };
    }
  }
}

export function toCharacterRecord(character: Character): CharacterRecord {
  const attribute = (name: AttributeName) => ({
    score: character.attributes.scores[name],
    modifier: character.attributes.modifiers[name],
  });
  const attributes = {
    STR: attribute("STR"),
    DEX: attribute("DEX"),
    CON: attribute("CON"),
    INT: attribute("INT"),
    WIS: attribute("WIS"),
    CHA: attribute("CHA"),
  };
  const names = (items: readonly EquipmentItem[]) => items.map((item) => item.name);
  const { loadout } = character;

  return {
    name: character.name,
    level: character.level,
    className: character.className,
    background: character.background,
    powerType: character.powerType,
    techLevel: character.techLevel,
    attributes,
    skills: sortedSkills(character.skills),
    foci: character.foci.map(({ name, level }) => ({ name, level })),
    powers: toPowerRecord(character.powers),
    equipment: {
      armor: loadout.armor?.name ?? null,
      weapons: names(loadout.weapons),
      tools: names(loadout.tools),
      gear: names(loadout.gear),
      spent: loadout.spent,
      remaining: loadout.remaining,
      encumbrance: loadout.encumbrance,
    },
    combat: {
      hp: character.hp,
      attackBonus: character.attackBonus,
      ac: character.ac,
      savingThrows: { ...character.savingThrows },
    },
  };
}

function powerLines(powers: PowerProfile): string[] {
  switch (powers.kind) {
    case "none":
      return ["  None"];
    case "spellbook": {
      const { spellbook } = powers;
      const unit = spellbook.style === "open-library" ? "prepared" : "slots";
      const lines = [`  ${spellbook.tradition} (${spellbook.style})`];
      for (const [level, count] of Object.entries(spellbook.slots)) {
        const known = spellbook.known
          .filter((spell) => spell.level === Number(level))
          .map((spell) => spell.name);
        lines.push(`  Level ${level}: ${count} ${unit}; ${known.join(", ") || "none"}`);
      }
      return lines;
    }
    case "psychic": {
      const { psychic } = powers;
      const lines = [`  Effort ${psychic.effort}`];
      for (const [discipline, level] of Object.entries(psychic.disciplines)) {
        const techniques = psychic.techniques
          .filter((technique) => technique.discipline === discipline)
          .map((technique) => technique.name);
        lines.push(`  ${discipline}-${level}: ${techniques.join(", ")}`);
      }
      return lines;
    }
    case "special": {
      const { special } = powers;
      const effort = special.effort === null ? "" : ` | Effort ${special.effort}`;
      const lines = [`  ${special.track}${effort}`];
      for (const grant of special.grants) {
        lines.push(`  L${grant.level} ${grant.name}`);
      }
      if (special.sacredWeapon) {
        lines.push(`  Sacred weapon: ${special.sacredWeapon.type} (${special.sacredWeapon.damage})`);
      }
      if (special.hpBonus > 0) {
        lines.push(`  HP bonus ${formatModifier(special.hpBonus)}`);
      }
      return lines;
    }
  }
}

function listOrNone(items: readonly EquipmentItem[]): string {
  return items.length > 0 ? items.map((item) => item.name).join(", ") : "none";
}

/** The character as a plain-text sheet, one entry per line. */
export function formatCharacterSheet(character: Character): string[] {
  const { attributes, loadout, savingThrows } = character;
  const skills = sortedSkills(character.skills);
  const armor = loadout.armor ? `${loadout.armor.name} (AC ${loadout.armor.ac ?? 10})` : "none";

  return [
    character.name,
    `Level ${character.level} ${character.className} (${character.background})`,
    `Power: ${character.powerType} | Tech level ${character.techLevel}`,
    `HP ${character.hp} | AC ${character.ac} | Attack ${formatModifier(character.attackBonus)}`,
    `Saves: Physical ${savingThrows.physical}, Evasion ${savingThrows.evasion}, Mental ${savingThrows.mental}`,
    "Attributes",
    ...ATTRIBUTE_ORDER.map(
      (name) =>
        `  ${name} ${attributes.scores[name]} (${formatModifier(attributes.modifiers[name])})`,
    ),
    "Skills",
    ...Object.entries(skills).map(([name, level]) => `  ${name}-${level}`),
    "Foci",
    ...(character.foci.length > 0
      ? character.foci.map((focus) => `  ${focus.name} (${focus.level})`)
      : ["  none"]),
    "Powers",
    ...powerLines(character.powers),
    "Equipment",
    `  Armor: ${armor}`,
    `  Weapons: ${listOrNone(loadout.weapons)}`,
    `  Tools: ${listOrNone(loadout.tools)}`,
    `  Gear: ${listOrNone(loadout.gear)}`,
    `  Credits: ${formatCredits(loadout.remaining)} remaining of ${formatCredits(loadout.budget)} | Encumbrance ${loadout.encumbrance}`,
  ];
}
