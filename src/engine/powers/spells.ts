import { SPELL_LEVELS } from "@/rules/schema";
import type { Spell, Tradition } from "@/rules/types";

import { randomInt, sample, type Rng } from "../random";
import type { Spellbook } from "../types";

type OpenLibrary = Extract<Tradition, { style: "open-library" }>;

function spellsAtLevel(tradition: Tradition, spellLevel: number): Spell[] {
  return tradition.spells.filter((spell) => spell.level === spellLevel);
}

function rowFor(table: readonly number[][], level: number): readonly number[] {
  return table[Math.min(table.length, Math.max(1, level)) - 1];
}

/** Non-zero columns of a progression row, keyed by spell level. */
export function rowToRecord(row: readonly number[]): Record<number, number> {
  const record: Record<number, number> = {};
  row.forEach((count, index) => {
    if (count > 0) {
      record[index + 1] = count;
    }
  });
  return record;
}

function libraryDraw(characterLevel: number, random: Rng): number {
  return characterLevel <= 5 ? randomInt(random, 2, 4) : randomInt(random, 5, 8);
}

/**
 * Library size per spell level after growing it at every character level up
 * to `level`. Targets never shrink and never fall below the prepared count.
 */
export function libraryTargets(tradition: OpenLibrary, level: number, random: Rng): number[] {
  const targets = new Array<number>(SPELL_LEVELS).fill(0);
  for (let current = 1; current <= level; current += 1) {
    const prepared = rowFor(tradition.prepared, current);
    prepared.forEach((count, index) => {
      if (count > 0) {
        targets[index] = Math.max(targets[index], libraryDraw(current, random), count);
      }
    });
  }
  return targets;
}

function drawKnown(tradition: Tradition, targets: readonly number[], random: Rng): Spell[] {
  const known: Spell[] = [];
  targets.forEach((target, index) => {
    known.push(...sample(random, spellsAtLevel(tradition, index + 1), target));
  });
  return known;
}

export function buildSpellbook(tradition: Tradition, level: number, random: Rng): Spellbook {
  if (tradition.style === "fixed-known") {
    return {
      tradition: tradition.name,
      style: tradition.style,
      known: drawKnown(tradition, rowFor(tradition.known, level), random),
      slots: rowToRecord(rowFor(tradition.slots, level)),
    };
  }

  return {
    tradition: tradition.name,
    style: tradition.style,
    known: drawKnown(tradition, libraryTargets(tradition, level, random), random),
    slots: rowToRecord(rowFor(tradition.prepared, level)),
  };
}

export function countBySpellLevel(spells: readonly Spell[]): Record<number, number> {
  const counts: Record<number, number> = {};
  for (const spell of spells) {
    counts[spell.level] = (counts[spell.level] ?? 0) + 1;
  }
  return counts;
}
