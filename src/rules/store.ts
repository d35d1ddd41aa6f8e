import type { ZodIssue } from "zod";

import { DataIntegrityError, UnknownClassOrTraditionError } from "@/engine/errors";
import { deepFreeze } from "@/lib/util";

import { ruleTablesSchema } from "./schema";
import {
  ANY_COMBAT,
  ANY_SKILL,
  type AbilityTrack,
  type Background,
  type ClassDefinition,
  type Discipline,
  type RuleTableStore,
  type RuleTables,
  type Tradition,
} from "./types";

function formatIssue(issue: ZodIssue): DataIntegrityError {
  return new DataIntegrityError(issue.path.join("."), issue.message);
}

function indexByName<T extends { name: string }>(
  entries: readonly T[],
  table: string,
): Map<string, T> {
  const index = new Map<string, T>();
  entries.forEach((entry, position) => {
    if (index.has(entry.name)) {
      throw new DataIntegrityError(`${table}.${position}.name`, `duplicate entry "${entry.name}"`);
    }
    index.set(entry.name, entry);
  });
  return index;
}

function checkReferences(tables: RuleTables, store: RuleTableStore): void {
  const known = new Set(store.skillNames);
  const placeholders = new Set([ANY_COMBAT, ANY_SKILL]);

  tables.backgrounds.forEach((background, index) => {
    const skills = [background.freeSkill, ...background.quickSkills];
    for (const skill of skills) {
      if (!known.has(skill) && !placeholders.has(skill)) {
        throw new DataIntegrityError(
          `backgrounds.${index}`,
          `"${background.name}" grants unknown skill "${skill}"`,
        );
      }
    }
    if (background.classSpecific && !store.classes.has(background.classSpecific)) {
      throw new DataIntegrityError(
        `backgrounds.${index}.classSpecific`,
        `unknown class "${background.classSpecific}"`,
      );
    }
  });

  tables.classes.forEach((definition, index) => {
    const { power } = definition;
    if (power.kind === "spellcasting" && !store.traditions.has(power.tradition)) {
      throw new DataIntegrityError(
        `classes.${index}.power.tradition`,
        `unknown tradition "${power.tradition}"`,
      );
    }
    if (power.kind === "special" && !store.tracks.has(power.track)) {
      throw new DataIntegrityError(`classes.${index}.power.track`, `unknown track "${power.track}"`);
    }
    if (power.kind === "psychic" && store.disciplines.size === 0) {
      throw new DataIntegrityError(`classes.${index}.power`, "psychic class without disciplines");
    }
    for (const skill of definition.prioritySkills) {
      if (!store.skills.has(skill)) {
        throw new DataIntegrityError(
          `classes.${index}.prioritySkills`,
          `unknown skill "${skill}"`,
        );
      }
    }
  });

  tables.equipment.forEach((item, index) => {
    if (item.category === "armor" && item.ac === undefined) {
      throw new DataIntegrityError(`equipment.${index}.ac`, `armor "${item.name}" has no AC`);
    }
    if (item.category === "weapon" && item.range === undefined) {
      throw new DataIntegrityError(`equipment.${index}.range`, `weapon "${item.name}" has no range`);
    }
  });

  tables.tracks.forEach((track, index) => {
    if (track.effortBase === "skill" && track.skill === undefined) {
      throw new DataIntegrityError(
        `tracks.${index}.effortBase`,
        `"${track.name}" bases effort on a skill it does not name`,
      );
    }
    if (track.style === "automatic") {
      const seen = new Set<number>();
      for (const entry of track.levels) {
        if (seen.has(entry.level)) {
          throw new DataIntegrityError(
            `tracks.${index}.levels`,
            `level ${entry.level} listed twice for "${track.name}"`,
          );
        }
        seen.add(entry.level);
      }
    }
  });
}

/**
 * Validates raw rule tables and indexes them by name. The result is frozen and
 * safe to share between generation calls.
 */
export function createRuleTableStore(raw: unknown): RuleTableStore {
  const parsed = ruleTablesSchema.safeParse(raw);
  if (!parsed.success) {
    throw formatIssue(parsed.error.issues[0]);
  }

  const tables = deepFreeze(parsed.data);
  const skills = indexByName(tables.skills, "skills");
  const disciplines = indexByName(tables.disciplines, "disciplines");
  indexByName(tables.equipment, "equipment");

  const store: RuleTableStore = {
    skills,
    backgrounds: indexByName(tables.backgrounds, "backgrounds"),
    classes: indexByName(tables.classes, "classes"),
    foci: indexByName(tables.foci, "foci"),
    traditions: indexByName(tables.traditions, "traditions"),
    disciplines,
    tracks: indexByName(tables.tracks, "tracks"),
    equipment: tables.equipment,
    names: tables.names,
    skillNames: [...skills.keys(), ...disciplines.keys()],
    disciplineNames: [...disciplines.keys()],
  };

  checkReferences(tables, store);
  return Object.freeze(store);
}

export function getClass(rules: RuleTableStore, name: string): ClassDefinition {
  const definition = rules.classes.get(name);
  if (!definition) {
    throw new UnknownClassOrTraditionError(`Unknown class: ${name}`);
  }
  return definition;
}

export function getBackground(rules: RuleTableStore, name: string): Background {
  const background = rules.backgrounds.get(name);
  if (!background) {
    throw new UnknownClassOrTraditionError(`Unknown background: ${name}`);
  }
  return background;
}

export function getTradition(rules: RuleTableStore, name: string): Tradition {
  const tradition = rules.traditions.get(name);
  if (!tradition) {
    throw new UnknownClassOrTraditionError(`Unknown tradition: ${name}`);
  }
  return tradition;
}

export function getDiscipline(rules: RuleTableStore, name: string): Discipline {
  const discipline = rules.disciplines.get(name);
  if (!discipline) {
    throw new UnknownClassOrTraditionError(`Unknown discipline: ${name}`);
  }
  return discipline;
}

export function getTrack(rules: RuleTableStore, name: string): AbilityTrack {
  const track = rules.tracks.get(name);
  if (!track) {
    throw new UnknownClassOrTraditionError(`Unknown ability track: ${name}`);
  }
  return track;
}
