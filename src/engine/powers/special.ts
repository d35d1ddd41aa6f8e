import type { AbilityTrack } from "@/rules/types";

import { pick, randomInt, type Rng } from "../random";
import type { AbilityGrant, Attributes, SkillSet, SpecialAbilitySet } from "../types";

export function oddLevelsReached(level: number): number {
  return Math.ceil(Math.max(0, level) / 2);
}

function automaticGrants(
  track: Extract<AbilityTrack, { style: "automatic" }>,
  level: number,
): AbilityGrant[] {
  return [...track.levels]
    .filter((entry) => entry.level <= level)
    .sort((a, b) => a.level - b.level)
    .flatMap((entry) =>
      entry.abilities.map((ability): AbilityGrant => ({ ...ability, level: entry.level, mode: "automatic" })),
    );
}

function evenLevelGrants(
  track: Extract<AbilityTrack, { style: "even-level" }>,
  level: number,
  random: Rng,
): AbilityGrant[] {
  const pool = [...track.pool];
  const grants: AbilityGrant[] = [];
  for (let current = 2; current <= level; current += 2) {
    if (pool.length === 0) {
      break;
    }
    const [ability] = pool.splice(randomInt(random, 0, pool.length - 1), 1);
    grants.push({ ...ability, level: current, mode: "selected" });
  }
  return grants;
}

function effortBase(track: AbilityTrack, grants: readonly AbilityGrant[], skills: SkillSet): number {
  if (track.effortBase === "skill") {
    return track.skill === undefined ? 0 : Math.max(0, skills[track.skill] ?? 0);
  }
  return grants.filter((grant) => grant.mode === "selected").length;
}

export function trackEffort(
  track: AbilityTrack,
  grants: readonly AbilityGrant[],
  attributes: Attributes,
  skills: SkillSet = {},
): number | null {
  if (!track.effortAttributes) {
    return null;
  }
  const [first, second] = track.effortAttributes;
  const bonus = Math.max(attributes.modifiers[first], attributes.modifiers[second]);
  return Math.max(1, effortBase(track, grants, skills) + bonus);
}

export function buildSpecialAbilities(
  track: AbilityTrack,
  level: number,
  attributes: Attributes,
  random: Rng,
  skills: SkillSet = {},
): SpecialAbilitySet {
  const grants = track.levelOne.map((ability): AbilityGrant => ({
    ...ability,
    level: 1,
    mode: "automatic",
  }));
  grants.push(
    ...(track.style === "automatic"
      ? automaticGrants(track, level)
      : evenLevelGrants(track, level, random)),
  );

  const result: SpecialAbilitySet = {
    track: track.name,
    grants,
    effort: trackEffort(track, grants, attributes, skills),
    hpBonus: track.oddLevelHpBonus * oddLevelsReached(level),
  };
  const weapon = pick(random, track.sacredWeapons);
  if (weapon) {
    result.sacredWeapon = weapon;
  }
  return result;
}
