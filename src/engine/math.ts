import { randomInt, type Rng } from "./random";

export interface DiceRoll {
  total: number;
  detail: number[];
}

export function rollDie(sides: number, random: Rng): number {
  return randomInt(random, 1, Math.max(1, sides));
}

export function rollDice(count: number, sides: number, random: Rng): DiceRoll {
  const detail: number[] = [];
  for (let i = 0; i < count; i += 1) {
    detail.push(rollDie(sides, random));
  }
  return { total: detail.reduce((sum, value) => sum + value, 0), detail };
}

export function attributeModifier(score: number): number {
  return Math.floor((score - 10) / 2);
}

export function skillCapForLevel(level: number): number {
  if (level <= 2) {
    return 1;
  }
  if (level <= 5) {
    return 2;
  }
  if (level <= 8) {
    return 3;
  }
  return 4;
}

/** Points gained moving from `level` to `level + 1`. */
export function skillPointsForLevelUp(level: number): number {
  return level + 2;
}
