import type { AttributeName } from "@/rules/types";

import { InvalidConfigurationError } from "./errors";
import { attributeModifier, rollDice } from "./math";
import { shuffle, type Rng } from "./random";
import { ATTRIBUTE_ORDER, type AttributeMethod, type Attributes } from "./types";

export const STANDARD_ARRAY: readonly number[] = [14, 12, 11, 10, 9, 7];
export const ROLL_FLOOR = 14;

type Scores = Record<AttributeName, number>;

function toScores(values: readonly number[]): Scores {
  const [STR, DEX, CON, INT, WIS, CHA] = values;
  return { STR, DEX, CON, INT, WIS, CHA };
}

export function buildAttributes(scores: Scores): Attributes {
  const modifiers = toScores(ATTRIBUTE_ORDER.map((name) => attributeModifier(scores[name])));
  return Object.freeze({
    scores: Object.freeze({ ...scores }),
    modifiers: Object.freeze(modifiers),
  });
}

/** Raises the lowest score (first on ties) to the floor. */
export function applyRollFloor(rolled: Scores): Scores {
  let lowest: AttributeName = ATTRIBUTE_ORDER[0];
  for (const name of ATTRIBUTE_ORDER) {
    if (rolled[name] < rolled[lowest]) {
      lowest = name;
    }
  }
  return { ...rolled, [lowest]: Math.max(rolled[lowest], ROLL_FLOOR) };
}

export function rollScores(random: Rng): Scores {
  return toScores(ATTRIBUTE_ORDER.map(() => rollDice(3, 6, random).total));
}

export function generateAttributes(method: AttributeMethod, random: Rng): Attributes {
  switch (method) {
    case "roll":
      return buildAttributes(applyRollFloor(rollScores(random)));
    case "array":
      return buildAttributes(toScores(shuffle(random, STANDARD_ARRAY)));
    default:
      throw new InvalidConfigurationError(`Unknown attribute method: ${String(method)}`);
  }
}
