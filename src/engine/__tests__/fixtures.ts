import { buildAttributes } from "@/engine/attributes";
import type { Rng } from "@/engine/random";
import type { Attributes } from "@/engine/types";
import type { AttributeName } from "@/rules/types";

/** Replays `values` in order, wrapping around at the end. */
export function sequence(...values: number[]): Rng {
  let index = 0;
  return () => {
    const value = values[index % values.length];
    index += 1;
    return value;
  };
}

export function attributesWith(scores: Partial<Record<AttributeName, number>> = {}): Attributes {
  return buildAttributes({ STR: 10, DEX: 10, CON: 10, INT: 10, WIS: 10, CHA: 10, ...scores });
}
