import { describe, expect, it } from "vitest";

import {
  applyRollFloor,
  ATTRIBUTE_ORDER,
  buildAttributes,
  createRng,
  generateAttributes,
  STANDARD_ARRAY,
} from "@/engine";

describe("applyRollFloor", () => {
  it("raises the first lowest score to 14", () => {
    const rolled = { STR: 10, DEX: 8, CON: 8, INT: 12, WIS: 15, CHA: 9 };
    expect(applyRollFloor(rolled)).toEqual({ ...rolled, DEX: 14 });
  });

  it("leaves a set with no score under 14 untouched", () => {
    const rolled = { STR: 15, DEX: 16, CON: 14, INT: 17, WIS: 14, CHA: 18 };
    expect(applyRollFloor(rolled)).toEqual(rolled);
  });

  it("never lowers a score", () => {
    for (let seed = 0; seed < 50; seed += 1) {
      const rng = createRng(`floor-${seed}`);
      const rolled = {
        STR: 3 + Math.floor(rng() * 16),
        DEX: 3 + Math.floor(rng() * 16),
        CON: 3 + Math.floor(rng() * 16),
        INT: 3 + Math.floor(rng() * 16),
        WIS: 3 + Math.floor(rng() * 16),
        CHA: 3 + Math.floor(rng() * 16),
      };
      const adjusted = applyRollFloor(rolled);
      const raised = ATTRIBUTE_ORDER.filter((name) => adjusted[name] !== rolled[name]);
      expect(raised.length).toBeLessThanOrEqual(1);
      for (const name of raised) {
        expect(adjusted[name]).toBe(14);
        expect(adjusted[name]).toBeGreaterThan(rolled[name]);
      }
    }
  });
});

describe("generateAttributes", () => {
  it("rolls 3d6 in order then applies the floor", () => {
    const attributes = generateAttributes("roll", () => 0);
    expect(attributes.scores).toEqual({ STR: 14, DEX: 3, CON: 3, INT: 3, WIS: 3, CHA: 3 });
    expect(attributes.modifiers).toEqual({ STR: 2, DEX: -4, CON: -4, INT: -4, WIS: -4, CHA: -4 });
  });

  it("assigns the standard array by shuffle", () => {
    const attributes = generateAttributes("array", () => 0);
    expect(attributes.scores).toEqual({ STR: 12, DEX: 11, CON: 10, INT: 9, WIS: 7, CHA: 14 });
  });

  it("always produces a permutation of the standard array", () => {
    const expected = [...STANDARD_ARRAY].sort((a, b) => a - b);
    for (let seed = 0; seed < 100; seed += 1) {
      const { scores } = generateAttributes("array", createRng(`array-${seed}`));
      expect(Object.values(scores).sort((a, b) => a - b)).toEqual(expected);
    }
  });

  it("keeps every rolled score within 3-18", () => {
    for (let seed = 0; seed < 100; seed += 1) {
      const { scores } = generateAttributes("roll", createRng(`roll-${seed}`));
      for (const score of Object.values(scores)) {
        expect(score).toBeGreaterThanOrEqual(3);
        expect(score).toBeLessThanOrEqual(18);
      }
    }
  });

  it("freezes the result", () => {
    const attributes = buildAttributes({ STR: 9, DEX: 9, CON: 9, INT: 9, WIS: 9, CHA: 9 });
    expect(Object.isFrozen(attributes)).toBe(true);
    expect(Object.isFrozen(attributes.scores)).toBe(true);
    expect(Object.isFrozen(attributes.modifiers)).toBe(true);
  });
});
