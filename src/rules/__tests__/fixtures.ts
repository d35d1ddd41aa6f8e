/** A deliberately tiny rule set for edge cases the bundled tables never hit. */
export function minimalTables() {
  return {
    skills: [{ name: "Scout", combat: false }],
    backgrounds: [
      { name: "Drifter", freeSkill: "Scout", quickSkills: ["Scout", "AnyCombat", "AnySkill"] },
    ],
    classes: [
      {
        name: "Vagrant",
        hitDie: { sides: 6, bonus: 0 },
        skillPoints: 3,
        foci: { base: 1, bonus: null },
        archetype: "non-combat",
        attack: "half",
        startingCredits: 1000,
        prioritySkills: ["Scout"],
        power: { kind: "none" },
      },
    ],
    foci: [{ name: "Lucky", combat: false, levelOne: "Reroll once per day.", levelTwo: "Reroll twice per day." }],
    traditions: [],
    disciplines: [],
    tracks: [],
    equipment: [
      { name: "Gilded Plate", category: "armor", techLevel: 0, cost: 5000, encumbrance: 3, ac: 18 },
    ],
    names: { first: ["Test"], last: ["Subject"] },
  };
}
