import backgrounds from "./data/backgrounds.json";
import classes from "./data/classes.json";
import disciplines from "./data/disciplines.json";
import equipment from "./data/equipment.json";
import foci from "./data/foci.json";
import names from "./data/names.json";
import skills from "./data/skills.json";
import tracks from "./data/tracks.json";
import traditions from "./data/traditions.json";
import { createRuleTableStore } from "./store";
import type { RuleTableStore } from "./types";

export * from "./types";
export { MAX_LEVEL, SPELL_LEVELS, ruleTablesSchema } from "./schema";
export {
  createRuleTableStore,
  getBackground,
  getClass,
  getDiscipline,
  getTrack,
  getTradition,
} from "./store";

/** The bundled tables in the shape `createRuleTableStore` accepts. */
export function getDefaultRawTables(): Record<string, unknown> {
  return {
    ...skills,
    ...backgrounds,
    ...classes,
    ...foci,
    ...traditions,
    ...disciplines,
    ...tracks,
    ...equipment,
    ...names,
  };
}

let defaultTables: RuleTableStore | null = null;

export function getDefaultRuleTables(): RuleTableStore {
  if (!defaultTables) {
    defaultTables = createRuleTableStore(getDefaultRawTables());
  }
  return defaultTables;
}
