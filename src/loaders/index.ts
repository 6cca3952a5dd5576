export type { EntryLoader } from "./types.js";
export {
  JsonEntryLoader,
  parseEntryDocument,
  parseEntryRow,
  rowsToEntries,
  type ActivityRow,
  type DirectRow,
  type EntryRow,
} from "./json-loader.js";
export { loadReadinessAnswers, parseReadinessAnswers } from "./answers-loader.js";
