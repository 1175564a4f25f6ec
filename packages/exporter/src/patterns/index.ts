export { PatternTable, DEFAULT_RULES } from "./pattern-table.js";
export { Classifier } from "./classifier.js";
