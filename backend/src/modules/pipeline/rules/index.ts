export { evaluatePredicate, lookupValue, resolveByRules } from "./rules.js";
export type { CascadeResult, RuleInput } from "./types.js";
