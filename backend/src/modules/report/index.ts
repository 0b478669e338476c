export { buildQualityReport } from "./quality.js";
export type { QualityReport } from "./quality.js";
