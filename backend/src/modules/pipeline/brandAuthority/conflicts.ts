/**
 * Evidence checks run when brand authority overwrites a field.
 * Checks are ordered; the first one whose implied value differs from the authority value is the conflict.
 * A check that agrees with the authority does not stop the scan.
 */

import { fold } from "../text.js";

export const HPP_TREATMENT_FIELD = "HPP Treatment";
export const CLAIM_TEXT_FIELDS = ["Claims", "Notes"] as const;

/** What the record said about itself before authority overwrote anything. */
export type Evidence = {
  /** resolved HPP Treatment ("Yes" / "No" / "") */
  hppTreatment: string;
  /** Processing Method exactly as it arrived */
  processingRaw: string;
  /** values the cascade produced for the two authority fields, "" when none */
  processingPrior: string;
  extractionPrior: string;
  /** Claims and Notes joined, lower case */
  claimText: string;
};

export type Contradiction = {
  evidenceSource: string;
  evidenceValue: string;
};

type Check = (e: Evidence) => Contradiction | null;

function implies(cond: boolean, evidenceSource: string, evidenceValue: string): Contradiction | null {
  return cond ? { evidenceSource, evidenceValue } : null;
}

function mentionsNotFromConcentrate(text: string): boolean {
  return text.includes("not from concentrate");
}

const PROCESSING_HPP_SPELLINGS = ["hpp", "hpp treated", "hpp treatment"];
const PROCESSING_PASTEURIZED_SPELLINGS = ["pasteurized", "pasteurised", "flash pasteurized", "flash pasteurised"];

const EXTRACTION_CHECKS: readonly Check[] = [
  (e) => implies(e.hppTreatment === "Yes", "HPP Treatment = Yes", "Cold Pressed"),
  (e) => implies(e.processingPrior === "HPP", "Processing Method = HPP", "Cold Pressed"),
  (e) => implies(fold(e.processingRaw) === "freshly squeezed", `Processing Method = ${e.processingRaw}`, "Squeezed"),
  (e) => implies(mentionsNotFromConcentrate(e.claimText), "Claims/Notes: 'not from concentrate'", "Squeezed"),
  (e) =>
    implies(
      !mentionsNotFromConcentrate(e.claimText) && e.claimText.includes("from concentrate"),
      "Claims/Notes: 'from concentrate'",
      "From Concentrate",
    ),
  (e) =>
    implies(
      e.claimText.includes("cold pressed") || e.claimText.includes("cold-pressed"),
      "Claims/Notes: 'cold pressed'",
      "Cold Pressed",
    ),
  (e) => implies(e.claimText.includes("squeezed"), "Claims/Notes: 'squeezed'", "Squeezed"),
  (e) => implies(e.extractionPrior !== "", "rule cascade", e.extractionPrior),
];

const PROCESSING_CHECKS: readonly Check[] = [
  (e) => implies(e.hppTreatment === "Yes", "HPP Treatment = Yes", "HPP"),
  (e) => implies(e.hppTreatment === "No", "HPP Treatment = No", "Pasteurized"),
  (e) =>
    implies(PROCESSING_HPP_SPELLINGS.includes(fold(e.processingRaw)), `Processing Method = ${e.processingRaw}`, "HPP"),
  (e) =>
    implies(
      PROCESSING_PASTEURIZED_SPELLINGS.includes(fold(e.processingRaw)),
      `Processing Method = ${e.processingRaw}`,
      "Pasteurized",
    ),
  (e) => implies(/\bhpp\b/.test(e.claimText), "Claims/Notes: 'hpp'", "HPP"),
  (e) =>
    implies(
      /(?<!un|not )pasteuri[sz]ed/.test(e.claimText),
      "Claims/Notes: 'pasteurised'",
      "Pasteurized",
    ),
  (e) => implies(e.processingPrior !== "", "rule cascade", e.processingPrior),
];

function firstContradiction(checks: readonly Check[], evidence: Evidence, authorityValue: string): Contradiction | null {
  for (const check of checks) {
    const hit = check(evidence);
    if (hit && hit.evidenceValue !== authorityValue) return hit;
  }
  return null;
}

export function extractionConflict(evidence: Evidence, authorityValue: string): Contradiction | null {
  return firstContradiction(EXTRACTION_CHECKS, evidence, authorityValue);
}

export function processingConflict(evidence: Evidence, authorityValue: string): Contradiction | null {
  return firstContradiction(PROCESSING_CHECKS, evidence, authorityValue);
}
