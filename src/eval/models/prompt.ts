import { createHash } from "node:crypto";
import type { Trial } from "../../trials/types.js";

const RESPONSE_FORMAT = `{
  "unclear_criteria": <list of inclusion/exclusion criteria that cannot be determined from the patient data>,
  "eligibility_probability": <probability (0-100) that the patient currently meets every eligibility criterion>,
  "clinical_benefit_score": <score up to 100 for how medical experts would rate the benefit to this patient, especially against any goals in the patient data. Weigh how recent the study is, its enrollment, the treatment type, the trial phase and the standing of the sponsor or investigators>,
  "total_score": <clinical_benefit_score * eligibility_probability / 100>,
  "reasoning": <brief reasoning behind both scores>,
  "treatment_type": <1-6 word summary of the treatment type, e.g. KRAS inhibitor>,
  "number_of_patients": <expected enrollment>,
  "trial_phase": <phase or phases of the trial>,
  "start_date": <expected start date>,
  "location": <location or list of locations>,
  "link": <URL of the trial on clinicaltrials.gov>,
  "drug": <name of the drug under study, if any>
}`;

/**
 * Construct the single user prompt for one trial-patient pairing.
 * @param trial Trial document, serialized in full
 * @param patient Free-text patient profile
 */
export function buildEvaluationPrompt(trial: Trial, patient: string): string {
  const trialDetails = JSON.stringify(trial, null, 2);

  return `Acting as a medical expert, or a team of the relevant experts, evaluate how relevant the clinical trial below is for this patient.

Patient data:
${patient.trim()}

Full details of the clinical trial:
${trialDetails}

Respond in this JSON format:

${RESPONSE_FORMAT}

Respond with a single valid JSON object in exactly this format and nothing else; the whole response is parsed as JSON.`;
}

/**
 * Short, stable fingerprint of a prompt for log correlation.
 * @returns First 16 hex chars of SHA-256
 */
export function hashPrompt(prompt: string): string {
  return createHash("sha256").update(prompt).digest("hex").slice(0, 16);
}
