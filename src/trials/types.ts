import { z } from "zod";

// ClinicalTrials.gov study documents are deeply nested and mostly opaque to us;
// only the identifier is read, everything else is forwarded to the model as-is.

const IdentificationModuleSchema = z
  .object({
    nctId: z.string().optional(),
    briefTitle: z.string().optional(),
  })
  .passthrough();

const ProtocolSectionSchema = z
  .object({
    identificationModule: IdentificationModuleSchema.optional(),
  })
  .passthrough();

export const TrialSchema = z
  .object({
    protocolSection: ProtocolSectionSchema.optional(),
  })
  .passthrough();

/** Either a bare array of studies or the `{ studies: [...] }` envelope of the v2 API */
export const TrialFileSchema = z.union([
  z.array(TrialSchema),
  z.object({ studies: z.array(TrialSchema) }).passthrough(),
]);

export type Trial = z.infer<typeof TrialSchema>;

export const UNKNOWN_TRIAL_ID = "unknown_id";

export function trialId(trial: Trial): string {
  return trial.protocolSection?.identificationModule?.nctId ?? UNKNOWN_TRIAL_ID;
}
