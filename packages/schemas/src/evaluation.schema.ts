import { z } from 'zod';

export const GoldAnswerSchema = z.enum(['YES', 'NO', 'UNKNOWN']);
export const EpistemicLabelSchema = z.enum(['E', 'C', 'U']);

export const CaseClaimSchema = z.object({
  subj: z.string().min(1),
  pred: z.string().min(1),
  obj: z.string().min(1),
});

export const TestCaseSchema = z.object({
  id: z.string().min(1),
  facts: z.array(z.string()),
  question: z.string(),
  gold: GoldAnswerSchema,
  label: EpistemicLabelSchema,
  claim: CaseClaimSchema,
});

export const EvaluationResultSchema = z.object({
  id: z.string().min(1),
  gold: GoldAnswerSchema,
  pred: z.string(),
  pass: z.boolean(),
  system: z.string().min(1),
  label: z.string(),
});

/** Claim produced by an external extractor, prior to auditing. */
export const ClaimRecordSchema = z.object({
  id: z.string().nullish(),
  claim: z
    .object({
      subject: z.string().nullish(),
      predicate: z.string().nullish(),
      object: z.string().nullish(),
    })
    .default({}),
});

export type ClaimRecord = z.infer<typeof ClaimRecordSchema>;
