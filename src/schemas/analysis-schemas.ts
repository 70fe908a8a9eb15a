import { z } from "zod";

const nonEmptyText = z.string().trim().min(1);

const riasecScore = z
  .number()
  .min(0)
  .max(100)
  .transform((value) => Math.round(value));

/**
 * Expected JSON shape of a RIASEC analysis from the model.
 * Scores, analysis and suggestions are required: a missing one fails
 * extraction instead of producing a half-filled result. `dominantTypes` is
 * recomputed from the scores, so the model's value is only checked for form.
 */
export const riasecAnalysisSchema = z.object({
  realistic: riasecScore,
  investigative: riasecScore,
  artistic: riasecScore,
  social: riasecScore,
  enterprising: riasecScore,
  conventional: riasecScore,
  dominantTypes: z
    .string()
    .trim()
    .regex(/^[RIASEC]{1,6}$/i, "dominantTypes must be RIASEC letters")
    .transform((code) => code.toUpperCase())
    .optional(),
  analysis: nonEmptyText,
  careerSuggestions: z.array(nonEmptyText).min(1),
});

/*
 * Scores of 2 and above are read as percentages (85 -> 0.85). Values between
 * 1 and 2 fit neither scale and are rejected.
 */
const matchScore = z
  .number()
  .min(0)
  .max(100)
  .refine((value) => value <= 1 || value >= 2, "matchScore must be a fraction or a percentage")
  .transform((value) => (value >= 2 ? value / 100 : value));

export const careerRecommendationSchema = z.object({
  title: nonEmptyText,
  description: nonEmptyText.optional(),
  matchScore: matchScore.optional(),
  salaryRange: nonEmptyText.optional(),
  growth: nonEmptyText.optional(),
});

/**
 * Expected JSON shape of a career recommendation analysis from the model.
 */
export const careerAnalysisSchema = z.object({
  recommendations: z.array(careerRecommendationSchema).min(1),
  skillsToDevelop: z.array(nonEmptyText),
  industryInsights: nonEmptyText,
  actionPlan: z.array(nonEmptyText),
});
