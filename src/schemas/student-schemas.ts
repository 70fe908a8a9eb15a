import { z } from "zod";
import { COLLEGE_TIERS, EDUCATION_LEVELS, WORK_PREFERENCES } from "../domain/education";

const score = z.number().int().min(0).max(100);

/**
 * Partial RIASEC score vector as supplied by callers.
 * Axes left out are treated as 0 wherever scores are read.
 */
export const riasecScoresSchema = z.object({
  realistic: score.nullish(),
  investigative: score.nullish(),
  artistic: score.nullish(),
  social: score.nullish(),
  enterprising: score.nullish(),
  conventional: score.nullish(),
});

const stringList = z.array(z.string().trim().min(1)).nullish();

/**
 * Student profile. Every attribute is optional: prompts and fingerprints
 * must cope with any subset of them being absent or null.
 */
export const studentProfileSchema = z.object({
  id: z.string().trim().min(1).nullish(),
  fullName: z.string().trim().min(2).max(100).nullish(),
  age: z.number().int().min(13).max(35).nullish(),
  city: z.string().trim().min(1).nullish(),
  state: z.string().trim().min(1).nullish(),

  educationLevel: z.enum(EDUCATION_LEVELS).nullish(),
  institutionName: z.string().trim().min(1).nullish(),
  collegeTier: z.enum(COLLEGE_TIERS).nullish(),
  stream: z.string().trim().min(1).nullish(),
  cgpa: z.number().min(0).max(10).nullish(),
  percentage: z.number().min(0).max(100).nullish(),

  riasecScores: riasecScoresSchema.nullish(),

  interestedDomains: stringList,
  skills: stringList,
  preferredLocations: stringList,
  workPreference: z.enum(WORK_PREFERENCES).nullish(),
  expectedSalaryLPA: z.number().min(0).nullish(),
  currentCareerGoal: z.string().trim().min(1).nullish(),
});

export type StudentProfile = z.infer<typeof studentProfileSchema>;
export type RiasecScoresInput = z.infer<typeof riasecScoresSchema>;

/* Body of a profile update: any subset of fields, the id comes from the path. */
export const studentProfileUpdateSchema = studentProfileSchema.omit({ id: true });

export const riasecSubmissionSchema = z.object({
  responses: z
    .array(z.string().trim().min(1))
    .min(3, "At least 3 responses are required"),
});

export const chatRequestSchema = z.object({
  message: z.string().trim().min(1, "message is required").max(2000),
  studentId: z.string().trim().min(1).optional(),
});
