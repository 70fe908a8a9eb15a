/**
 * Levels in the Indian education system, mapped to the labels used in prompts.
 */
export const EDUCATION_LEVEL_LABELS = {
  CLASS_10: "Class 10",
  CLASS_12_SCIENCE: "Class 12 - Science",
  CLASS_12_COMMERCE: "Class 12 - Commerce",
  CLASS_12_ARTS: "Class 12 - Arts",
  DIPLOMA: "Diploma",
  BACHELOR_ENGINEERING: "Bachelor's - Engineering",
  BACHELOR_MEDICAL: "Bachelor's - Medical",
  BACHELOR_COMMERCE: "Bachelor's - Commerce",
  BACHELOR_SCIENCE: "Bachelor's - Science",
  BACHELOR_ARTS: "Bachelor's - Arts",
  BACHELOR_LAW: "Bachelor's - Law",
  BACHELOR_OTHER: "Bachelor's - Other",
  MASTER_ENGINEERING: "Master's - Engineering",
  MASTER_MANAGEMENT: "Master's - Management",
  MASTER_SCIENCE: "Master's - Science",
  MASTER_ARTS: "Master's - Arts",
  MASTER_COMMERCE: "Master's - Commerce",
  MASTER_LAW: "Master's - Law",
  MASTER_OTHER: "Master's - Other",
  DOCTORATE: "Doctorate",
  PROFESSIONAL_COURSE: "Professional Course",
} as const;

export type EducationLevel = keyof typeof EDUCATION_LEVEL_LABELS;

export const EDUCATION_LEVELS = [
  "CLASS_10",
  "CLASS_12_SCIENCE",
  "CLASS_12_COMMERCE",
  "CLASS_12_ARTS",
  "DIPLOMA",
  "BACHELOR_ENGINEERING",
  "BACHELOR_MEDICAL",
  "BACHELOR_COMMERCE",
  "BACHELOR_SCIENCE",
  "BACHELOR_ARTS",
  "BACHELOR_LAW",
  "BACHELOR_OTHER",
  "MASTER_ENGINEERING",
  "MASTER_MANAGEMENT",
  "MASTER_SCIENCE",
  "MASTER_ARTS",
  "MASTER_COMMERCE",
  "MASTER_LAW",
  "MASTER_OTHER",
  "DOCTORATE",
  "PROFESSIONAL_COURSE",
] as const satisfies readonly EducationLevel[];

export const COLLEGE_TIER_LABELS = {
  TIER_1: "Tier 1 (Premier Institutions)",
  TIER_2: "Tier 2 (Good State/Private Universities)",
  TIER_3: "Tier 3 (Local/Regional Colleges)",
  AUTONOMOUS: "Autonomous Institution",
  INTERNATIONAL: "International University",
} as const;

export type CollegeTier = keyof typeof COLLEGE_TIER_LABELS;

export const COLLEGE_TIERS = [
  "TIER_1",
  "TIER_2",
  "TIER_3",
  "AUTONOMOUS",
  "INTERNATIONAL",
] as const satisfies readonly CollegeTier[];

export const WORK_PREFERENCE_LABELS = {
  REMOTE: "Remote",
  HYBRID: "Hybrid",
  ONSITE: "On-site",
  FLEXIBLE: "Flexible",
} as const;

export type WorkPreference = keyof typeof WORK_PREFERENCE_LABELS;

export const WORK_PREFERENCES = [
  "REMOTE",
  "HYBRID",
  "ONSITE",
  "FLEXIBLE",
] as const satisfies readonly WorkPreference[];
