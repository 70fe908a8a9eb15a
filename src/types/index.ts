export type { StudentProfile, RiasecScoresInput } from "../schemas/student-schemas";

/* The six RIASEC axes, in declaration order. Order is significant for tie-breaking. */
export const RIASEC_AXES = [
  "realistic",
  "investigative",
  "artistic",
  "social",
  "enterprising",
  "conventional",
] as const;

export type RiasecAxis = (typeof RIASEC_AXES)[number];

export type RiasecScores = Record<RiasecAxis, number>;

export type AnalysisKind =
  | "riasec"
  | "career-recommendation"
  | "learning-path"
  | "chat";

export type AnalysisSource = "ai" | "fallback";

export type AnalysisFailureKind =
  | "GatewayUnavailable"
  | "MalformedResponse"
  | "PermanentRequestError"
  | "Unexpected";

interface AnalysisResultBase {
  source: AnalysisSource;
  /* Present only on fallback results: why the AI path was abandoned. */
  failure?: AnalysisFailureKind;
}

export interface RiasecAnalysis extends RiasecScores {
  dominantTypes: string;
  /* Derived from `dominantTypes`. */
  personalityDescription: string;
  /* Broad fields for the first two letters of `dominantTypes`. */
  recommendedFields: string[];
  analysis: string;
  careerSuggestions: string[];
}

export interface CareerRecommendation {
  title: string;
  description?: string;
  /* Match confidence in [0, 1]. */
  matchScore?: number;
  salaryRange?: string;
  growth?: string;
}

export interface CareerAnalysis {
  recommendations: CareerRecommendation[];
  skillsToDevelop: string[];
  industryInsights: string;
  actionPlan: string[];
}

export interface RiasecAnalysisResult extends AnalysisResultBase, RiasecAnalysis {
  kind: "riasec";
}

export interface CareerAnalysisResult extends AnalysisResultBase, CareerAnalysis {
  kind: "career-recommendation";
}

export interface LearningPathResult extends AnalysisResultBase {
  kind: "learning-path";
  text: string;
}

export interface ChatResult extends AnalysisResultBase {
  kind: "chat";
  text: string;
}

export type AnalysisResult =
  | RiasecAnalysisResult
  | CareerAnalysisResult
  | LearningPathResult
  | ChatResult;
