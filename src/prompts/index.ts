import type { StudentProfile } from "../types";
import { NOT_SPECIFIED } from "../utils/constants";
import { CAREER_PROMPTS } from "./career-prompt";
import { CHAT_PROMPTS } from "./chat-prompt";
import { LEARNING_PATH_PROMPTS } from "./learning-path-prompt";
import {
  formatAcademicPerformance,
  formatDominantTypes,
  formatEducationLevel,
  formatInstitution,
  formatList,
  formatNumber,
  formatRiasecScores,
  formatText,
  formatWorkPreference,
} from "./profile-fields";
import { RIASEC_PROMPTS } from "./riasec-prompt";

export { CAREER_PROMPTS } from "./career-prompt";
export { CHAT_PROMPTS } from "./chat-prompt";
export { LEARNING_PATH_PROMPTS } from "./learning-path-prompt";
export { RIASEC_PROMPTS } from "./riasec-prompt";

export type PromptRequest =
  | { kind: "riasec"; responses: readonly string[] }
  | { kind: "career-recommendation"; profile: StudentProfile }
  | { kind: "learning-path"; profile: StudentProfile; targetCareer: string }
  | { kind: "chat"; message: string; profile?: StudentProfile | null };

/**
 * Utility function to build prompts by replacing placeholders with actual values.
 * Placeholders without a usable value are rendered as "Not specified".
 * Substituted values are not re-scanned, so user text containing `{word}` is left alone.
 * @param template The prompt template containing placeholders in {key} format.
 * @param variables An object mapping placeholder keys to their replacement values.
 * @returns The final prompt string with all placeholders replaced.
 */
export function buildPrompt(
  template: string,
  variables: Record<string, string | undefined>,
): string {
  return template
    .replace(/{(\w+)}/g, (_match, key: string) => {
      const value = variables[key]?.trim();
      return value ? value : NOT_SPECIFIED;
    })
    .trim();
}

function formatResponses(responses: readonly string[]): string {
  const lines = responses
    .map((response) => response.trim())
    .filter((response) => response.length > 0)
    .map((response, index) => `${index + 1}. ${response}`);
  return lines.length > 0 ? lines.join("\n") : NOT_SPECIFIED;
}

/**
 * Turns an analysis request into the instruction text sent to the model.
 * Pure: no I/O, and the same request always yields the same prompt.
 */
export function buildAnalysisPrompt(request: PromptRequest): string {
  switch (request.kind) {
    case "riasec":
      return buildPrompt(RIASEC_PROMPTS.ANALYZE_RESPONSES, {
        responses: formatResponses(request.responses),
      });

    case "career-recommendation": {
      const { profile } = request;
      return buildPrompt(CAREER_PROMPTS.RECOMMEND_CAREERS, {
        educationLevel: formatEducationLevel(profile),
        institution: formatInstitution(profile),
        stream: formatText(profile.stream),
        academicPerformance: formatAcademicPerformance(profile),
        riasecScores: formatRiasecScores(profile),
        dominantTypes: formatDominantTypes(profile),
        interests: formatList(profile.interestedDomains),
        skills: formatList(profile.skills),
        preferredLocations: formatList(profile.preferredLocations),
        workPreference: formatWorkPreference(profile),
        expectedSalary: formatNumber(profile.expectedSalaryLPA, " LPA"),
        age: formatNumber(profile.age),
        careerGoal: formatText(profile.currentCareerGoal),
      });
    }

    case "learning-path": {
      const { profile } = request;
      return buildPrompt(LEARNING_PATH_PROMPTS.GENERATE_PATH, {
        targetCareer: formatText(request.targetCareer),
        educationLevel: formatEducationLevel(profile),
        skills: formatList(profile.skills),
        dominantTypes: formatDominantTypes(profile),
      });
    }

    case "chat": {
      const profile = request.profile ?? {};
      return buildPrompt(CHAT_PROMPTS.COUNSEL, {
        educationLevel: formatEducationLevel(profile),
        interests: formatList(profile.interestedDomains),
        careerGoal: formatText(profile.currentCareerGoal),
        message: formatText(request.message),
      });
    }
  }
}
