/**
 * Prompt for scoring free-text assessment answers on the six RIASEC axes.
 * The model is asked for a JSON object matching riasecAnalysisSchema.
 */
export const RIASEC_PROMPTS = {
  ANALYZE_RESPONSES: `
    As an expert career counselor specializing in Indian students, analyze the following responses to determine RIASEC personality scores.

    Student Responses:
    {responses}

    Provide RIASEC scores (0-100) based on these responses:
    - Realistic (R): Practical, hands-on activities
    - Investigative (I): Analytical, research-oriented activities
    - Artistic (A): Creative, expressive activities
    - Social (S): People-oriented, helping activities
    - Enterprising (E): Leadership, business activities
    - Conventional (C): Organized, detail-oriented activities

    Respond ONLY with a JSON object with these fields:
    - "realistic", "investigative", "artistic", "social", "enterprising", "conventional": integer scores 0-100
    - "dominantTypes": the letters of the top 3 types, highest first (e.g. "IRS")
    - "analysis": a brief explanation
    - "careerSuggestions": an array of 3 career titles
  `,
} as const;
