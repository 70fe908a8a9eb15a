export const LEARNING_PATH_PROMPTS = {
  GENERATE_PATH: `
    Create a detailed learning path for an Indian student to transition into {targetCareer}.

    Current Profile:
    - Education: {educationLevel}
    - Current Skills: {skills}
    - Dominant Personality Types: {dominantTypes}

    Provide a 6-month structured learning plan with:
    1. Essential skills to learn
    2. Recommended courses/certifications
    3. Projects to build
    4. Indian companies/startups to target
    5. Timeline and milestones
    6. Resources (free and paid)

    Focus on practical, actionable steps relevant to the Indian job market.
  `,
} as const;
