/**
 * Prompt for full career recommendations from a student profile.
 * Profile attributes arrive pre-rendered; absent ones read "Not specified".
 */
export const CAREER_PROMPTS = {
  RECOMMEND_CAREERS: `
    As an expert career counselor for Indian students, analyze this student profile and provide comprehensive career recommendations.

    Student Profile:
    - Education: {educationLevel}
    - Institution: {institution}
    - Stream: {stream}
    {academicPerformance}
    - RIASEC Scores: {riasecScores}
    - Dominant Personality Types: {dominantTypes}
    - Interests: {interests}
    - Current Skills: {skills}
    - Preferred Locations: {preferredLocations}
    - Work Preference: {workPreference}
    - Expected Salary: {expectedSalary}
    - Age: {age}
    - Career Goal: {careerGoal}

    Consider:
    1. Indian job market trends
    2. Salary expectations in LPA
    3. Growth prospects
    4. Skills gap analysis
    5. College tier impact on opportunities

    Respond ONLY with a JSON object with these fields:
    - "recommendations": an array of the top 5 careers, each with "title", "description",
      "matchScore" (a number between 0 and 1), "salaryRange" (Indian salary range in LPA) and "growth"
    - "skillsToDevelop": an array of skills to develop
    - "industryInsights": a short paragraph
    - "actionPlan": an array of concrete next steps
  `,
} as const;
