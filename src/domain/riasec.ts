import riasecProfiles from "../data/riasec-profiles.json";
import {
  RIASEC_AXES,
  type RiasecAxis,
  type RiasecScores,
  type RiasecScoresInput,
} from "../types";

const AXIS_INITIALS: Record<RiasecAxis, string> = {
  realistic: "R",
  investigative: "I",
  artistic: "A",
  social: "S",
  enterprising: "E",
  conventional: "C",
};

const PERSONALITY_DESCRIPTIONS: Record<string, string | undefined> =
  riasecProfiles.personalityDescriptions;
const CAREER_FIELDS: Record<string, string[] | undefined> =
  riasecProfiles.careerFields;

/**
 * Fills in a complete score vector, treating every absent or null axis as 0.
 */
export function normalizeScores(
  scores: RiasecScoresInput | null | undefined,
): RiasecScores {
  return {
    realistic: scores?.realistic ?? 0,
    investigative: scores?.investigative ?? 0,
    artistic: scores?.artistic ?? 0,
    social: scores?.social ?? 0,
    enterprising: scores?.enterprising ?? 0,
    conventional: scores?.conventional ?? 0,
  };
}

/**
 * Returns the three highest-scoring axes, highest first.
 * Equal scores keep the order in which the axes are declared in RIASEC_AXES,
 * so the result never depends on object iteration order.
 */
export function dominantAxes(
  scores: RiasecScoresInput | null | undefined,
): RiasecAxis[] {
  const full = normalizeScores(scores);

  return RIASEC_AXES.map((axis, position) => ({ axis, position }))
    .sort(
      (a, b) => full[b.axis] - full[a.axis] || a.position - b.position,
    )
    .slice(0, 3)
    .map(({ axis }) => axis);
}

/* Dominant axes as a letter code, e.g. "IRS". */
export function dominantCode(
  scores: RiasecScoresInput | null | undefined,
): string {
  return dominantAxes(scores)
    .map((axis) => AXIS_INITIALS[axis])
    .join("");
}

export function axisInitial(axis: RiasecAxis): string {
  return AXIS_INITIALS[axis];
}

export function describePersonality(code: string): string {
  if (code.length < 3) {
    return "Balanced personality with diverse interests";
  }
  return (
    PERSONALITY_DESCRIPTIONS[code.slice(0, 3).toUpperCase()] ??
    "Unique combination of interests and skills"
  );
}

/**
 * Broad career fields suggested by the first two letters of a dominant code.
 */
export function recommendedFields(code: string): string[] {
  if (code.length < 2) {
    return ["Technology", "Business", "Healthcare"];
  }
  const fields = CAREER_FIELDS[code.slice(0, 2).toUpperCase()];
  return fields
    ? [...fields]
    : ["Technology", "Business", "Creative Industries"];
}
