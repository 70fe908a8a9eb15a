import {
  COLLEGE_TIER_LABELS,
  EDUCATION_LEVEL_LABELS,
  WORK_PREFERENCE_LABELS,
} from "../domain/education";
import { axisInitial, dominantAxes, normalizeScores } from "../domain/riasec";
import { RIASEC_AXES, type RiasecAxis, type StudentProfile } from "../types";
import { NOT_SPECIFIED } from "../utils/constants";

/*
 * Null-safe renderers for profile attributes. Each returns NOT_SPECIFIED
 * for absent, blank or non-finite input, never "null", "undefined" or "".
 */

type Maybe<T> = T | null | undefined;

export function formatText(value: Maybe<string>): string {
  const trimmed = value?.trim();
  return trimmed ? trimmed : NOT_SPECIFIED;
}

export function formatList(values: Maybe<readonly string[]>): string {
  const items = (values ?? [])
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
  return items.length > 0 ? items.join(", ") : NOT_SPECIFIED;
}

function isNumber(value: Maybe<number>): value is number {
  return typeof value === "number" && Number.isFinite(value);
}

export function formatNumber(value: Maybe<number>, suffix = ""): string {
  return isNumber(value) ? `${value}${suffix}` : NOT_SPECIFIED;
}

export function formatEducationLevel(profile: StudentProfile): string {
  return profile.educationLevel
    ? EDUCATION_LEVEL_LABELS[profile.educationLevel]
    : NOT_SPECIFIED;
}

export function formatInstitution(profile: StudentProfile): string {
  const name = formatText(profile.institutionName);
  if (!profile.collegeTier) {
    return name;
  }
  const tier = COLLEGE_TIER_LABELS[profile.collegeTier];
  return name === NOT_SPECIFIED ? tier : `${name}, ${tier}`;
}

export function formatWorkPreference(profile: StudentProfile): string {
  return profile.workPreference
    ? WORK_PREFERENCE_LABELS[profile.workPreference]
    : NOT_SPECIFIED;
}

/**
 * Renders academic performance as prompt lines. With neither CGPA nor
 * percentage the block collapses to a single placeholder line.
 */
export function formatAcademicPerformance(profile: StudentProfile): string {
  if (!isNumber(profile.cgpa) && !isNumber(profile.percentage)) {
    return `- Academic Performance: ${NOT_SPECIFIED}`;
  }
  return [
    `- CGPA: ${formatNumber(profile.cgpa, "/10")}`,
    `- Percentage: ${formatNumber(profile.percentage, "%")}`,
  ].join("\n");
}

export function axisLabel(axis: RiasecAxis): string {
  return axis.charAt(0).toUpperCase() + axis.slice(1);
}

/* e.g. "R:0, I:0, A:0, S:0, E:0, C:0"; absent axes score 0. */
export function formatRiasecScores(profile: StudentProfile): string {
  const scores = normalizeScores(profile.riasecScores);
  return RIASEC_AXES.map((axis) => `${axisInitial(axis)}:${scores[axis]}`).join(
    ", ",
  );
}

export function formatDominantTypes(profile: StudentProfile): string {
  return dominantAxes(profile.riasecScores).map(axisLabel).join(", ");
}
