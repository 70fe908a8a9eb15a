import { describePersonality, recommendedFields } from "../domain/riasec";
import type {
  AnalysisFailureKind,
  CareerAnalysisResult,
  ChatResult,
  LearningPathResult,
  RiasecAnalysisResult,
} from "../types";

/*
 * Deterministic stand-ins returned whenever the AI path fails.
 * Every accessor returns a fresh copy so callers may mutate what they get.
 */

export function fallbackRiasecAnalysis(
  failure?: AnalysisFailureKind,
): RiasecAnalysisResult {
  return {
    kind: "riasec",
    source: "fallback",
    failure,
    realistic: 65,
    investigative: 70,
    artistic: 45,
    social: 60,
    enterprising: 55,
    conventional: 50,
    dominantTypes: "IRS",
    personalityDescription: describePersonality("IRS"),
    recommendedFields: recommendedFields("IRS"),
    analysis:
      "Based on your responses, you show strong investigative and realistic traits with good social skills.",
    careerSuggestions: ["Software Engineer", "Data Analyst", "Research Scientist"],
  };
}

export function fallbackCareerAnalysis(
  failure?: AnalysisFailureKind,
): CareerAnalysisResult {
  return {
    kind: "career-recommendation",
    source: "fallback",
    failure,
    recommendations: [
      { title: "Software Engineer", salaryRange: "6-15 LPA", growth: "High" },
      { title: "Data Analyst", salaryRange: "4-12 LPA", growth: "Very High" },
      { title: "Product Manager", salaryRange: "8-25 LPA", growth: "High" },
    ],
    skillsToDevelop: [
      "Programming",
      "Data Analysis",
      "Communication",
      "Problem Solving",
    ],
    industryInsights:
      "Technology sector continues to grow rapidly in India with high demand for skilled professionals.",
    actionPlan: [
      "Complete relevant certifications",
      "Build portfolio projects",
      "Network with industry professionals",
      "Apply for internships",
    ],
  };
}

export const FALLBACK_LEARNING_PATH =
  "We could not build a personalised plan right now. A solid start for most careers: " +
  "spend the first two months on the core skills of the role, months three and four on " +
  "a recognised certification and one portfolio project, and the last two months on " +
  "internships, networking and applications. Try again later for a tailored plan.";

export function fallbackLearningPath(
  failure?: AnalysisFailureKind,
): LearningPathResult {
  return {
    kind: "learning-path",
    source: "fallback",
    failure,
    text: FALLBACK_LEARNING_PATH,
  };
}

interface ChatReplyCategory {
  keywords: readonly string[];
  reply: string;
}

/**
 * Canned chat replies, checked in order; the first category with a keyword
 * contained in the message wins. The broad `career`/`job` category stays last.
 */
export const CHAT_REPLY_CATEGORIES: readonly ChatReplyCategory[] = [
  {
    keywords: ["skill", "learn"],
    reply:
      "Continuous learning is the key to career growth! Focus on developing both technical skills " +
      "specific to your field and soft skills like communication and leadership. What skills would you like to develop?",
  },
  {
    keywords: ["college", "education"],
    reply:
      "Choosing the right educational path is crucial for your career success. Consider factors like " +
      "course curriculum, faculty quality, placement records, and location. What field of study interests you?",
  },
  {
    keywords: ["assessment", "test"],
    reply:
      "Career assessments can provide valuable insights into your personality, interests, and aptitudes. " +
      "They help match you with suitable career paths. Would you like to take our comprehensive assessment?",
  },
  {
    keywords: ["salary", "money"],
    reply:
      "Salary is an important consideration, but also think about growth potential, job satisfaction, " +
      "and learning opportunities. Different careers have varying salary ranges - what field interests you?",
  },
  {
    keywords: ["career", "job"],
    reply:
      "I'd love to help you explore career options! Based on your interests and skills, " +
      "there are many exciting paths in technology, healthcare, business, and creative fields. " +
      "What areas interest you most?",
  },
];

export const DEFAULT_CHAT_REPLY =
  "I'm here to help with your career journey! You can ask me about career options, educational paths, " +
  "skill development, or take our assessment to discover careers that match your personality. " +
  "How can I assist you today?";

export function fallbackChatReply(message: string): string {
  const lowered = typeof message === "string" ? message.toLowerCase() : "";
  const category = CHAT_REPLY_CATEGORIES.find(({ keywords }) =>
    keywords.some((keyword) => lowered.includes(keyword)),
  );
  return category ? category.reply : DEFAULT_CHAT_REPLY;
}

export function fallbackChat(
  message: string,
  failure?: AnalysisFailureKind,
): ChatResult {
  return {
    kind: "chat",
    source: "fallback",
    failure,
    text: fallbackChatReply(message),
  };
}
