import { RelevanceVerdict, StarComponent, StarComponentSet } from "../shared/types/hr-analysis.types";
import { STAR_COMPONENTS } from "./lexicon/lexicon.store";
import { countPronouns, hasMetrics } from "./text.util";

const MAX_RED_FLAGS_SHOWN = 3;
const MAX_RELEVANCE_ISSUES_SHOWN = 2;

export interface FeedbackInput {
  clarity: number;
  confidence: number;
  structure: number;
  answerLower: string;
  components: StarComponentSet;
  redFlags: string[];
  relevance: RelevanceVerdict | null;
}

export function buildRejectionFeedback(issues: string[]): string {
  return [
    "This response cannot be evaluated.",
    issues.map((issue) => `${issue}.`).join(" "),
    "In a real interview this kind of answer would end the conversation.",
    "Please give a genuine answer that walks through a specific situation from your own experience.",
  ]
    .filter((part) => part.length > 0)
    .join(" ");
}

export function buildFeedback(input: FeedbackInput): string {
  const lines: string[] = [];
  const average = (input.clarity + input.confidence + input.structure) / 3;

  if (input.redFlags.length > 0) {
    pushSection(lines, "🚨 CRITICAL ISSUES:", input.redFlags.slice(0, MAX_RED_FLAGS_SHOWN));
  }

  if (input.relevance && input.relevance.issues.length > 0) {
    pushSection(lines, "⚠️ RELEVANCE CONCERNS:", input.relevance.issues.slice(0, MAX_RELEVANCE_ISSUES_SHOWN));
  }

  pushSection(lines, "📋 STRUCTURE:", structureBullets(input.structure, input.components));
  pushSection(lines, "💪 OWNERSHIP & CONFIDENCE:", confidenceBullets(input.confidence, input.answerLower));
  pushSection(lines, "🎯 CLARITY:", clarityBullets(input.clarity));

  if (!hasMetrics(input.answerLower) && average < 8) {
    pushSection(lines, "📊 MISSING METRICS:", [
      "No quantifiable results mentioned. Numbers make impact believable.",
      "Add figures such as '20% faster', 'cut review time from 2 weeks to 3 days' or '$50K saved'.",
    ]);
  }

  lines.push("📝 OVERALL:", ...overallBullets(average).map(bullet));
  return lines.join("\n");
}

function pushSection(lines: string[], heading: string, bullets: string[]): void {
  lines.push(heading, ...bullets.map(bullet), "");
}

function bullet(text: string): string {
  return `• ${text}`;
}

function componentNames(components: StarComponentSet, present: boolean): string[] {
  return STAR_COMPONENTS.filter((component: StarComponent) => components[component] === present).map(
    (component) => component.toUpperCase(),
  );
}

function structureBullets(structure: number, components: StarComponentSet): string[] {
  const present = componentNames(components, true);
  const missing = componentNames(components, false);

  if (structure >= 8) {
    return ["Strong STAR structure. Every component comes through clearly."];
  }
  if (structure >= 5) {
    const bullets = [`Partial STAR structure. Found: ${present.length > 0 ? present.join(", ") : "None"}.`];
    if (missing.length > 0) {
      bullets.push(`Missing: ${missing.join(", ")}. An incomplete story reads as an incomplete answer.`);
    }
    return bullets;
  }
  if (structure >= 3) {
    return [
      "Weak structure. The answer wanders without a clear shape.",
      `Missing STAR components: ${missing.join(", ")}.`,
      "Interviewers are trained to notice missing structure and it will cost you on the scorecard.",
    ];
  }
  return [
    "No recognisable STAR structure, which behavioral interviews expect by default.",
    "Most interview loops would rate this answer as not inclined.",
  ];
}

function confidenceBullets(confidence: number, answerLower: string): string[] {
  if (confidence >= 8) {
    return ["Good first-person ownership. Your individual contribution is clear."];
  }
  if (confidence >= 5) {
    const pronouns = countPronouns(answerLower);
    if (pronouns.we > pronouns.i) {
      return [
        "Too much 'we' and not enough 'I'. Interviewers want to know what YOU did.",
        "Expect the follow-up: 'But what was your specific contribution?'",
      ];
    }
    return ["Moderate confidence. Use more action verbs such as led, drove, delivered and achieved."];
  }
  if (confidence >= 3) {
    return [
      "Weak ownership. You sound unsure of your own contribution.",
      "Hedges like 'maybe', 'I think' and 'sort of' undercut your credibility.",
    ];
  }
  return [
    "Low confidence. This would raise doubts about your capabilities.",
    "Interviewers look for candidates who can state their impact plainly.",
  ];
}

function clarityBullets(clarity: number): string[] {
  if (clarity >= 8) {
    return ["Clear, well-formed sentences. The narrative is easy to follow."];
  }
  if (clarity >= 5) {
    return [
      "Acceptable clarity but it could be sharper. Aim for short, direct sentences.",
      "Interviewers hear many candidates a day, so make each point memorable.",
    ];
  }
  if (clarity >= 3) {
    return [
      "Unclear communication. Sentences are either too long or too choppy.",
      "Lead with the headline, then add the details.",
    ];
  }
  return [
    "Very poor clarity. The main points are hard to pick out.",
    "This would be written up as a communication concern.",
  ];
}

function overallBullets(average: number): string[] {
  if (average >= 8) {
    return [
      "STRONG RESPONSE. Likely a strong hire signal for behavioral fit.",
      "This shows the depth and structure top interview loops expect.",
    ];
  }
  if (average >= 6) {
    return [
      "ACCEPTABLE RESPONSE. Inclined, but not exceptional.",
      "In a competitive loop this may not be enough. Aim higher.",
    ];
  }
  if (average >= 4) {
    return [
      "WEAK RESPONSE. Likely rated not inclined.",
      "A bar-raiser style interviewer would find this concerning.",
      "Structure and specificity both need significant work.",
    ];
  }
  if (average >= 2) {
    return [
      "POOR RESPONSE. Likely a strong no hire.",
      "The answer shows little preparation for behavioral questions.",
      "Study the STAR method and prepare 6-8 stories with concrete metrics.",
    ];
  }
  return [
    "UNACCEPTABLE RESPONSE. The interview would likely end early.",
    "It suggests an unprepared candidate or a poor fit.",
    "Rework your preparation from the ground up before real interviews.",
  ];
}
