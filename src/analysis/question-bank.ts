import { HrQuestion } from "../shared/types/hr-analysis.types";

const QUESTION_BANK: readonly Readonly<HrQuestion>[] = Object.freeze([
  {
    question: "Tell me about a time you faced a significant challenge at work.",
    focus: ["problem-solving", "resilience", "action-oriented"],
  },
  {
    question: "Describe a situation where you had to work with a difficult team member.",
    focus: ["teamwork", "conflict resolution", "communication"],
  },
  {
    question: "Give an example of a time you showed leadership.",
    focus: ["leadership", "initiative", "influence"],
  },
  {
    question: "Tell me about a time you failed and what you learned from it.",
    focus: ["self-awareness", "growth mindset", "accountability"],
  },
  {
    question: "Describe a situation where you had to meet a tight deadline.",
    focus: ["time management", "prioritization", "pressure handling"],
  },
  {
    question: "Tell me about a time you went above and beyond for a project.",
    focus: ["initiative", "dedication", "impact"],
  },
  {
    question: "Describe a situation where you had to persuade others to see your point of view.",
    focus: ["communication", "influence", "negotiation"],
  },
  {
    question: "Tell me about a time you received critical feedback.",
    focus: ["receptiveness", "self-improvement", "professionalism"],
  },
]);

export function getHrQuestionBank(): HrQuestion[] {
  return QUESTION_BANK.map((item) => ({ question: item.question, focus: [...item.focus] }));
}
