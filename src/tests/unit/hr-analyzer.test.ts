import assert from "node:assert/strict";
import { test } from "node:test";
import { GIBBERISH_ISSUES } from "../../analysis/gibberish.detector";
import { analyzeHrResponse, REJECTION_REASON } from "../../analysis/hr-analyzer";
import { RED_FLAGS } from "../../analysis/red-flag.detector";
import { scoreClarity } from "../../analysis/scoring/clarity.scorer";
import { scoreConfidence } from "../../analysis/scoring/confidence.scorer";
import {
  SHORT_STAR_ANSWER,
  STRONG_STAR_ANSWER,
  VAGUE_SHORT_ANSWER,
  WE_HEAVY_ANSWER,
} from "../helpers/sample-answers";

const STAR_KEYS = ["situation", "task", "action", "result"];

test("keyboard mashing is rejected with the fixed result", () => {
  const result = analyzeHrResponse({ answer: "asdf asdf asdf" });
  assert.equal(result.isValid, false);
  assert.equal(result.rejectionReason, REJECTION_REASON);
  assert.deepEqual(
    [result.clarity, result.confidence, result.structure, result.totalScore],
    [1, 1, 1, 1],
  );
  assert.deepEqual(result.details, {
    starComponentsFound: { situation: false, task: false, action: false, result: false },
    confidenceKeywordCount: 0,
    leadershipKeywordCount: 0,
    redFlags: [GIBBERISH_ISSUES.placeholder],
    relevanceIssues: [],
  });
  assert.ok(result.feedback.startsWith("This response cannot be evaluated. Contains random or placeholder text."));
});

test("a one-word stock reply without a question is rejected", () => {
  const result = analyzeHrResponse({ answer: "yes" });
  assert.equal(result.isValid, false);
  assert.equal(result.totalScore, 1);
  assert.equal(result.rejectionReason, "Invalid response detected");
});

test("a stock reply submitted with a trailing newline is rejected", () => {
  const result = analyzeHrResponse({ answer: "yes\n" });
  assert.equal(result.isValid, false);
  assert.equal(result.totalScore, 1);
  assert.deepEqual(result.details.redFlags, [GIBBERISH_ISSUES.placeholder]);
});

test("a one-word stock reply is rejected even with a question", () => {
  const result = analyzeHrResponse({ answer: "yes", question: "Give an example of a time you showed leadership." });
  assert.equal(result.isValid, false);
  assert.equal(result.totalScore, 1);
  assert.deepEqual(result.details.relevanceIssues, []);
});

test("a strong STAR story scores high without penalties", () => {
  const result = analyzeHrResponse({ answer: STRONG_STAR_ANSWER });
  assert.equal(result.isValid, true);
  assert.equal(result.rejectionReason, undefined);
  assert.equal(result.clarity, 10);
  assert.equal(result.confidence, 8);
  assert.equal(result.structure, 10);
  assert.equal(result.totalScore, 9);
  assert.deepEqual(result.details, {
    starComponentsFound: { situation: true, task: true, action: true, result: true },
    confidenceKeywordCount: 5,
    leadershipKeywordCount: 4,
    redFlags: [],
    relevanceIssues: [],
  });
  assert.equal(result.feedback.includes("📊 MISSING METRICS:"), false);
  assert.ok(result.feedback.endsWith("• This shows the depth and structure top interview loops expect."));
});

test("a relevant question leaves the strong story untouched", () => {
  const result = analyzeHrResponse({
    answer: STRONG_STAR_ANSWER,
    question: "Tell me about a time you faced a significant challenge at work.",
  });
  assert.equal(result.structure, 10);
  assert.deepEqual(result.details.relevanceIssues, []);
});

test("an off-topic answer loses three structure points", () => {
  const withoutQuestion = analyzeHrResponse({ answer: SHORT_STAR_ANSWER });
  const offTopic = analyzeHrResponse({
    answer: SHORT_STAR_ANSWER,
    question: "Tell me about a time you received critical feedback.",
  });
  assert.equal(withoutQuestion.structure, 10);
  assert.equal(offTopic.structure, 7);
  assert.deepEqual(offTopic.details.relevanceIssues, [
    "Answer doesn't address the 'deadline' aspect of the question",
  ]);
  assert.ok(offTopic.feedback.includes("⚠️ RELEVANCE CONCERNS:"));
});

test("a brief vague answer is penalised after the short-circuit scores", () => {
  const result = analyzeHrResponse({ answer: VAGUE_SHORT_ANSWER });
  assert.equal(scoreClarity(VAGUE_SHORT_ANSWER), 2);
  assert.equal(result.isValid, true);
  assert.equal(result.clarity, 1);
  assert.equal(result.confidence, 1);
  assert.equal(result.structure, 1);
  assert.equal(result.totalScore, 1);
  assert.deepEqual(result.details.redFlags, [RED_FLAGS.tooBrief, RED_FLAGS.vagueness]);
});

test("red-flag penalty is truncated before it is subtracted", () => {
  const result = analyzeHrResponse({ answer: WE_HEAVY_ANSWER });
  const lower = WE_HEAVY_ANSWER.toLowerCase();
  assert.deepEqual(result.details.redFlags, [RED_FLAGS.weOveruse, RED_FLAGS.noMetrics]);
  // Two flags: 3 points, halved to 1.5, truncated to 1.
  assert.equal(result.clarity, Math.max(1, scoreClarity(WE_HEAVY_ANSWER) - 1));
  assert.equal(result.confidence, Math.max(1, scoreConfidence(lower) - 1));
  assert.equal(result.totalScore, Math.trunc((result.clarity + result.confidence + result.structure) / 3));
});

test("scores stay bounded and STAR keys stay complete for edge inputs", () => {
  const inputs = [
    "",
    "   ",
    "!!!",
    "no",
    "😀 😀 😀",
    VAGUE_SHORT_ANSWER,
    WE_HEAVY_ANSWER,
    STRONG_STAR_ANSWER,
    `${STRONG_STAR_ANSWER} ${STRONG_STAR_ANSWER} ${STRONG_STAR_ANSWER}`,
    "1234567890 1234567890 1234567890",
  ];
  for (const answer of inputs) {
    const result = analyzeHrResponse({ answer, question: "Describe a situation where you had to meet a tight deadline." });
    for (const score of [result.clarity, result.confidence, result.structure, result.totalScore]) {
      assert.ok(Number.isInteger(score) && score >= 1 && score <= 10, `score ${score} out of range for "${answer}"`);
    }
    assert.deepEqual(Object.keys(result.details.starComponentsFound), STAR_KEYS);
  }
});

test("an answer with hundreds of thousands of sentences is scored without throwing", () => {
  const answer = "We shipped it. ".repeat(500_000);
  const result = analyzeHrResponse({ answer });
  assert.equal(result.isValid, true);
  assert.equal(scoreClarity(answer), 4);
});

test("identical input gives identical output", () => {
  const input = { answer: WE_HEAVY_ANSWER, question: "Tell me about a time you went above and beyond for a project." };
  assert.deepEqual(analyzeHrResponse(input), analyzeHrResponse(input));
  assert.equal(JSON.stringify(analyzeHrResponse(input)), JSON.stringify(analyzeHrResponse(input)));
});
