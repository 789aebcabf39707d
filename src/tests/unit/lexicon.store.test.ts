import assert from "node:assert/strict";
import { test } from "node:test";
import rawLexicon from "../../analysis/lexicon/hr-lexicon.v1.json";
import { HR_LEXICON, parseLexicon, STAR_COMPONENTS } from "../../analysis/lexicon/lexicon.store";
import { LexiconError } from "../../shared/errors";

test("lexicon store is frozen and shared", () => {
  assert.equal(Object.isFrozen(HR_LEXICON), true);
  assert.equal(Object.isFrozen(HR_LEXICON.confidenceKeywords), true);
  assert.equal(Object.isFrozen(HR_LEXICON.starIndicators), true);
  assert.equal(Object.isFrozen(HR_LEXICON.gibberishPatterns), true);
  assert.equal(HR_LEXICON.version, "1");
});

test("lexicon lists keep their declared sizes and order", () => {
  assert.equal(HR_LEXICON.confidenceKeywords.length, 30);
  assert.equal(HR_LEXICON.leadershipKeywords.length, 20);
  assert.equal(HR_LEXICON.vaguePhrases.length, 16);
  assert.equal(HR_LEXICON.hedgingWords.length, 15);
  assert.equal(HR_LEXICON.confidenceHedges.length, 7);
  assert.deepEqual(
    HR_LEXICON.questionTopics.map((topic) => topic.type),
    ["challenge", "difficult team member", "leadership", "failed", "deadline", "above and beyond", "persuade", "feedback"],
  );
  assert.deepEqual(Object.keys(HR_LEXICON.starIndicators), [...STAR_COMPONENTS]);
});

test("gibberish patterns are case-insensitive regexes", () => {
  assert.equal(HR_LEXICON.gibberishPatterns[0]?.source, "asdf");
  assert.equal(HR_LEXICON.gibberishPatterns[0]?.flags, "iu");
});

test("parseLexicon rejects a file without version", () => {
  assert.throws(() => parseLexicon({}), (error: unknown) => {
    return error instanceof LexiconError && error.message === "Lexicon version is missing.";
  });
});

test("parseLexicon rejects an invalid regex", () => {
  assert.throws(() => parseLexicon({ ...rawLexicon, gibberishPatterns: ["("] }), LexiconError);
});

test("parseLexicon rejects an unknown question topic", () => {
  assert.throws(
    () => parseLexicon({ ...rawLexicon, questionTopics: [{ type: "hobbies", keywords: ["golf"] }] }),
    (error: unknown) => error instanceof LexiconError && error.message === "Unknown question topic type: hobbies",
  );
});

test("parseLexicon rejects an empty list", () => {
  assert.throws(
    () => parseLexicon({ ...rawLexicon, hedgingWords: [] }),
    (error: unknown) =>
      error instanceof LexiconError && error.message === 'Lexicon list "hedgingWords" must be a non-empty array.',
  );
});
