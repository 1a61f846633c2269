import test from "node:test";
import assert from "node:assert/strict";
import { MAX_QUERY_TOKENS, normalizeQuery, tokenizeQuery } from "../src/services/queryNormalizer.js";

test("normalizeQuery lower-cases and drops stopwords from tokens only", () => {
  const result = normalizeQuery("Chicken AND Rice");

  assert.equal(result.normalized, "chicken and rice");
  assert.deepEqual(result.tokens, ["chicken", "rice"]);
});

test("normalizeQuery splits on ASCII and CJK separators", () => {
  assert.deepEqual(tokenizeQuery("鸡胸肉，米饭"), ["鸡胸肉", "米饭"]);
  assert.deepEqual(tokenizeQuery("beef(lean); pumpkin|carrot"), ["beef", "lean", "pumpkin", "carrot"]);
  assert.deepEqual(tokenizeQuery("salmon & rice"), ["salmon", "rice"]);
});

test("normalizeQuery caps the token list", () => {
  const tokens = tokenizeQuery("one two three four five six seven eight");

  assert.equal(tokens.length, MAX_QUERY_TOKENS);
  assert.deepEqual(tokens, ["one", "two", "three", "four", "five", "six"]);
  assert.deepEqual(normalizeQuery("one two three", 2).tokens, ["one", "two"]);
});

test("normalizeQuery returns an empty result for blank input", () => {
  assert.deepEqual(normalizeQuery("   "), { normalized: "", tokens: [] });
  assert.deepEqual(normalizeQuery("，；"), { normalized: "", tokens: [] });
  assert.deepEqual(tokenizeQuery("the of an"), []);
});
