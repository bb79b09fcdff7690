// Fallback matcher: exact key first, then word overlap
import type { MatchKind } from "../../../shared/types";
import { MIN_TOKEN_LENGTH, NOT_FOUND_ANSWER } from "../config/constants";
import { normalize } from "./cache";
import type { KnowledgeBase } from "./knowledgeBase";

export interface AnswerResult {
  answerText: string;
  matchKind: Exclude<MatchKind, "cache">;
}

const WORD = /[\p{L}\p{N}_]+/gu;

/**
 * Word-like tokens of at least MIN_TOKEN_LENGTH characters (code points),
 * lower-cased.
 */
export function tokenize(s: string): Set<string> {
  const words = s.toLowerCase().match(WORD) ?? [];
  return new Set(words.filter((w) => Array.from(w).length >= MIN_TOKEN_LENGTH));
}

function overlap(a: Set<string>, b: Set<string>) {
  let n = 0;
  for (const w of a) if (b.has(w)) n++;
  return n;
}

/**
 * Never fails. Ties on the overlap score go to the first key in the knowledge
 * base's (lexicographic) order.
 */
export function matchAnswer(query: string, kb: KnowledgeBase): AnswerResult {
  const key = normalize(query);
  const exact = kb.get(key);
  if (exact) {
    return { answerText: exact.answer, matchKind: "exact" };
  }

  const qWords = tokenize(key);
  let bestScore = 0;
  let bestAnswer: string | null = null;
  if (qWords.size > 0) {
    for (const [k, record] of kb.entries()) {
      const score = overlap(qWords, tokenize(k));
      if (score > bestScore) {
        bestScore = score;
        bestAnswer = record.answer;
      }
    }
  }

  if (bestAnswer !== null) {
    return { answerText: bestAnswer, matchKind: "keyword" };
  }
  return { answerText: NOT_FOUND_ANSWER, matchKind: "not_found" };
}
