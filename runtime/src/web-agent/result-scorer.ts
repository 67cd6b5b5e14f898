/**
 * Lexical relevance of search results. This is a coarse overlap count, not a
 * semantic ranking: it only tells whether the words of the term appear.
 */

export interface ScoredCandidate<T> {
  candidate: T;
  score: number;
  position: number;
}

export type BestCandidate<T> =
  | { status: "match"; best: ScoredCandidate<T>; ranked: ScoredCandidate<T>[] }
  | { status: "no_confident_match"; ranked: ScoredCandidate<T>[] };

export function termWords(term: string): string[] {
  const words = term.toLowerCase().split(/\s+/).filter(Boolean);
  return Array.from(new Set(words));
}

/** Number of distinct words of `term` found as substrings of `candidateText`. */
export function scoreCandidate(term: string, candidateText: string): number {
  const haystack = candidateText.toLowerCase();
  let score = 0;
  for (const word of termWords(term)) {
    if (haystack.includes(word)) score += 1;
  }
  return score;
}

/**
 * Pick the highest-scoring candidate. Ties go to the candidate seen first.
 * When nothing overlaps at all, report that instead of picking arbitrarily.
 */
export function selectBestCandidate<T>(
  term: string,
  candidates: readonly T[],
  textOf: (candidate: T) => string,
): BestCandidate<T> {
  const ranked = candidates.map((candidate, position) => ({
    candidate,
    position,
    score: scoreCandidate(term, textOf(candidate)),
  }));

  let best: ScoredCandidate<T> | undefined;
  for (const entry of ranked) {
    if (entry.score > (best?.score ?? 0)) best = entry;
  }

  if (!best) return { status: "no_confident_match", ranked };
  return { status: "match", best, ranked };
}
