/**
 * Deterministic message patterns used by the router before any model call:
 * greetings, conversation-referencing phrases and the disambiguation
 * round trip.
 */

export const GREETINGS: ReadonlySet<string> = new Set([
  "hi",
  "hello",
  "hey",
  "hiya",
  "howdy",
  "greetings",
  "sup",
  "whats up",
  "what's up",
  "good morning",
  "good afternoon",
  "good evening",
  "good day",
  "morning",
  "afternoon",
  "evening",
  "yo",
  "helo",
  "hii",
  "hiii",
  "heya",
]);

export const META_PHRASES: readonly string[] = [
  "summary",
  "summarize",
  "summarise",
  "recap",
  "what did we discuss",
  "what did we talk about",
  "what have we discussed",
  "what we discussed",
  "so far",
  "earlier you said",
  "you said",
  "you mentioned",
  "our conversation",
  "this conversation",
  "go over that again",
  "repeat that",
];

const AFFIRMATIONS: ReadonlySet<string> = new Set([
  "y",
  "yes",
  "yeah",
  "yep",
  "yup",
  "sure",
  "correct",
  "right",
  "exactly",
  "that one",
  "yes please",
]);

export const DISAMBIGUATION_MARKER = "Did you mean:";
export const DISAMBIGUATION_FOOTER = "Reply with a number or the term.";

/** Lowercase, then strip surrounding `! .,?` the way greetings are typed. */
export function normalizeMessage(message: string): string {
  return message.toLowerCase().replace(/^[!.,?\s]+|[!.,?\s]+$/g, "");
}

export function isGreeting(message: string): boolean {
  return GREETINGS.has(normalizeMessage(message).replace(/\s+/g, " "));
}

export function isMetaQuery(message: string): boolean {
  const lowered = message.toLowerCase();
  return META_PHRASES.some((phrase) => lowered.includes(phrase));
}

/** Case and punctuation-insensitive form used to compare echoed terms. */
export function normalizeTerm(term: string): string {
  return term
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s]/gu, " ")
    .replace(/\s+/g, " ")
    .trim();
}

export function formatDisambiguation(candidates: readonly string[]): string {
  const lines = candidates.map((candidate, i) => `${i + 1}. ${candidate}`);
  return [DISAMBIGUATION_MARKER, ...lines, DISAMBIGUATION_FOOTER].join("\n");
}

/**
 * Candidate terms listed after the disambiguation marker, in listed order.
 * Inline lists ("Did you mean: 1. asthma 2. anemia") are read as well.
 * Returns null when the message carries no marker or no numbered entries.
 */
export function parseDisambiguation(content: string): string[] | null {
  const at = content.indexOf(DISAMBIGUATION_MARKER);
  if (at < 0) return null;

  const listing = content
    .slice(at + DISAMBIGUATION_MARKER.length)
    .replace(/\s+(?=\d+[.)]\s)/g, "\n");

  const candidates: string[] = [];
  for (const line of listing.split("\n")) {
    const match = /^\s*\d+[.)]\s+(.+?)\s*$/.exec(line);
    if (!match?.[1]) continue;
    const term = match[1].replace(/\*\*/g, "").replace(/[?.!,]+$/, "").trim();
    if (term) candidates.push(term);
  }

  return candidates.length > 0 ? candidates : null;
}

/**
 * Resolve a reply to a disambiguation listing: a bare index ("2", "#2",
 * "2."), an echoed term, or a plain yes when only one term was offered.
 */
export function matchSelection(message: string, candidates: readonly string[]): string | null {
  const normalized = normalizeMessage(message);

  const index = /^(?:option|number|no\.?)?\s*#?\s*(\d+)\s*[.)]?$/.exec(normalized);
  if (index?.[1]) {
    const position = Number.parseInt(index[1], 10);
    return candidates[position - 1] ?? null;
  }

  const echoed = normalizeTerm(message);
  if (echoed) {
    const hit = candidates.find((candidate) => normalizeTerm(candidate) === echoed);
    if (hit) return hit;
  }

  if (candidates.length === 1 && AFFIRMATIONS.has(normalized.replace(/\s+/g, " "))) {
    return candidates[0] ?? null;
  }

  return null;
}
