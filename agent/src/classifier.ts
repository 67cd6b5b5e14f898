import { z } from "zod";
import { ClassificationAmbiguous } from "../../runtime/src/errors.js";
import type { LanguageModel, Message } from "./index.js";
import type { PromptLibrary } from "./prompts.js";

export const FOLLOW_UP_WINDOW = 4;

export interface TypoVerdict {
  typo: boolean;
  candidates: string[];
}

/** Model-backed yes/no and structured classifications used by the router. */
export interface IntentClassifier {
  isFollowUp(query: string, history: readonly Message[]): Promise<boolean>;
  detectTypo(query: string, maxCandidates: number): Promise<TypoVerdict>;
}

const typoSchema = z.object({
  typo: z.boolean(),
  candidates: z.array(z.string()).default([]),
});

export function formatHistory(history: readonly Message[], window = FOLLOW_UP_WINDOW): string {
  return history
    .slice(-window)
    .map((message) => `${message.role}: ${message.content}`)
    .join("\n");
}

/** Reads a FOLLOW_UP / NEW_TOPIC answer. Anything else is ambiguous. */
export function parseFollowUpAnswer(raw: string): boolean {
  const answer = raw.toUpperCase().replace(/[\s-]+/g, "_");
  const followUp = answer.includes("FOLLOW_UP");
  const newTopic = answer.includes("NEW_TOPIC");
  if (followUp === newTopic) {
    throw new ClassificationAmbiguous("follow-up", raw);
  }
  return followUp;
}

export function parseTypoAnswer(raw: string, query: string, maxCandidates: number): TypoVerdict {
  const start = raw.indexOf("{");
  const end = raw.lastIndexOf("}");
  if (start < 0 || end <= start) {
    throw new ClassificationAmbiguous("typo", raw);
  }

  let payload: unknown;
  try {
    payload = JSON.parse(raw.slice(start, end + 1));
  } catch {
    throw new ClassificationAmbiguous("typo", raw);
  }

  const parsed = typoSchema.safeParse(payload);
  if (!parsed.success) {
    throw new ClassificationAmbiguous("typo", raw);
  }

  const original = query.trim().toLowerCase();
  const seen = new Set<string>();
  const candidates: string[] = [];
  for (const candidate of parsed.data.candidates) {
    const term = candidate.replace(/\s+/g, " ").trim();
    const key = term.toLowerCase();
    if (!term || key === original || seen.has(key)) continue;
    seen.add(key);
    candidates.push(term);
  }

  const limited = candidates.slice(0, Math.max(1, maxCandidates));
  return { typo: parsed.data.typo && limited.length > 0, candidates: limited };
}

export class LlmIntentClassifier implements IntentClassifier {
  constructor(
    private readonly model: LanguageModel,
    private readonly prompts: PromptLibrary,
    private readonly timeoutMs: number,
  ) {}

  async isFollowUp(query: string, history: readonly Message[]): Promise<boolean> {
    const prompt = this.prompts.render("followup_detection", {
      history: formatHistory(history),
      query,
    });
    const response = await this.model.complete([{ role: "user", content: prompt }], {
      timeoutMs: this.timeoutMs,
      temperature: 0,
      maxTokens: 10,
    });
    return parseFollowUpAnswer(response.content);
  }

  async detectTypo(query: string, maxCandidates: number): Promise<TypoVerdict> {
    const prompt = this.prompts.render("typo_detection", {
      query,
      max_candidates: maxCandidates,
    });
    const response = await this.model.complete([{ role: "user", content: prompt }], {
      timeoutMs: this.timeoutMs,
      temperature: 0,
      maxTokens: 150,
    });
    return parseTypoAnswer(response.content, query, maxCandidates);
  }
}
