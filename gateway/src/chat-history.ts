import type { Message } from "../../agent/src/index.js";
import type { StoredMessage } from "../../runtime/src/session-log.js";
import type { RetrievedContent } from "../../runtime/src/web-agent/contracts.js";

export const SOFT_RETRIEVAL_WARNING =
  "Note: fresh reference material could not be fetched for this question. " +
  "Answer from the conversation and general knowledge, and say that the answer may be incomplete.";

export function toModelHistory(messages: readonly StoredMessage[]): Message[] {
  return messages.map((message) => ({ role: message.role, content: message.content }));
}

/** Keep the last `maxMessages` turns, oldest first. */
export function trimConversationHistory(
  history: readonly Message[],
  maxMessages: number,
): Message[] {
  if (maxMessages <= 0) return [];
  return history.filter((message) => message.role !== "system").slice(-maxMessages);
}

export function latestAssistantMessage(history: readonly Message[]): Message | null {
  for (let i = history.length - 1; i >= 0; i--) {
    const message = history[i];
    if (message?.role === "assistant") return message;
  }
  return null;
}

export function referenceContext(content: RetrievedContent): string {
  const heading = content.title ? `Reference article: ${content.title}` : "Reference article";
  return `${heading}\nSource: ${content.url}\n\n${content.text}`;
}

export function conversationContext(history: readonly Message[], window: number): string {
  const lines = history
    .slice(-window)
    .map((message) => `${capitalize(message.role)}: ${message.content}`);
  return ["Previous conversation:", ...lines].join("\n");
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

export interface LatencyStats {
  count: number;
  p50: number;
  p95: number;
}

/** Rolling per-key latency samples, reported on the health endpoint. */
export class LatencyTracker<K extends string = string> {
  private readonly samples = new Map<K, number[]>();

  constructor(private readonly sampleLimit: number = 200) {}

  record(key: K, totalMs: number): LatencyStats {
    const store = this.samples.get(key) ?? [];
    store.push(totalMs);
    if (store.length > this.sampleLimit) {
      store.splice(0, store.length - this.sampleLimit);
    }
    this.samples.set(key, store);
    return summarize(store);
  }

  snapshot(): Record<string, LatencyStats> {
    const out: Record<string, LatencyStats> = {};
    for (const [key, store] of this.samples) {
      out[key] = summarize(store);
    }
    return out;
  }
}

function summarize(store: readonly number[]): LatencyStats {
  return {
    count: store.length,
    p50: percentile(store, 0.5),
    p95: percentile(store, 0.95),
  };
}

function percentile(values: readonly number[], p: number): number {
  if (values.length === 0) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const index = Math.min(
    sorted.length - 1,
    Math.max(0, Math.ceil(sorted.length * p) - 1),
  );
  return sorted[index] ?? 0;
}
