import type { IntentClassifier } from "../../agent/src/classifier.js";
import type { LanguageModel, Message } from "../../agent/src/index.js";
import type { PromptLibrary } from "../../agent/src/prompts.js";
import { errorMessage, RetrievalError } from "../../runtime/src/errors.js";
import { createLogger, type Logger } from "../../runtime/src/logger.js";
import type { SessionLog } from "../../runtime/src/session-log.js";
import type { RetrievedContent } from "../../runtime/src/web-agent/contracts.js";
import type { Retriever } from "../../runtime/src/web-agent/retrieval-agent.js";
import {
  conversationContext,
  latestAssistantMessage,
  referenceContext,
  SOFT_RETRIEVAL_WARNING,
  toModelHistory,
  trimConversationHistory,
} from "./chat-history.js";
import {
  formatDisambiguation,
  isGreeting,
  isMetaQuery,
  matchSelection,
  parseDisambiguation,
} from "./intent-patterns.js";

export const GREETING_REPLY = [
  "Hello! I'm **Lucid**, an assistant that explains medical and health topics in plain, simple language.",
  "",
  "Ask me about a condition, a symptom, a medication or how part of the body works, for example *What is asthma?*",
  "",
  "What would you like to know about today?",
].join("\n");

export const APOLOGY_REPLY = "Something went wrong on my end. Please try again.";

export const QUERY_TOO_LONG_REPLY =
  "Your question is a bit long. Could you shorten it so I can help better?";

/** Messages of the history the follow-up context is built from. */
const CONTEXT_WINDOW = 4;

export type RouteOutcome =
  | "greeting_reply"
  | "disambiguation_reply"
  | "retrieve_and_generate"
  | "generate_from_history";

export type Gate =
  | "length"
  | "confirmation"
  | "greeting"
  | "follow_up"
  | "meta"
  | "typo"
  | "retrieval"
  | "generation"
  | "persistence";

export type ClassificationStage = "follow_up" | "typo";

export const DEFAULT_CLASSIFICATION_ORDER: readonly ClassificationStage[] = ["follow_up", "typo"];

export interface RouteSignals {
  confirmed: boolean;
  greeting: boolean;
  followUp: boolean;
  meta: boolean;
  typo: boolean;
  hasHistory: boolean;
}

interface RouteRule {
  when: (signals: RouteSignals) => boolean;
  outcome: RouteOutcome;
}

// First matching row wins.
const ROUTE_TABLE: readonly RouteRule[] = [
  { when: (s) => s.confirmed, outcome: "retrieve_and_generate" },
  { when: (s) => s.greeting, outcome: "greeting_reply" },
  { when: (s) => s.followUp, outcome: "generate_from_history" },
  { when: (s) => s.meta && s.hasHistory, outcome: "generate_from_history" },
  { when: (s) => s.typo, outcome: "disambiguation_reply" },
];

export function resolveRoute(signals: RouteSignals): RouteOutcome {
  const rule = ROUTE_TABLE.find((row) => row.when(signals));
  return rule?.outcome ?? "retrieve_and_generate";
}

export type RetrievalSummary =
  | { status: "ok"; url: string; title: string }
  | { status: "failed"; reason: string };

export interface TurnResult {
  reply: string;
  outcome: RouteOutcome | "query_too_long";
  /** Term the turn was about: the confirmed candidate or the message itself. */
  term: string;
  confirmed: boolean;
  candidates: string[];
  retrieval: RetrievalSummary | null;
  trace: Gate[];
  persisted: boolean;
  durationMs: number;
}

export interface RouterSettings {
  historyLimit: number;
  maxQueryLength: number;
  typoCandidates: number;
  modelTimeoutMs: number;
}

export interface QueryRouterDeps {
  sessions: SessionLog;
  classifier: IntentClassifier;
  model: LanguageModel;
  prompts: PromptLibrary;
  retriever: Retriever;
  settings: RouterSettings;
  classificationOrder?: readonly ClassificationStage[];
  logger?: Logger;
}

interface TurnState {
  sessionId: string;
  message: string;
  history: Message[];
  term: string;
  trace: Gate[];
  signals: RouteSignals;
  candidates: string[];
}

/**
 * One pass of a chat turn through the fixed gates: confirmation, greeting,
 * follow-up, meta override, typo, then retrieval, generation and persistence.
 * Classification failures count as "no"; only a failed generation changes
 * the reply, and then to a fixed apology.
 */
export class QueryRouter {
  private readonly sessions: SessionLog;
  private readonly classifier: IntentClassifier;
  private readonly model: LanguageModel;
  private readonly prompts: PromptLibrary;
  private readonly retriever: Retriever;
  private readonly settings: RouterSettings;
  private readonly classificationOrder: readonly ClassificationStage[];
  private readonly log: Logger;

  constructor(deps: QueryRouterDeps) {
    this.sessions = deps.sessions;
    this.classifier = deps.classifier;
    this.model = deps.model;
    this.prompts = deps.prompts;
    this.retriever = deps.retriever;
    this.settings = deps.settings;
    this.classificationOrder = deps.classificationOrder ?? DEFAULT_CLASSIFICATION_ORDER;
    this.log = deps.logger ?? createLogger("router");
  }

  async handleTurn(sessionId: string, rawMessage: string): Promise<TurnResult> {
    const startedAt = Date.now();
    const message = rawMessage.trim();

    if (message.length > this.settings.maxQueryLength) {
      return {
        reply: QUERY_TOO_LONG_REPLY,
        outcome: "query_too_long",
        term: "",
        confirmed: false,
        candidates: [],
        retrieval: null,
        trace: ["length"],
        persisted: false,
        durationMs: Date.now() - startedAt,
      };
    }

    const history = toModelHistory(
      this.sessions.getRecentMessages(sessionId, this.settings.historyLimit),
    );
    const state: TurnState = {
      sessionId,
      message,
      history,
      term: message,
      trace: ["length"],
      candidates: [],
      signals: {
        confirmed: false,
        greeting: false,
        followUp: false,
        meta: false,
        typo: false,
        hasHistory: history.length > 0,
      },
    };

    await this.classify(state);
    const outcome = resolveRoute(state.signals);

    let reply: string;
    let retrieval: RetrievalSummary | null = null;
    switch (outcome) {
      case "greeting_reply":
        reply = GREETING_REPLY;
        break;
      case "disambiguation_reply":
        reply = formatDisambiguation(state.candidates);
        break;
      case "retrieve_and_generate": {
        const fetched = await this.retrieve(state);
        retrieval = fetched.summary;
        reply = await this.generate(state, fetched.context);
        break;
      }
      case "generate_from_history":
        reply = await this.generate(state, conversationContext(history, CONTEXT_WINDOW));
        break;
    }

    const persisted = this.persist(state, reply);
    const durationMs = Date.now() - startedAt;
    this.log.info(
      { sessionId, outcome, term: state.term, confirmed: state.signals.confirmed, trace: state.trace, durationMs },
      "turn routed",
    );

    return {
      reply,
      outcome,
      term: state.term,
      confirmed: state.signals.confirmed,
      candidates: state.candidates,
      retrieval,
      trace: state.trace,
      persisted,
      durationMs,
    };
  }

  /** Fill in the routing signals, stopping as soon as the route is settled. */
  private async classify(state: TurnState): Promise<void> {
    const { signals } = state;

    state.trace.push("confirmation");
    const lastReply = latestAssistantMessage(state.history);
    const offered = lastReply ? parseDisambiguation(lastReply.content) : null;
    if (offered) {
      const selected = matchSelection(state.message, offered);
      if (selected) {
        signals.confirmed = true;
        state.term = selected;
        return;
      }
    }

    state.trace.push("greeting");
    if (isGreeting(state.message)) {
      signals.greeting = true;
      return;
    }

    for (const stage of this.classificationOrder) {
      if (stage === "follow_up") {
        state.trace.push("follow_up");
        if (signals.hasHistory) {
          signals.followUp = await this.detectFollowUp(state);
        }
        state.trace.push("meta");
        signals.meta = isMetaQuery(state.message);
        if (signals.meta && signals.hasHistory) signals.followUp = true;
        continue;
      }

      if (signals.followUp) continue;
      state.trace.push("typo");
      const candidates = await this.detectTypo(state);
      if (candidates.length > 0) {
        signals.typo = true;
        state.candidates = candidates;
        return;
      }
    }
  }

  private async detectFollowUp(state: TurnState): Promise<boolean> {
    try {
      return await this.classifier.isFollowUp(state.message, state.history);
    } catch (error) {
      this.logFailure(state, "follow_up", error, "follow-up classification failed; assuming new topic");
      return false;
    }
  }

  private async detectTypo(state: TurnState): Promise<string[]> {
    try {
      const verdict = await this.classifier.detectTypo(state.message, this.settings.typoCandidates);
      return verdict.typo ? verdict.candidates : [];
    } catch (error) {
      this.logFailure(state, "typo", error, "typo classification failed; assuming correct spelling");
      return [];
    }
  }

  private async retrieve(
    state: TurnState,
  ): Promise<{ context: string; summary: RetrievalSummary }> {
    state.trace.push("retrieval");
    let content: RetrievedContent;
    try {
      content = await this.retriever.retrieve(state.term);
    } catch (error) {
      this.logFailure(state, "retrieval", error, "retrieval failed; answering from history");
      const reason = error instanceof RetrievalError ? error.reason : errorMessage(error);
      const fallback = state.history.length
        ? `${SOFT_RETRIEVAL_WARNING}\n\n${conversationContext(state.history, CONTEXT_WINDOW)}`
        : SOFT_RETRIEVAL_WARNING;
      return { context: fallback, summary: { status: "failed", reason } };
    }

    return {
      context: referenceContext(content),
      summary: { status: "ok", url: content.url, title: content.title },
    };
  }

  private async generate(state: TurnState, context: string): Promise<string> {
    state.trace.push("generation");
    const messages: Message[] = [
      { role: "system", content: this.prompts.render("system", {}) },
      ...trimConversationHistory(state.history, this.settings.historyLimit),
      {
        role: "user",
        content: this.prompts.render("answer", { context, query: state.term }),
      },
    ];

    try {
      const response = await this.model.complete(messages, {
        timeoutMs: this.settings.modelTimeoutMs,
      });
      if (!response.content) throw new Error("model returned an empty reply");
      return response.content;
    } catch (error) {
      this.logFailure(state, "generation", error, "generation failed; sending apology");
      return APOLOGY_REPLY;
    }
  }

  private persist(state: TurnState, reply: string): boolean {
    state.trace.push("persistence");
    try {
      this.sessions.appendMessage(state.sessionId, "user", state.message);
      this.sessions.appendMessage(state.sessionId, "assistant", reply);
      return true;
    } catch (error) {
      this.logFailure(state, "persistence", error, "could not store turn");
      return false;
    }
  }

  private logFailure(state: TurnState, gate: Gate, error: unknown, msg: string): void {
    this.log.warn(
      {
        sessionId: state.sessionId,
        gate,
        term: state.term,
        err: error instanceof Error ? error : undefined,
        reason: errorMessage(error),
      },
      msg,
    );
  }
}
