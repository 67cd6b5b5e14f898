import type { PhaseTimeouts, ReferenceConfig } from "../config.js";
import {
  RetrievalError,
  errorMessage,
  isTimeoutError,
  type AgentPhase,
} from "../errors.js";
import { createLogger, type Logger } from "../logger.js";
import type {
  EvaluatingPage,
  ExtractedElement,
  NavigablePage,
  PageRunner,
  RetrievedContent,
} from "./contracts.js";
import { ElementExtractor, isolateMainContent, type MainContent } from "./perception.js";
import { selectBestCandidate } from "./result-scorer.js";
import {
  buildSearchUrl,
  canonicalizeUrl,
  isHttpUrl,
  isSearchPageLink,
} from "./url-utils.js";

export type RetrievalPage = EvaluatingPage & NavigablePage;

export interface Retriever {
  retrieve(term: string): Promise<RetrievedContent>;
}

export interface ResultLink {
  href: string;
  text: string;
  context: string;
  index: number;
}

export interface RetrievalAgentOptions {
  reference: ReferenceConfig;
  timeouts: Pick<PhaseTimeouts, "navigationMs" | "settleMs">;
  extractor?: { extract(page: EvaluatingPage): Promise<ExtractedElement[]> };
  readContent?: (html: string, url: string, options: { minChars: number }) => MainContent;
  log?: Logger;
}

/**
 * Result links of a search listing: visible anchors with an http(s) target
 * that sit inside a result container. Links back to the search page itself
 * are dropped, and each target is kept once, at its first position.
 */
export function resultLinks(
  elements: readonly ExtractedElement[],
  searchUrl: string,
): ResultLink[] {
  const seen = new Set<string>();
  const links: ResultLink[] = [];

  for (const element of elements) {
    if (element.tag !== "A" || !element.visible) continue;
    const { href, context } = element.attributes;
    if (!context || !isHttpUrl(href) || isSearchPageLink(href, searchUrl)) continue;

    const canonical = canonicalizeUrl(href);
    if (seen.has(canonical)) continue;
    seen.add(canonical);
    links.push({ href, text: element.text, context, index: element.index });
  }

  return links;
}

/**
 * Search form of a topic or question: punctuation becomes spacing, so
 * "Asthma?" is searched and scored as "Asthma".
 */
export function searchTerm(term: string): string {
  return term
    .replace(/[^\p{L}\p{N}\s]/gu, " ")
    .replace(/\s+/g, " ")
    .trim();
}

/**
 * Fetches reference text for a topic by driving the shared page through the
 * reference site's search listing. Every failure comes out as RetrievalError.
 */
export class RetrievalAgent<P extends RetrievalPage = RetrievalPage> implements Retriever {
  private readonly reference: ReferenceConfig;
  private readonly timeouts: Pick<PhaseTimeouts, "navigationMs" | "settleMs">;
  private readonly extractor: { extract(page: EvaluatingPage): Promise<ExtractedElement[]> };
  private readonly readContent: NonNullable<RetrievalAgentOptions["readContent"]>;
  private readonly log: Logger;

  constructor(
    private readonly pages: PageRunner<P>,
    options: RetrievalAgentOptions,
  ) {
    this.reference = options.reference;
    this.timeouts = options.timeouts;
    this.extractor = options.extractor ?? new ElementExtractor();
    this.readContent = options.readContent ?? isolateMainContent;
    this.log = options.log ?? createLogger("retrieval-agent");
  }

  async retrieve(term: string): Promise<RetrievedContent> {
    const cleanTerm = searchTerm(term);
    if (!cleanTerm) {
      throw new RetrievalError("Cannot retrieve an empty term", {
        reason: "no_results",
        term,
        phase: "navigation",
      });
    }

    try {
      return await this.pages.runExclusive((page) => this.retrieveOn(page, cleanTerm));
    } catch (error) {
      if (error instanceof RetrievalError) throw error;
      // Session launch failures arrive here as TransientAgentError.
      throw new RetrievalError(`Retrieval of '${cleanTerm}' failed: ${errorMessage(error)}`, {
        reason: isTimeoutError(error) ? "timeout" : "navigation_failed",
        term: cleanTerm,
        phase: "launch",
        cause: error,
      });
    }
  }

  private async retrieveOn(page: P, term: string): Promise<RetrievedContent> {
    const searchUrl = buildSearchUrl(this.reference.searchUrl, term);
    await this.open(page, searchUrl, term);

    let elements: ExtractedElement[];
    try {
      elements = await this.extractor.extract(page);
    } catch (error) {
      throw this.fail(term, "extraction", error, "Reading the results listing");
    }

    const links = resultLinks(elements, searchUrl);
    if (links.length === 0) {
      throw new RetrievalError(`No search results for '${term}'`, {
        reason: "no_results",
        term,
        phase: "extraction",
      });
    }

    const choice = selectBestCandidate(term, links, (link) => `${link.text} ${link.context}`);
    if (choice.status === "no_confident_match") {
      throw new RetrievalError(`No result for '${term}' shares a word with it`, {
        reason: "no_confident_match",
        term,
        phase: "extraction",
      });
    }

    const best = choice.best.candidate;
    this.log.info(
      { term, url: best.href, score: choice.best.score, candidates: links.length },
      "selected search result",
    );
    await this.open(page, best.href, term);

    let html: string;
    try {
      html = await page.content();
    } catch (error) {
      throw this.fail(term, "extraction", error, "Reading the article");
    }

    const url = page.url();
    const content = this.readContent(html, url, { minChars: this.reference.minChars });
    if (content.text.length < this.reference.minChars) {
      throw new RetrievalError(
        `Article for '${term}' has only ${content.text.length} characters of text`,
        { reason: "thin_content", term, phase: "extraction" },
      );
    }

    return {
      term,
      url,
      title: content.title || best.text,
      text: content.text.slice(0, this.reference.maxChars),
    };
  }

  private async open(page: P, url: string, term: string): Promise<void> {
    try {
      await page.goto(url, { waitUntil: "commit", timeout: this.timeouts.navigationMs });
    } catch (error) {
      throw this.fail(term, "navigation", error, `Navigation to ${url}`);
    }

    try {
      await page.waitForLoadState(this.reference.settle, { timeout: this.timeouts.settleMs });
    } catch (error) {
      throw this.fail(term, "settle", error, `Waiting for ${this.reference.settle}`);
    }
  }

  private fail(term: string, phase: AgentPhase, error: unknown, context: string): RetrievalError {
    const timedOut = isTimeoutError(error);
    return new RetrievalError(
      `${context} ${timedOut ? "timed out" : "failed"}: ${errorMessage(error)}`,
      {
        reason: timedOut ? "timeout" : "navigation_failed",
        term,
        phase,
        cause: error,
      },
    );
  }
}
