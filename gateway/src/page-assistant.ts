import type { LanguageModel } from "../../agent/src/index.js";
import type { PromptLibrary } from "../../agent/src/prompts.js";
import type { PhaseTimeouts } from "../../runtime/src/config.js";
import { TransientAgentError, toTransientAgentError } from "../../runtime/src/errors.js";
import { createLogger, type Logger } from "../../runtime/src/logger.js";
import type { SavedTask } from "../../runtime/src/task-store.js";
import type { ActionExecutor } from "../../runtime/src/web-agent/action-executor.js";
import type {
  ActionStep,
  BrowsingPage,
  ExtractedElement,
  PageRunner,
  PlanExecutionReport,
} from "../../runtime/src/web-agent/contracts.js";
import { ElementExtractor, isolateMainContent } from "../../runtime/src/web-agent/perception.js";
import { parseActionPlan } from "../../runtime/src/web-agent/plan-schema.js";
import { normalizeTargetUrl } from "../../runtime/src/web-agent/url-utils.js";

export const SIMPLIFY_MAX_CHARS = 4000;

/** Elements handed to the planner; the list is cut to keep the prompt small. */
const PLANNER_ELEMENT_LIMIT = 150;

export interface ConnectResult {
  url: string;
  title: string;
  elements: ExtractedElement[];
}

export interface PlanResult {
  steps: ActionStep[];
  raw: string;
}

export interface SimplifyResult {
  url: string;
  title: string;
  summary: string;
}

export interface PageAssistantDeps<P extends BrowsingPage> {
  pages: PageRunner<P>;
  executor: ActionExecutor<P>;
  model: LanguageModel;
  prompts: PromptLibrary;
  timeouts: PhaseTimeouts;
  /** Least readable text, in characters, a page needs before it is explained. */
  minChars: number;
  extractor?: ElementExtractor;
  logger?: Logger;
}

/**
 * Manual browsing on the shared page: open a site, plan actions from an
 * instruction, run them, and explain the article that is open.
 */
export class PageAssistant<P extends BrowsingPage = BrowsingPage> {
  private readonly pages: PageRunner<P>;
  private readonly executor: ActionExecutor<P>;
  private readonly model: LanguageModel;
  private readonly prompts: PromptLibrary;
  private readonly timeouts: PhaseTimeouts;
  private readonly minChars: number;
  private readonly extractor: ElementExtractor;
  private readonly log: Logger;

  constructor(deps: PageAssistantDeps<P>) {
    this.pages = deps.pages;
    this.executor = deps.executor;
    this.model = deps.model;
    this.prompts = deps.prompts;
    this.timeouts = deps.timeouts;
    this.minChars = deps.minChars;
    this.extractor = deps.extractor ?? new ElementExtractor();
    this.log = deps.logger ?? createLogger("page-assistant");
  }

  async connect(rawUrl: string): Promise<ConnectResult> {
    const url = normalizeTargetUrl(rawUrl);
    return await this.pages.runExclusive(async (page) => {
      await this.open(page, url);
      const elements = await this.extractor.extract(page);
      this.log.info({ url, elements: elements.length }, "connected to page");
      return { url: page.url(), title: await page.title(), elements };
    });
  }

  /** Ask the model for a plan. Elements default to a fresh extraction of the open page. */
  async plan(instruction: string, elements?: readonly ExtractedElement[]): Promise<PlanResult> {
    const visible =
      elements ?? (await this.pages.runExclusive((page) => this.extractor.extract(page)));

    const prompt = this.prompts.render("action_planning", {
      elements: JSON.stringify(visible.slice(0, PLANNER_ELEMENT_LIMIT).map(plannerView)),
      instruction,
    });
    const response = await this.model.complete([{ role: "user", content: prompt }], {
      timeoutMs: this.timeouts.modelMs,
      temperature: 0,
    });

    const steps = parseActionPlan(response.content);
    this.log.info({ instruction, steps: steps.length }, "action plan created");
    return { steps, raw: response.content };
  }

  async execute(plan: unknown): Promise<PlanExecutionReport> {
    return await this.executor.execute(plan);
  }

  /** Open a saved task's start page and replay its actions in one exclusive run. */
  async runTask(task: SavedTask): Promise<PlanExecutionReport> {
    return await this.pages.runExclusive(async (page) => {
      await this.open(page, normalizeTargetUrl(task.url));
      return await this.executor.executeOn(page, task.actions);
    });
  }

  async simplify(): Promise<SimplifyResult> {
    const article = await this.pages.runExclusive(async (page) => {
      try {
        const html = await page.content();
        const url = page.url();
        return { url, ...isolateMainContent(html, url) };
      } catch (error) {
        throw toTransientAgentError(error, "extraction", "Reading the open page");
      }
    });

    if (article.text.length < this.minChars) {
      throw new TransientAgentError(
        `The open page has only ${article.text.length} characters of readable text`,
        "extraction",
      );
    }
    const content = article.text.slice(0, SIMPLIFY_MAX_CHARS);

    const response = await this.model.complete(
      [{ role: "user", content: this.prompts.render("article_simplification", { content }) }],
      { timeoutMs: this.timeouts.modelMs },
    );
    return { url: article.url, title: article.title, summary: response.content };
  }

  private async open(page: P, url: string): Promise<void> {
    try {
      await page.goto(url, { waitUntil: "commit", timeout: this.timeouts.navigationMs });
    } catch (error) {
      throw toTransientAgentError(error, "navigation", `Navigation to ${url}`);
    }
    try {
      await page.waitForLoadState("domcontentloaded", { timeout: this.timeouts.settleMs });
    } catch (error) {
      throw toTransientAgentError(error, "settle", `Loading ${url}`);
    }
  }
}

function plannerView(element: ExtractedElement) {
  const { id, name, type, placeholder, href, ariaLabel } = element.attributes;
  return { index: element.index, tag: element.tag, text: element.text, id, name, type, placeholder, href, ariaLabel };
}
