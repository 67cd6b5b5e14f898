import type { Locator, Page } from "playwright";

export type ElementTag = "A" | "BUTTON" | "INPUT" | "TEXTAREA" | "SELECT" | "LI";

export interface ElementAttributes {
  id: string;
  name: string;
  type: string;
  class: string;
  placeholder: string;
  href: string;
  ariaLabel: string;
  /** Text of the closest search-result container, empty outside one. */
  context: string;
}

/**
 * One visible interactive element of the current page. Produced fresh by every
 * extraction; never reused across navigations.
 */
export interface ExtractedElement {
  /** Position among all matched elements in document order, hidden ones included. */
  index: number;
  tag: ElementTag;
  text: string;
  attributes: ElementAttributes;
  visible: boolean;
}

export type ActionKind = "fill" | "click" | "press" | "wait";

export type ActionStep =
  | { type: "fill"; selector: string; value: string }
  | { type: "click"; selector: string }
  | { type: "press"; selector: string; value: string }
  | { type: "wait"; selector?: string; duration?: number };

export type StepStatus = "succeeded" | "failed" | "not_attempted";

export interface StepResult {
  index: number;
  step: ActionStep;
  status: StepStatus;
  detail: string;
}

export interface PlanFailure {
  index: number;
  reason: string;
}

export interface PlanExecutionReport {
  status: "completed" | "failed";
  results: StepResult[];
  failure?: PlanFailure;
}

export interface RetrievedContent {
  term: string;
  url: string;
  title: string;
  text: string;
}

// Narrow views of the Playwright page. Each component declares only what it
// touches, so a real Page satisfies them and tests can hand in small fakes.

export type ActionLocator = Pick<Locator, "waitFor" | "fill" | "click" | "press">;

export interface ActionPage {
  locator(selector: string): { first(): ActionLocator };
  waitForTimeout(timeout: number): Promise<void>;
}

export type EvaluatingPage = Pick<Page, "evaluate">;

export type NavigablePage = Pick<Page, "goto" | "waitForLoadState" | "url" | "title" | "content">;

export type BrowsingPage = ActionPage & EvaluatingPage & NavigablePage;

/** Lends out the shared page, one caller at a time. */
export interface PageRunner<P> {
  runExclusive<T>(fn: (page: P) => Promise<T>): Promise<T>;
}
