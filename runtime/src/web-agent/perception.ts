import { Readability } from "@mozilla/readability";
import { JSDOM } from "jsdom";
import { z } from "zod";
import { TransientAgentError, toTransientAgentError } from "../errors.js";
import type { EvaluatingPage, ExtractedElement } from "./contracts.js";

export interface RawElement {
  index: number;
  tag: string;
  text: string;
  id: string;
  name: string;
  type: string;
  class: string;
  placeholder: string;
  href: string;
  ariaLabel: string;
  context: string;
}

/**
 * Runs inside the page via page.evaluate, so it must stay self-contained:
 * no imports, no module-level constants, no helpers from this file.
 */
export function collectInteractiveElements(): RawElement[] {
  const clean = (value: string | null | undefined, max: number): string =>
    String(value ?? "")
      .replace(/\s+/g, " ")
      .trim()
      .slice(0, max);

  const nodes = Array.from(
    document.querySelectorAll<HTMLElement>("a, button, input, textarea, select, li"),
  );
  const collected: RawElement[] = [];

  nodes.forEach((el, index) => {
    const rect = el.getBoundingClientRect();
    if (rect.width <= 0 || rect.height <= 0) return;

    const value =
      el instanceof HTMLInputElement ||
      el instanceof HTMLTextAreaElement ||
      el instanceof HTMLSelectElement
        ? el.value
        : "";
    const ariaLabel = el.getAttribute("aria-label") ?? "";
    const rendered = clean(el.innerText ?? el.textContent, 80);
    const container = el.closest(".mw-search-result, .search-result, .result, li");

    collected.push({
      index,
      tag: el.tagName.toUpperCase(),
      text: rendered || clean(value, 80) || clean(ariaLabel, 80),
      id: el.id || "",
      name: el.getAttribute("name") ?? "",
      type:
        el instanceof HTMLInputElement || el instanceof HTMLButtonElement
          ? el.type
          : el.getAttribute("type") ?? "",
      class: el.getAttribute("class") ?? "",
      placeholder: el.getAttribute("placeholder") ?? "",
      href: el instanceof HTMLAnchorElement ? el.href : "",
      ariaLabel,
      context: container ? clean(container.textContent, 200) : "",
    });
  });

  return collected;
}

const rawElementSchema = z.object({
  index: z.number().int().nonnegative(),
  tag: z.enum(["A", "BUTTON", "INPUT", "TEXTAREA", "SELECT", "LI"]),
  text: z.string(),
  id: z.string(),
  name: z.string(),
  type: z.string(),
  class: z.string(),
  placeholder: z.string(),
  href: z.string(),
  ariaLabel: z.string(),
  context: z.string(),
});

export function toExtractedElements(payload: unknown): ExtractedElement[] {
  const parsed = z.array(rawElementSchema).safeParse(payload);
  if (!parsed.success) {
    throw new TransientAgentError(
      `Page returned an unexpected element list: ${parsed.error.issues[0]?.message ?? "invalid"}`,
      "extraction",
    );
  }

  return parsed.data.map(({ index, tag, text, ...attributes }) => ({
    index,
    tag,
    text,
    attributes,
    visible: true,
  }));
}

export class ElementExtractor {
  /**
   * Flat, ordered list of the visible interactive elements of the current page.
   * Deterministic for a page that is not changing underneath.
   */
  async extract(page: EvaluatingPage): Promise<ExtractedElement[]> {
    let payload: unknown;
    try {
      payload = await page.evaluate(collectInteractiveElements);
    } catch (error) {
      throw toTransientAgentError(error, "extraction", "Element extraction");
    }
    return toExtractedElements(payload);
  }
}

export interface MainContent {
  title: string;
  text: string;
}

const CONTENT_SELECTORS = [
  "#mw-content-text",
  "article",
  "[role='main']",
  ".article-content",
  "main",
  "#content",
];

function collapse(text: string | null | undefined): string {
  return String(text ?? "")
    .replace(/\s+/g, " ")
    .trim();
}

/**
 * Isolate the readable body of a page and drop navigation chrome.
 * Readability first; when it yields too little, the first known content
 * region with enough text, then the whole body.
 */
export function isolateMainContent(
  html: string,
  url: string,
  options: { minChars?: number } = {},
): MainContent {
  const minChars = options.minChars ?? 200;

  const readerDom = new JSDOM(html, { url });
  const article = new Readability(readerDom.window.document).parse();
  const articleText = collapse(article?.textContent);
  if (article && articleText.length >= minChars) {
    return { title: collapse(article.title), text: articleText };
  }

  const doc = new JSDOM(html, { url }).window.document;
  for (const selector of CONTENT_SELECTORS) {
    const region = doc.querySelector(selector);
    const regionText = collapse(region?.textContent);
    if (regionText.length >= minChars) {
      return { title: collapse(doc.title), text: regionText };
    }
  }

  return { title: collapse(doc.title), text: collapse(doc.body?.textContent) };
}
