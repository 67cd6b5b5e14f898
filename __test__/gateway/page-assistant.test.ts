import { describe, expect, it, vi } from "vitest";
import type { LanguageModel } from "../../agent/src/index.js";
import { PromptLibrary } from "../../agent/src/prompts.js";
import { PageAssistant } from "../../gateway/src/page-assistant.js";
import { PlanValidationError, TransientAgentError } from "../../runtime/src/errors.js";
import type { SavedTask } from "../../runtime/src/task-store.js";
import { ActionExecutor } from "../../runtime/src/web-agent/action-executor.js";
import type {
  ActionLocator,
  BrowsingPage,
  ExtractedElement,
} from "../../runtime/src/web-agent/contracts.js";

const prompts = new PromptLibrary({
  system: "SYS",
  followup_detection: "{{history}}|{{query}}",
  typo_detection: "{{query}}|{{max_candidates}}",
  answer: "{{context}}|{{query}}",
  action_planning: "{{elements}}|{{instruction}}",
  article_simplification: "SIMPLIFY:{{content}}",
});

const SEARCH_BOX: ExtractedElement = {
  index: 0,
  tag: "INPUT",
  text: "",
  visible: true,
  attributes: {
    id: "q",
    name: "search",
    type: "text",
    class: "cdx-text-input",
    placeholder: "Search",
    href: "",
    ariaLabel: "",
    context: "",
  },
};

class FakeBrowserPage implements BrowsingPage {
  readonly events: string[] = [];
  private current = "about:blank";

  constructor(private readonly html = "<html><body></body></html>") {}

  async goto(url: string, options?: { waitUntil?: string; timeout?: number }) {
    this.events.push(`goto ${url} ${options?.waitUntil} ${options?.timeout}`);
    this.current = url;
    return null;
  }

  async waitForLoadState(state?: "load" | "domcontentloaded" | "networkidle") {
    this.events.push(`settle ${state}`);
  }

  url(): string {
    return this.current;
  }

  async title(): Promise<string> {
    return "Search page";
  }

  async content(): Promise<string> {
    return this.html;
  }

  async evaluate(): Promise<never> {
    throw new Error("extraction is injected in these tests");
  }

  locator(selector: string): { first(): ActionLocator } {
    const events = this.events;
    const target: ActionLocator = {
      async waitFor() {},
      async fill(value) {
        events.push(`fill ${selector} ${value}`);
      },
      async click() {
        events.push(`click ${selector}`);
      },
      async press(key) {
        events.push(`press ${selector} ${key}`);
      },
    };
    return { first: () => target };
  }

  async waitForTimeout(): Promise<void> {}
}

function assistantFor(page: FakeBrowserPage, reply = "[]") {
  const pages = { runExclusive: <T>(fn: (p: FakeBrowserPage) => Promise<T>) => fn(page) };
  const model = {
    complete: vi.fn<LanguageModel["complete"]>(async () => ({
      content: reply,
      usage: { inputTokens: 0, outputTokens: 0 },
    })),
  };
  const assistant = new PageAssistant<FakeBrowserPage>({
    pages,
    executor: new ActionExecutor<FakeBrowserPage>(pages, { timeouts: { actionMs: 5000 }, postActionDelayMs: 0 }),
    model,
    prompts,
    timeouts: { navigationMs: 15_000, settleMs: 10_000, actionMs: 5000, modelMs: 20_000 },
    minChars: 100,
    extractor: { extract: async () => [SEARCH_BOX] },
  });
  return { assistant, model };
}

describe("PageAssistant", () => {
  it("opens a site and lists its elements", async () => {
    const page = new FakeBrowserPage();
    const { assistant } = assistantFor(page);

    const result = await assistant.connect("ref.test/wiki/Main_Page");

    expect(result).toEqual({
      url: "https://ref.test/wiki/Main_Page",
      title: "Search page",
      elements: [SEARCH_BOX],
    });
    expect(page.events).toEqual([
      "goto https://ref.test/wiki/Main_Page commit 15000",
      "settle domcontentloaded",
    ]);
  });

  it("plans from the given elements and validates the model's steps", async () => {
    const { assistant, model } = assistantFor(
      new FakeBrowserPage(),
      'Plan: [{"type":"fill","selector":"#q","value":"gout"},{"type":"press","selector":"#q"}]',
    );

    const plan = await assistant.plan("search for gout", [SEARCH_BOX]);

    expect(plan.steps).toEqual([
      { type: "fill", selector: "#q", value: "gout" },
      { type: "press", selector: "#q", value: "Enter" },
    ]);
    const elements = JSON.stringify([
      { index: 0, tag: "INPUT", text: "", id: "q", name: "search", type: "text", placeholder: "Search", href: "", ariaLabel: "" },
    ]);
    expect(model.complete).toHaveBeenCalledWith(
      [{ role: "user", content: `${elements}|search for gout` }],
      { timeoutMs: 20_000, temperature: 0 },
    );
  });

  it("rejects a plan the model got wrong", async () => {
    const { assistant } = assistantFor(new FakeBrowserPage(), '[{"type":"scroll","selector":"body"}]');

    await expect(assistant.plan("scroll down", [SEARCH_BOX])).rejects.toBeInstanceOf(PlanValidationError);
  });

  it("replays a saved task on its start page", async () => {
    const page = new FakeBrowserPage();
    const { assistant } = assistantFor(page);
    const task: SavedTask = {
      name: "Search gout",
      url: "https://ref.test/",
      instruction: "search for gout",
      actions: [
        { type: "fill", selector: "#q", value: "gout" },
        { type: "press", selector: "#q", value: "Enter" },
      ],
      savedAt: "2026-01-01T00:00:00.000Z",
    };

    const report = await assistant.runTask(task);

    expect(report.status).toBe("completed");
    expect(page.events).toEqual([
      "goto https://ref.test/ commit 15000",
      "settle domcontentloaded",
      "fill #q gout",
      "press #q Enter",
    ]);
  });

  it("explains the open article", async () => {
    const paragraph = "Gout is a form of arthritis caused by uric acid crystals in the joints. ";
    const page = new FakeBrowserPage(
      `<html><head><title>Gout</title></head><body><article><p>${paragraph.repeat(6)}</p></article></body></html>`,
    );
    const { assistant, model } = assistantFor(page, "Gout makes joints hurt.");
    await page.goto("https://ref.test/wiki/Gout");

    const result = await assistant.simplify();

    expect(result.url).toBe("https://ref.test/wiki/Gout");
    expect(result.summary).toBe("Gout makes joints hurt.");
    const prompt = model.complete.mock.calls[0]?.[0][0]?.content ?? "";
    expect(prompt.startsWith("SIMPLIFY:")).toBe(true);
    expect(prompt).toContain("Gout is a form of arthritis caused by uric acid crystals in the joints.");
  });

  it("refuses to explain a page with too little text", async () => {
    const { assistant, model } = assistantFor(
      new FakeBrowserPage("<html><body><p>Gout hurts.</p></body></html>"),
    );

    await expect(assistant.simplify()).rejects.toThrow(
      "The open page has only 11 characters of readable text",
    );
    expect(model.complete).not.toHaveBeenCalled();
  });

  it("refuses to explain a page without text", async () => {
    const { assistant, model } = assistantFor(new FakeBrowserPage());

    await expect(assistant.simplify()).rejects.toBeInstanceOf(TransientAgentError);
    expect(model.complete).not.toHaveBeenCalled();
  });
});
