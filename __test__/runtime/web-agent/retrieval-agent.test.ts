import { errors } from "playwright";
import { describe, expect, it } from "vitest";
import { RetrievalError, TransientAgentError } from "../../../runtime/src/errors.js";
import type { ExtractedElement, PageRunner } from "../../../runtime/src/web-agent/contracts.js";
import type { MainContent } from "../../../runtime/src/web-agent/perception.js";
import {
  RetrievalAgent,
  resultLinks,
  searchTerm,
  type RetrievalAgentOptions,
  type RetrievalPage,
} from "../../../runtime/src/web-agent/retrieval-agent.js";

const SEARCH_TEMPLATE = "https://ref.test/w/index.php?search={term}";

function link(index: number, text: string, href: string, context: string): ExtractedElement {
  return {
    index,
    tag: "A",
    text,
    visible: true,
    attributes: { id: "", name: "", type: "", class: "", placeholder: "", href, ariaLabel: "", context },
  };
}

const LISTING: ExtractedElement[] = [
  link(0, "Main page", "https://ref.test/wiki/Main_Page", ""),
  link(3, "Diabetes insipidus", "https://ref.test/wiki/Diabetes_insipidus", "Diabetes insipidus: a rare condition of thirst"),
  link(5, "Diabetes type 2", "https://ref.test/wiki/Type_2_diabetes", "Diabetes type 2 — causes and treatment"),
  link(8, "next 20", "https://ref.test/w/index.php?search=diabetes+type+2&offset=20", "Results 1 – 20 for diabetes type 2"),
];

class FakePage implements RetrievalPage {
  readonly visited: string[] = [];
  readonly settles: Array<string | undefined> = [];
  private current = "about:blank";

  constructor(private readonly failGoto?: unknown) {}

  async goto(url: string) {
    if (this.failGoto) throw this.failGoto;
    this.visited.push(url);
    this.current = url;
    return null;
  }

  async waitForLoadState(state?: "load" | "domcontentloaded" | "networkidle") {
    this.settles.push(state);
  }

  url(): string {
    return this.current;
  }

  async title(): Promise<string> {
    return "";
  }

  async content(): Promise<string> {
    return `<html><body>${this.current}</body></html>`;
  }

  async evaluate(): Promise<never> {
    throw new Error("extraction is injected in these tests");
  }
}

function agentFor(
  page: FakePage,
  options: {
    listing?: ExtractedElement[];
    article?: MainContent;
    maxChars?: number;
    runner?: PageRunner<FakePage>;
  } = {},
) {
  const reads: string[] = [];
  const settings: RetrievalAgentOptions = {
    reference: {
      searchUrl: SEARCH_TEMPLATE,
      maxChars: options.maxChars ?? 2500,
      minChars: 100,
      settle: "networkidle",
    },
    timeouts: { navigationMs: 15_000, settleMs: 10_000 },
    extractor: { extract: async () => options.listing ?? LISTING },
    readContent: (_html, url) => {
      reads.push(url);
      return options.article ?? { title: "Type 2 diabetes", text: "Type 2 diabetes is a condition. ".repeat(10) };
    },
  };
  const runner: PageRunner<FakePage> = options.runner ?? { runExclusive: (fn) => fn(page) };
  return { agent: new RetrievalAgent<FakePage>(runner, settings), reads };
}

async function retrievalError(run: Promise<unknown>): Promise<RetrievalError> {
  try {
    await run;
  } catch (error) {
    if (error instanceof RetrievalError) return error;
    throw error;
  }
  throw new Error("expected a RetrievalError");
}

describe("RetrievalAgent", () => {
  it("searches, follows the best-scoring result and returns its text", async () => {
    const page = new FakePage();
    const { agent, reads } = agentFor(page, { maxChars: 50 });

    const content = await agent.retrieve("diabetes type 2");

    expect(page.visited).toEqual([
      "https://ref.test/w/index.php?search=diabetes%20type%202",
      "https://ref.test/wiki/Type_2_diabetes",
    ]);
    expect(page.settles).toEqual(["networkidle", "networkidle"]);
    expect(reads).toEqual(["https://ref.test/wiki/Type_2_diabetes"]);
    expect(content).toEqual({
      term: "diabetes type 2",
      url: "https://ref.test/wiki/Type_2_diabetes",
      title: "Type 2 diabetes",
      text: "Type 2 diabetes is a condition. ".repeat(10).slice(0, 50),
    });
  });

  it("searches and scores a question by its words, not its punctuation", async () => {
    const page = new FakePage();
    const { agent } = agentFor(page, {
      listing: [link(2, "Asthma", "https://ref.test/wiki/Asthma", "Asthma: a chronic condition of the airways")],
    });

    const content = await agent.retrieve("Asthma?");

    expect(page.visited).toEqual([
      "https://ref.test/w/index.php?search=Asthma",
      "https://ref.test/wiki/Asthma",
    ]);
    expect(content.term).toBe("Asthma");
  });

  it("reports no_results when the listing has no result links", async () => {
    const { agent } = agentFor(new FakePage(), { listing: [LISTING[0], LISTING[3]] });

    const error = await retrievalError(agent.retrieve("gout"));
    expect(error.reason).toBe("no_results");
    expect(error.term).toBe("gout");
  });

  it("reports no_confident_match instead of picking an unrelated result", async () => {
    const page = new FakePage();
    const { agent } = agentFor(page);

    const error = await retrievalError(agent.retrieve("gout"));
    expect(error.reason).toBe("no_confident_match");
    expect(page.visited).toHaveLength(1);
  });

  it("reports thin_content for near-empty articles", async () => {
    const { agent } = agentFor(new FakePage(), { article: { title: "Stub", text: "Too short." } });

    const error = await retrievalError(agent.retrieve("diabetes"));
    expect(error.reason).toBe("thin_content");
  });

  it("maps a navigation timeout to a typed error", async () => {
    const page = new FakePage(new errors.TimeoutError("page.goto: Timeout 15000ms exceeded."));
    const { agent } = agentFor(page);

    const error = await retrievalError(agent.retrieve("asthma"));
    expect(error).toBeInstanceOf(TransientAgentError);
    expect(error.reason).toBe("timeout");
    expect(error.phase).toBe("navigation");
  });

  it("maps a failed session launch to a typed error", async () => {
    const { agent } = agentFor(new FakePage(), {
      runner: {
        runExclusive: async () => {
          throw new TransientAgentError("Rendering session launch failed: no browser", "launch");
        },
      },
    });

    const error = await retrievalError(agent.retrieve("asthma"));
    expect(error.reason).toBe("navigation_failed");
    expect(error.phase).toBe("launch");
  });
});

describe("searchTerm", () => {
  it("turns punctuation into spacing", () => {
    expect(searchTerm("  What is type-2 diabetes?! ")).toBe("What is type 2 diabetes");
    expect(searchTerm("?!")).toBe("");
  });
});

describe("resultLinks", () => {
  it("keeps result links once each and skips links back to the search page", () => {
    const duplicate = link(9, "Type 2 diabetes", "https://ref.test/wiki/Type_2_diabetes#Signs", "Type 2 diabetes again");
    const links = resultLinks([...LISTING, duplicate], "https://ref.test/w/index.php?search=x");

    expect(links.map((entry) => entry.href)).toEqual([
      "https://ref.test/wiki/Diabetes_insipidus",
      "https://ref.test/wiki/Type_2_diabetes",
    ]);
  });
});
