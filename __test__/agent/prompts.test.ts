import { fileURLToPath } from "url";
import { describe, expect, it } from "vitest";
import { PromptLibrary, placeholdersOf } from "../../agent/src/prompts.js";
import { ConfigurationError } from "../../runtime/src/errors.js";

const PROMPTS_PATH = fileURLToPath(new URL("../../prompts.json", import.meta.url));

const MINIMAL = {
  system: "You explain things simply.",
  followup_detection: "{{history}}\n{{query}}",
  typo_detection: "{{query}} ({{max_candidates}})",
  answer: "{{context}}\n\nQ: {{query}}",
  action_planning: "{{elements}} -> {{instruction}}",
  article_simplification: "{{content}}",
};

describe("PromptLibrary", () => {
  it("loads and validates the shipped prompt file", () => {
    const prompts = PromptLibrary.fromFile(PROMPTS_PATH);

    const rendered = prompts.render("typo_detection", { query: "asthmaa", max_candidates: 3 });
    expect(rendered).toContain("Term: asthmaa");
    expect(rendered).toContain("at most 3 candidates");
    expect(rendered).not.toContain("{{");
  });

  it("substitutes every placeholder occurrence", () => {
    const prompts = new PromptLibrary({ ...MINIMAL, answer: "{{query}} / {{ query }} / {{context}}" });

    expect(prompts.render("answer", { query: "gout", context: "ctx" })).toBe("gout / gout / ctx");
  });

  it("rejects unknown placeholders at load time", () => {
    expect(() => new PromptLibrary({ ...MINIMAL, answer: "{{context}} {{question}}" })).toThrow(
      "Prompt template 'answer' uses unknown placeholder(s): question",
    );
  });

  it("rejects a missing template", () => {
    const { typo_detection: _dropped, ...rest } = MINIMAL;
    expect(() => new PromptLibrary(rest)).toThrow(ConfigurationError);
  });

  it("reports an unreadable prompt file as a configuration error", () => {
    expect(() => PromptLibrary.fromFile("/nonexistent/prompts.json")).toThrow(ConfigurationError);
  });

  it("lists the placeholders of a template once each", () => {
    expect(placeholdersOf("{{a}} {{b}} {{ a }} {c}")).toEqual(["a", "b"]);
  });
});
