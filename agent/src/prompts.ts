import { readFileSync } from "fs";
import { z } from "zod";
import { ConfigurationError, errorMessage } from "../../runtime/src/errors.js";

/** Placeholders each template may use. Anything else is a startup error. */
export const PROMPT_VARIABLES = {
  system: [],
  followup_detection: ["history", "query"],
  typo_detection: ["query", "max_candidates"],
  answer: ["context", "query"],
  action_planning: ["elements", "instruction"],
  article_simplification: ["content"],
} as const satisfies Record<string, readonly string[]>;

export type PromptName = keyof typeof PROMPT_VARIABLES;

export type PromptVariables<K extends PromptName> = Record<
  (typeof PROMPT_VARIABLES)[K][number],
  string | number
>;

const PLACEHOLDER = /\{\{\s*([a-zA-Z_][a-zA-Z0-9_]*)\s*\}\}/g;

const promptFileSchema = z.record(
  z.union([
    z.string(),
    z.object({ template: z.string(), description: z.string().optional() }),
  ]),
);

export function placeholdersOf(template: string): string[] {
  return Array.from(new Set(Array.from(template.matchAll(PLACEHOLDER), (match) => match[1] ?? "")));
}

function isPromptName(name: string): name is PromptName {
  return Object.prototype.hasOwnProperty.call(PROMPT_VARIABLES, name);
}

/**
 * Named prompt templates with `{{placeholder}}` slots. Construction checks
 * every template, so a broken prompt file stops the process at startup
 * instead of failing a request later.
 */
export class PromptLibrary {
  private readonly templates: Map<PromptName, string>;

  constructor(templates: Record<string, string>) {
    this.templates = new Map();

    for (const name of Object.keys(PROMPT_VARIABLES)) {
      if (!isPromptName(name)) continue;
      const template = templates[name];
      if (template === undefined || template.trim() === "") {
        throw new ConfigurationError(`Prompt template '${name}' is missing`);
      }

      const allowed: readonly string[] = PROMPT_VARIABLES[name];
      const unknown = placeholdersOf(template).filter((key) => !allowed.includes(key));
      if (unknown.length > 0) {
        throw new ConfigurationError(
          `Prompt template '${name}' uses unknown placeholder(s): ${unknown.join(", ")}`,
        );
      }
      this.templates.set(name, template);
    }
  }

  static fromFile(path: string): PromptLibrary {
    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(path, "utf-8"));
    } catch (error) {
      throw new ConfigurationError(`Cannot read prompt file ${path}: ${errorMessage(error)}`);
    }

    const parsed = promptFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigurationError(
        `Prompt file ${path} must map names to templates: ${parsed.error.issues[0]?.message ?? "invalid"}`,
      );
    }

    const templates: Record<string, string> = {};
    for (const [name, entry] of Object.entries(parsed.data)) {
      templates[name] = typeof entry === "string" ? entry : entry.template;
    }
    return new PromptLibrary(templates);
  }

  render<K extends PromptName>(name: K, variables: PromptVariables<K>): string {
    const template = this.templates.get(name) ?? "";
    const values = new Map<string, string | number>(Object.entries(variables));
    return template.replace(PLACEHOLDER, (_match, key: string) => String(values.get(key) ?? ""));
  }
}
