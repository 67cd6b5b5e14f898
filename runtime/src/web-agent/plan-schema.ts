import { z } from "zod";
import { PlanValidationError } from "../errors.js";
import type { ActionKind, ActionStep } from "./contracts.js";

export const ACTION_KINDS: readonly ActionKind[] = ["fill", "click", "press", "wait"];

export const MAX_WAIT_MS = 30_000;

const selector = z.string().trim().min(1, "selector is required");

const fillStep = z.object({
  type: z.literal("fill"),
  selector,
  value: z.string().default(""),
});

const clickStep = z.object({
  type: z.literal("click"),
  selector,
});

const pressStep = z.object({
  type: z.literal("press"),
  selector,
  value: z.string().min(1).optional(),
  key: z.string().min(1).optional(),
});

// Models often emit `"selector": ""` for a plain pause.
const optionalSelector = z.preprocess(
  (value) => (typeof value === "string" && value.trim() === "" ? undefined : value),
  z.string().trim().min(1).optional(),
);

const waitStep = z.object({
  type: z.literal("wait"),
  selector: optionalSelector,
  duration: z.number().int().min(0).max(MAX_WAIT_MS).optional(),
});

const stepSchema = z.discriminatedUnion("type", [fillStep, clickStep, pressStep, waitStep]);

function normalizeStep(step: z.infer<typeof stepSchema>): ActionStep {
  if (step.type === "press") {
    return { type: "press", selector: step.selector, value: step.value ?? step.key ?? "Enter" };
  }
  return step;
}

/**
 * Pull the JSON array out of model output such as
 * "Here is the plan: [ {...} ]" and parse it.
 */
export function extractPlanPayload(raw: string): unknown {
  const start = raw.indexOf("[");
  const end = raw.lastIndexOf("]");
  if (start < 0 || end <= start) {
    throw new PlanValidationError("No JSON array found in action plan", null);
  }
  try {
    return JSON.parse(raw.slice(start, end + 1));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new PlanValidationError(`Action plan is not valid JSON: ${reason}`, null);
  }
}

/**
 * Validate an untrusted action plan. Accepts an array of steps or model text
 * containing one. Throws PlanValidationError naming the first bad step.
 */
export function parseActionPlan(input: unknown): ActionStep[] {
  const payload = typeof input === "string" ? extractPlanPayload(input) : input;
  if (!Array.isArray(payload)) {
    throw new PlanValidationError("Action plan must be an array of steps", null);
  }

  const steps: ActionStep[] = [];
  payload.forEach((candidate: unknown, index) => {
    const kind = isRecord(candidate) ? candidate.type : undefined;
    if (typeof kind !== "string" || !ACTION_KINDS.some((known) => known === kind)) {
      throw new PlanValidationError(
        `Step ${index} has unknown action type '${String(kind)}'`,
        index,
        [`expected one of ${ACTION_KINDS.join(", ")}`],
      );
    }

    const parsed = stepSchema.safeParse(candidate);
    if (!parsed.success) {
      const issues = parsed.error.issues.map(
        (issue) => `${issue.path.join(".") || "step"}: ${issue.message}`,
      );
      throw new PlanValidationError(`Step ${index} (${kind}) is malformed`, index, issues);
    }
    steps.push(normalizeStep(parsed.data));
  });

  return steps;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
