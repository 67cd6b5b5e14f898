import type { PhaseTimeouts } from "../config.js";
import { errorMessage, isTimeoutError } from "../errors.js";
import { createLogger, type Logger } from "../logger.js";
import type {
  ActionLocator,
  ActionPage,
  ActionStep,
  PageRunner,
  PlanExecutionReport,
  StepResult,
} from "./contracts.js";
import { MAX_WAIT_MS, parseActionPlan } from "./plan-schema.js";

export const DEFAULT_WAIT_MS = 800;

export interface ActionExecutorOptions {
  timeouts: Pick<PhaseTimeouts, "actionMs">;
  postActionDelayMs?: number;
}

class StepFailure extends Error {}

export class ActionExecutor<P extends ActionPage = ActionPage> {
  private readonly actionMs: number;
  private readonly postActionDelayMs: number;

  constructor(
    private readonly pages: PageRunner<P>,
    options: ActionExecutorOptions,
    private readonly log: Logger = createLogger("action-executor"),
  ) {
    this.actionMs = options.timeouts.actionMs;
    this.postActionDelayMs = options.postActionDelayMs ?? 300;
  }

  /**
   * Validate and run a plan on the shared page. Throws PlanValidationError
   * before touching the page when the plan is malformed.
   */
  async execute(plan: unknown): Promise<PlanExecutionReport> {
    const steps = parseActionPlan(plan);
    return await this.pages.runExclusive((page) => this.executeOn(page, steps));
  }

  /**
   * Run already-validated steps in order. The first step that fails stops the
   * plan; its index and reason are reported next to the finished steps.
   */
  async executeOn(page: P, steps: readonly ActionStep[]): Promise<PlanExecutionReport> {
    const results: StepResult[] = [];

    for (const [index, step] of steps.entries()) {
      this.log.info({ step: index + 1, total: steps.length, type: step.type }, "executing action");
      try {
        const detail = await this.runStep(page, step);
        results.push({ index, step, status: "succeeded", detail });
      } catch (error) {
        const reason = this.describeFailure(step, error);
        results.push({ index, step, status: "failed", detail: reason });
        for (const [laterIndex, later] of steps.entries()) {
          if (laterIndex <= index) continue;
          results.push({ index: laterIndex, step: later, status: "not_attempted", detail: "" });
        }
        this.log.warn({ step: index, type: step.type, reason }, "action plan aborted");
        return { status: "failed", results, failure: { index, reason } };
      }
    }

    return { status: "completed", results };
  }

  private async runStep(page: P, step: ActionStep): Promise<string> {
    switch (step.type) {
      case "fill": {
        const target = await this.resolve(page, step.selector);
        await target.fill(step.value, { timeout: this.actionMs });
        await this.pause(page);
        return `Filled '${step.selector}' with '${step.value}'`;
      }
      case "click": {
        const target = await this.resolve(page, step.selector);
        await target.click({ timeout: this.actionMs });
        await this.pause(page);
        return `Clicked '${step.selector}'`;
      }
      case "press": {
        const target = await this.resolve(page, step.selector);
        await target.press(step.value, { timeout: this.actionMs });
        return `Pressed '${step.value}' on '${step.selector}'`;
      }
      case "wait": {
        if (step.selector) {
          // Playwright reads a zero timeout as "wait forever".
          const timeout =
            step.duration && step.duration > 0 ? Math.min(MAX_WAIT_MS, step.duration) : this.actionMs;
          await page.locator(step.selector).first().waitFor({ state: "visible", timeout });
          return `Element visible: '${step.selector}'`;
        }
        const waitMs = Math.min(MAX_WAIT_MS, step.duration ?? DEFAULT_WAIT_MS);
        await page.waitForTimeout(waitMs);
        return `Waited ${waitMs}ms`;
      }
    }
  }

  private async resolve(page: P, selector: string): Promise<ActionLocator> {
    const target = page.locator(selector).first();
    try {
      await target.waitFor({ state: "visible", timeout: this.actionMs });
    } catch (error) {
      const cause = isTimeoutError(error)
        ? `not visible within ${this.actionMs}ms`
        : errorMessage(error);
      throw new StepFailure(`Could not resolve '${selector}': ${cause}`);
    }
    return target;
  }

  private async pause(page: P): Promise<void> {
    if (this.postActionDelayMs > 0) {
      await page.waitForTimeout(this.postActionDelayMs);
    }
  }

  private describeFailure(step: ActionStep, error: unknown): string {
    if (error instanceof StepFailure) return error.message;
    const target = step.selector ? ` '${step.selector}'` : "";
    if (isTimeoutError(error)) {
      return `Timeout on ${step.type}${target}`;
    }
    return `Error on ${step.type}${target}: ${errorMessage(error)}`;
  }
}
