import { errors } from "playwright";
import { describe, expect, it } from "vitest";
import { PlanValidationError } from "../../../runtime/src/errors.js";
import { ActionExecutor } from "../../../runtime/src/web-agent/action-executor.js";
import type { ActionLocator, ActionPage, ActionStep } from "../../../runtime/src/web-agent/contracts.js";

type Call = [action: string, selector: string, value?: string | number];

class FakePage implements ActionPage {
  readonly calls: Call[] = [];
  readonly sleeps: number[] = [];

  constructor(private readonly missing: ReadonlySet<string> = new Set()) {}

  locator(selector: string): { first(): ActionLocator } {
    const calls = this.calls;
    const missing = this.missing;
    const target: ActionLocator = {
      async waitFor(options) {
        calls.push(["waitFor", selector, options?.timeout]);
        if (missing.has(selector)) {
          throw new errors.TimeoutError(`locator.waitFor: Timeout ${options?.timeout}ms exceeded.`);
        }
      },
      async fill(value) {
        calls.push(["fill", selector, value]);
      },
      async click() {
        calls.push(["click", selector]);
      },
      async press(key) {
        calls.push(["press", selector, key]);
      },
    };
    return { first: () => target };
  }

  async waitForTimeout(timeout: number): Promise<void> {
    this.sleeps.push(timeout);
  }
}

function executorFor(page: FakePage, postActionDelayMs = 300) {
  return new ActionExecutor<FakePage>(
    { runExclusive: (fn) => fn(page) },
    { timeouts: { actionMs: 5000 }, postActionDelayMs },
  );
}

describe("ActionExecutor", () => {
  it("reports completed steps, the failing step and the steps never attempted", async () => {
    const page = new FakePage(new Set(["#missing"]));
    const report = await executorFor(page).execute([
      { type: "fill", selector: "#q", value: "asthma" },
      { type: "click", selector: "#missing" },
      { type: "press", selector: "#q", value: "Enter" },
    ]);

    expect(report.status).toBe("failed");
    expect(report.results.map((r) => r.status)).toEqual([
      "succeeded",
      "failed",
      "not_attempted",
    ]);
    expect(report.results[0]?.detail).toBe("Filled '#q' with 'asthma'");
    expect(report.failure).toEqual({
      index: 1,
      reason: "Could not resolve '#missing': not visible within 5000ms",
    });
    expect(page.calls.some(([action]) => action === "press")).toBe(false);
    expect(page.calls.some(([action]) => action === "click")).toBe(false);
  });

  it("resolves each locator before acting and pauses after fill and click", async () => {
    const page = new FakePage();
    const report = await executorFor(page).execute([
      { type: "fill", selector: "#q", value: "flu" },
      { type: "click", selector: "button[type=submit]" },
    ]);

    expect(report).toEqual({
      status: "completed",
      results: [
        {
          index: 0,
          step: { type: "fill", selector: "#q", value: "flu" },
          status: "succeeded",
          detail: "Filled '#q' with 'flu'",
        },
        {
          index: 1,
          step: { type: "click", selector: "button[type=submit]" },
          status: "succeeded",
          detail: "Clicked 'button[type=submit]'",
        },
      ],
    });
    expect(page.calls).toEqual([
      ["waitFor", "#q", 5000],
      ["fill", "#q", "flu"],
      ["waitFor", "button[type=submit]", 5000],
      ["click", "button[type=submit]"],
    ]);
    expect(page.sleeps).toEqual([300, 300]);
  });

  it("presses Enter when the plan names no key", async () => {
    const page = new FakePage();
    await executorFor(page, 0).execute([{ type: "press", selector: "#q" }]);

    expect(page.calls).toContainEqual(["press", "#q", "Enter"]);
    expect(page.sleeps).toEqual([]);
  });

  it("waits for a selector to become visible, bounded by the step duration", async () => {
    const page = new FakePage();
    const report = await executorFor(page).execute([
      { type: "wait", selector: ".results", duration: 1200 },
    ]);

    expect(report.results[0]?.detail).toBe("Element visible: '.results'");
    expect(page.calls).toEqual([["waitFor", ".results", 1200]]);
    expect(page.sleeps).toEqual([]);
  });

  it("bounds a zero-duration selector wait by the action timeout", async () => {
    const page = new FakePage(new Set(["#never"]));
    const report = await executorFor(page).execute([{ type: "wait", selector: "#never", duration: 0 }]);

    expect(page.calls).toEqual([["waitFor", "#never", 5000]]);
    expect(report.status).toBe("failed");
  });

  it("sleeps for plain waits, 800ms by default and never beyond 30s", async () => {
    const page = new FakePage();
    const steps: ActionStep[] = [{ type: "wait" }, { type: "wait", duration: 45_000 }];
    const report = await executorFor(page).executeOn(page, steps);

    expect(report.status).toBe("completed");
    expect(page.sleeps).toEqual([800, 30_000]);
    expect(report.results.map((r) => r.detail)).toEqual(["Waited 800ms", "Waited 30000ms"]);
  });

  it("reports a timed-out locator wait as a failed step", async () => {
    const page = new FakePage(new Set([".never"]));
    const report = await executorFor(page).execute([{ type: "wait", selector: ".never" }]);

    expect(report.failure).toEqual({ index: 0, reason: "Timeout on wait '.never'" });
  });

  it("rejects an unknown action kind before touching the page", async () => {
    const page = new FakePage();
    const run = executorFor(page).execute([
      { type: "fill", selector: "#q", value: "flu" },
      { type: "scroll", selector: "body" },
    ]);

    await expect(run).rejects.toBeInstanceOf(PlanValidationError);
    await expect(run).rejects.toMatchObject({ stepIndex: 1 });
    expect(page.calls).toEqual([]);
  });
});
