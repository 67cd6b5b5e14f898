import { existsSync, mkdirSync, readFileSync, writeFileSync } from "fs";
import { dirname } from "path";
import { z } from "zod";
import { TaskStoreError, errorMessage } from "./errors.js";
import { createLogger } from "./logger.js";
import type { ActionStep } from "./web-agent/contracts.js";
import { parseActionPlan } from "./web-agent/plan-schema.js";

const log = createLogger("task-store");

export interface SavedTask {
  name: string;
  url: string;
  instruction: string;
  actions: ActionStep[];
  savedAt: string;
}

export interface SaveTaskInput {
  name: string;
  url: string;
  instruction?: string;
  actions?: unknown;
}

const storedTaskSchema = z.object({
  name: z.string().min(1),
  url: z.string(),
  instruction: z.string().default(""),
  actions: z.array(z.unknown()),
  savedAt: z.string().default(""),
});

/**
 * Named browsing routines kept in one JSON file: a start URL plus a validated
 * action plan that can be replayed later.
 */
export class TaskStore {
  constructor(private readonly filePath: string) {}

  list(): SavedTask[] {
    return this.readAll();
  }

  get(name: string): SavedTask | null {
    const wanted = name.trim().toLowerCase();
    return this.readAll().find((task) => task.name.toLowerCase() === wanted) ?? null;
  }

  /**
   * Validates the actions first; a task with the same name is replaced.
   * Stored entries this version cannot read are written back unchanged.
   */
  save(input: SaveTaskInput): SavedTask {
    const name = input.name.trim();
    if (!name) throw new Error("Task name is required");

    const task: SavedTask = {
      name,
      url: input.url.trim(),
      instruction: input.instruction?.trim() ?? "",
      actions: parseActionPlan(input.actions),
      savedAt: new Date().toISOString(),
    };

    const others = this.readEntriesForWrite().filter((entry) => !hasName(entry, name));
    this.writeEntries([...others, task]);
    log.info({ name, steps: task.actions.length }, "task saved");
    return task;
  }

  remove(name: string): boolean {
    const entries = this.readEntriesForWrite();
    const kept = entries.filter((entry) => !hasName(entry, name));
    if (kept.length === entries.length) return false;
    this.writeEntries(kept);
    log.info({ name: name.trim() }, "task removed");
    return true;
  }

  private readAll(): SavedTask[] {
    let entries: unknown[];
    try {
      entries = this.readEntries();
    } catch (error) {
      log.warn({ file: this.filePath, reason: errorMessage(error) }, "task file unreadable; treating as empty");
      return [];
    }

    const tasks: SavedTask[] = [];
    for (const entry of entries) {
      const parsed = storedTaskSchema.safeParse(entry);
      if (!parsed.success) {
        log.warn({ file: this.filePath }, "skipping saved task with an unexpected shape");
        continue;
      }
      try {
        tasks.push({ ...parsed.data, actions: parseActionPlan(parsed.data.actions) });
      } catch (error) {
        log.warn({ name: parsed.data.name, reason: errorMessage(error) }, "skipping saved task with an invalid plan");
      }
    }
    return tasks;
  }

  /** Raw stored entries. Throws when the file exists but is not a JSON list. */
  private readEntries(): unknown[] {
    if (!existsSync(this.filePath)) return [];
    const raw: unknown = JSON.parse(readFileSync(this.filePath, "utf-8"));
    if (!Array.isArray(raw)) {
      throw new Error("expected a JSON list of tasks");
    }
    return raw;
  }

  private readEntriesForWrite(): unknown[] {
    try {
      return this.readEntries();
    } catch (error) {
      throw new TaskStoreError(
        `Refusing to overwrite unreadable task file ${this.filePath}: ${errorMessage(error)}`,
        { cause: error },
      );
    }
  }

  private writeEntries(entries: unknown[]): void {
    mkdirSync(dirname(this.filePath), { recursive: true });
    writeFileSync(this.filePath, JSON.stringify(entries, null, 2), "utf-8");
  }
}

const namedEntrySchema = z.object({ name: z.string() });

function hasName(entry: unknown, name: string): boolean {
  const parsed = namedEntrySchema.safeParse(entry);
  return parsed.success && parsed.data.name.trim().toLowerCase() === name.trim().toLowerCase();
}
