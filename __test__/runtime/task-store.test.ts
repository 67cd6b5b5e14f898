import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { PlanValidationError, TaskStoreError } from "../../runtime/src/errors.js";
import { TaskStore } from "../../runtime/src/task-store.js";

describe("TaskStore", () => {
  let dir: string;
  let file: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "lucid-tasks-"));
    file = join(dir, "nested", "tasks.json");
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("saves validated tasks and reads them back", () => {
    const store = new TaskStore(file);
    const saved = store.save({
      name: "Search gout",
      url: "https://en.wikipedia.org",
      instruction: "search for gout",
      actions: [
        { type: "fill", selector: "input[name=search]", value: "gout" },
        { type: "press", selector: "input[name=search]" },
      ],
    });

    expect(saved.actions).toEqual([
      { type: "fill", selector: "input[name=search]", value: "gout" },
      { type: "press", selector: "input[name=search]", value: "Enter" },
    ]);
    expect(new TaskStore(file).get("search GOUT")).toEqual(saved);
    expect(store.list()).toHaveLength(1);
  });

  it("replaces a task saved under the same name", () => {
    const store = new TaskStore(file);
    store.save({ name: "daily", url: "https://a.test", actions: [{ type: "wait" }] });
    store.save({ name: "Daily", url: "https://b.test", actions: [{ type: "wait", duration: 100 }] });

    const tasks = store.list();
    expect(tasks).toHaveLength(1);
    expect(tasks[0]?.url).toBe("https://b.test");
  });

  it("refuses tasks with an invalid plan", () => {
    const store = new TaskStore(file);

    expect(() =>
      store.save({ name: "bad", url: "https://a.test", actions: [{ type: "drag", selector: "#x" }] }),
    ).toThrow(PlanValidationError);
    expect(store.list()).toEqual([]);
  });

  it("treats an unreadable file as empty", () => {
    const broken = join(dir, "broken.json");
    writeFileSync(broken, "{not json", "utf-8");

    expect(new TaskStore(broken).list()).toEqual([]);
  });

  it("refuses to overwrite a file it cannot read", () => {
    const broken = join(dir, "broken.json");
    writeFileSync(broken, '[{"name": "old", "url": "https://a.te', "utf-8");
    const store = new TaskStore(broken);

    expect(() => store.save({ name: "new", url: "https://b.test", actions: [] })).toThrow(TaskStoreError);
    expect(() => store.remove("old")).toThrow(TaskStoreError);
    expect(readFileSync(broken, "utf-8")).toBe('[{"name": "old", "url": "https://a.te');
  });

  it("keeps stored tasks it cannot parse when saving another", () => {
    const legacy = { name: "old", url: "https://a.test", actions: [{ type: "scroll", selector: "body" }] };
    const existing = join(dir, "tasks.json");
    writeFileSync(existing, JSON.stringify([legacy]), "utf-8");
    const store = new TaskStore(existing);

    expect(store.list()).toEqual([]);
    store.save({ name: "new", url: "https://b.test", actions: [] });

    const stored: unknown = JSON.parse(readFileSync(existing, "utf-8"));
    expect(stored).toEqual([legacy, expect.objectContaining({ name: "new", actions: [] })]);
    expect(store.list().map((task) => task.name)).toEqual(["new"]);
  });

  it("removes tasks by name", () => {
    const store = new TaskStore(file);
    store.save({ name: "one", url: "https://a.test", actions: [] });

    expect(store.remove("ONE")).toBe(true);
    expect(store.remove("one")).toBe(false);
    expect(JSON.parse(readFileSync(file, "utf-8"))).toEqual([]);
  });
});
