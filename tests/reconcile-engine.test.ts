import { describe, expect, it } from "vitest";

import type { ForgeItem } from "../src/adapters.js";
import {
  ReconcileEngine,
  allDisabled,
  allEnabled,
  optionsFromSwitches,
} from "../src/reconcile-engine.js";
import type { ReconcileOptions, ReconcilePair } from "../src/reconcile-engine.js";
import { SchemaIndex } from "../src/schema-index.js";
import { TaskCollection } from "../src/task-collection.js";
import { createCapturingLogger } from "./support/logger.js";
import {
  codec,
  issueUrl,
  makeIssue,
  makeMergeRequest,
  mergeRequestUrl,
} from "./support/memory-forge.js";
import { MemoryKanban, PROJECT_ID } from "./support/memory-kanban.js";

const setup = async (
  kanban: MemoryKanban,
  options: ReconcileOptions = allEnabled(),
  commentUserId: number | null = null,
  botUsernames: readonly string[] = [],
) => {
  const schema = new SchemaIndex({ kanban, projectId: PROJECT_ID });
  await schema.fetchAllDimensions();
  const collection = new TaskCollection({ kanban, schema, codec });
  await collection.loadProject();
  const logger = createCapturingLogger();
  const engine = new ReconcileEngine({
    kanban,
    schema,
    codec,
    options,
    placement: { contractorUsernames: [] },
    commentUserId,
    botUsernames,
    logger,
  });
  kanban.calls.length = 0;
  return { schema, collection, engine, logger };
};

const pairFor = (collection: TaskCollection, item: ForgeItem): ReconcilePair => {
  const task = collection.getByRef({ kind: item.kind, number: item.number });
  if (!task) {
    throw new Error(`No task for ${item.kind} ${item.number}`);
  }
  return { task, item };
};

describe("ReconcileEngine.reconcileTask", () => {
  it("adds a label-implied flag with a single tag update", async () => {
    const kanban = new MemoryKanban();
    kanban.seedTask({
      id: 1,
      url: mergeRequestUrl(42),
      title: "MR !42: Change 42",
      column: "Awaiting Review",
      swimlane: "Spec Review",
      colorId: "blue",
      tags: ["Initial Spec Review Complete"],
    });
    const { collection, engine } = await setup(kanban);
    const mr = makeMergeRequest(42, { labels: ["status:FrozenNeedsImplOrCTS"] });

    const result = await engine.reconcileTask(pairFor(collection, mr).task, mr);

    expect(kanban.mutations()).toEqual([
      {
        method: "updateTask",
        args: [1, { tags: ["Initial Spec Review Complete", "API Frozen"] }],
      },
    ]);
    expect(result.outcomes.filter((outcome) => outcome.status === "updated")).toEqual([
      {
        field: "tags",
        status: "updated",
        from: "Initial Spec Review Complete",
        to: "Initial Spec Review Complete, API Frozen",
      },
    ]);
  });

  it("makes no calls when the task already matches", async () => {
    const kanban = new MemoryKanban();
    kanban.seedTask({ id: 1, url: issueUrl(5), title: "Issue #5: Issue 5 title" });
    const { collection, engine, logger } = await setup(kanban);
    const issue = makeIssue(5);

    const result = await engine.reconcileTask(pairFor(collection, issue).task, issue);

    expect(kanban.mutations()).toEqual([]);
    expect(result.outcomes.map((outcome) => outcome.status)).toEqual([
      "unchanged",
      "unchanged",
      "unchanged",
      "unchanged",
      "unchanged",
      "unchanged",
    ]);
    expect(logger.entries.filter((entry) => entry.message === "No update needed")).toHaveLength(6);
  });

  it("compares titles ignoring surrounding whitespace", async () => {
    const kanban = new MemoryKanban();
    kanban.seedTask({ id: 1, url: issueUrl(5), title: "  Issue #5: Issue 5 title " });
    const { collection, engine } = await setup(kanban);
    const issue = makeIssue(5);

    await engine.reconcileTask(pairFor(collection, issue).task, issue);

    expect(kanban.mutations()).toEqual([]);
  });

  it("logs and skips every change when nothing is authorized", async () => {
    const kanban = new MemoryKanban();
    kanban.seedTask({ id: 1, url: issueUrl(5), title: "stale", colorId: "red" });
    const { collection, engine, logger } = await setup(kanban, allDisabled());
    const issue = makeIssue(5);

    const result = await engine.reconcileTask(pairFor(collection, issue).task, issue);

    expect(kanban.mutations()).toEqual([]);
    expect(result.outcomes).toEqual([
      { field: "title", status: "skipped", from: "stale", to: "Issue #5: Issue 5 title" },
      { field: "category", status: "unchanged" },
      { field: "tags", status: "unchanged" },
      { field: "color", status: "skipped", from: "red", to: "grey" },
      { field: "owner", status: "unchanged" },
      { field: "column", status: "unchanged" },
    ]);
    expect(
      logger.entries
        .filter((entry) => entry.message === "Skipping update by request")
        .map((entry) => entry.data),
    ).toEqual([
      { taskId: 1, ref: "#5", field: "title", from: "stale", to: "Issue #5: Issue 5 title" },
      { taskId: 1, ref: "#5", field: "color", from: "red", to: "grey" },
    ]);
  });

  it("applies only the authorized fields", async () => {
    const kanban = new MemoryKanban();
    kanban.seedTask({ id: 1, url: issueUrl(5), title: "stale", colorId: "red" });
    const { collection, engine } = await setup(kanban, { ...allEnabled(), updateTitle: false });
    const issue = makeIssue(5);

    await engine.reconcileTask(pairFor(collection, issue).task, issue);

    expect(kanban.mutations()).toEqual([
      { method: "updateTask", args: [1, { colorId: "grey" }] },
    ]);
  });

  it("keeps a failing field from affecting the others", async () => {
    const kanban = new MemoryKanban();
    kanban.seedTask({ id: 1, url: issueUrl(5), title: "stale", colorId: "red" });
    const { collection, engine } = await setup(kanban);
    kanban.failWhen = (method, args) =>
      method === "updateTask" && JSON.stringify(args[1]).includes("title");
    const issue = makeIssue(5);

    const result = await engine.reconcileTask(pairFor(collection, issue).task, issue);

    expect(kanban.tasks.get(1)?.colorId).toBe("grey");
    expect(result.outcomes).toContainEqual({
      field: "title",
      status: "failed",
      from: "stale",
      to: "Issue #5: Issue 5 title",
      error: "updateTask rejected",
    });
    expect(result.outcomes).toContainEqual({
      field: "color",
      status: "updated",
      from: "red",
      to: "grey",
    });
  });

  it("never clears a category set by hand", async () => {
    const kanban = new MemoryKanban();
    kanban.seedTask({
      id: 1,
      url: issueUrl(5),
      title: "Issue #5: Issue 5 title",
      category: "Not Contractor Work",
    });
    kanban.seedTask({
      id: 2,
      url: issueUrl(6),
      title: "Issue #6: Issue 6 title",
      category: "Contractor",
    });
    const { collection, engine } = await setup(kanban);

    await engine.reconcileTask(pairFor(collection, makeIssue(5)).task, makeIssue(5));
    await engine.reconcileTask(pairFor(collection, makeIssue(6)).task, makeIssue(6));

    expect(kanban.mutations()).toEqual([
      { method: "updateTask", args: [2, { categoryId: 0 }] },
    ]);
  });

  it("moves a closed item to Done in its own swimlane and comments", async () => {
    const kanban = new MemoryKanban();
    kanban.seedTask({
      id: 3,
      url: issueUrl(5),
      title: "Issue #5: (CLOSED) Issue 5 title",
      column: "In Review",
      swimlane: "Contractor Work",
    });
    const { collection, engine } = await setup(kanban, allEnabled(), 11);
    const issue = makeIssue(5, { state: "closed" });

    const result = await engine.reconcileTask(pairFor(collection, issue).task, issue);

    expect(kanban.mutations()).toEqual([
      {
        method: "moveTaskPosition",
        args: [{ projectId: PROJECT_ID, taskId: 3, columnId: 7, swimlaneId: 2, position: 1 }],
      },
      { method: "createComment", args: [3, 11, "Moved to Done: #5 is closed."] },
    ]);
    expect(result.outcomes.slice(-2)).toEqual([
      { field: "column", status: "updated", from: "In Review", to: "Done" },
      { field: "comment", status: "updated", from: "", to: "Moved to Done: #5 is closed." },
    ]);
  });

  it("reports a failed comment apart from the move it follows", async () => {
    const kanban = new MemoryKanban();
    kanban.seedTask({
      id: 3,
      url: issueUrl(5),
      title: "Issue #5: (CLOSED) Issue 5 title",
      column: "In Review",
    });
    const { collection, engine } = await setup(kanban, allEnabled(), 11);
    kanban.failWhen = (method) => method === "createComment";
    const issue = makeIssue(5, { state: "closed" });

    const summary = await engine.reconcileAll([pairFor(collection, issue)]);

    expect(kanban.tasks.get(3)?.columnId).toBe(7);
    expect(summary.results[0].outcomes.slice(-2)).toEqual([
      { field: "column", status: "updated", from: "In Review", to: "Done" },
      {
        field: "comment",
        status: "failed",
        from: "",
        to: "Moved to Done: #5 is closed.",
        error: "createComment rejected",
      },
    ]);
    expect(summary.failures).toEqual([
      {
        taskId: 3,
        field: "comment",
        attemptedValue: "Moved to Done: #5 is closed.",
        error: "createComment rejected",
      },
    ]);
  });

  it("does not comment when the move fails", async () => {
    const kanban = new MemoryKanban();
    kanban.seedTask({
      id: 3,
      url: issueUrl(5),
      title: "Issue #5: (CLOSED) Issue 5 title",
      column: "In Review",
    });
    const { collection, engine } = await setup(kanban, allEnabled(), 11);
    kanban.failWhen = (method) => method === "moveTaskPosition";
    const issue = makeIssue(5, { state: "closed" });

    const result = await engine.reconcileTask(pairFor(collection, issue).task, issue);

    expect(kanban.callsTo("createComment")).toEqual([]);
    expect(result.outcomes.map((outcome) => outcome.field)).toEqual([
      "title",
      "category",
      "tags",
      "color",
      "owner",
      "column",
    ]);
  });

  it("gives the task to the forge assignee", async () => {
    const kanban = new MemoryKanban();
    kanban.seedTask({ id: 1, url: issueUrl(5), title: "Issue #5: Issue 5 title" });
    const { collection, engine } = await setup(kanban);
    const issue = makeIssue(5, {
      assignees: [{ name: "Alice Example", username: "alice", active: true }],
    });

    const result = await engine.reconcileTask(pairFor(collection, issue).task, issue);

    expect(kanban.mutations()).toEqual([{ method: "updateTask", args: [1, { ownerId: 3 }] }]);
    expect(result.outcomes).toContainEqual({
      field: "owner",
      status: "updated",
      from: "(none)",
      to: "alice",
    });
  });

  it("leaves owners alone for bots, finished items and current owners", async () => {
    const kanban = new MemoryKanban();
    kanban.seedTask({ id: 1, url: mergeRequestUrl(5), title: "MR !5: Change 5", colorId: "blue" });
    kanban.seedTask({
      id: 2,
      url: issueUrl(6),
      title: "Issue #6: (CLOSED) Issue 6 title",
      column: "Done",
    });
    kanban.seedTask({ id: 3, url: issueUrl(7), title: "Issue #7: Issue 7 title", ownerId: 4 });
    const { collection, engine } = await setup(kanban, allEnabled(), null, ["merge-bot"]);
    const bob = { name: "Bob Example", username: "bob", active: true };
    const items: ForgeItem[] = [
      makeMergeRequest(5, { author: { name: "Bot", username: "merge-bot", active: true } }),
      makeIssue(6, { state: "closed", assignees: [bob] }),
      makeIssue(7, { assignees: [bob] }),
    ];

    await engine.reconcileAll(items.map((item) => pairFor(collection, item)));

    expect(kanban.mutations()).toEqual([]);
  });

  it("warns when the assignee has no board account", async () => {
    const kanban = new MemoryKanban();
    kanban.seedTask({ id: 1, url: issueUrl(5), title: "Issue #5: Issue 5 title", ownerId: 3 });
    const { collection, engine, logger } = await setup(kanban);
    const issue = makeIssue(5, {
      assignees: [{ name: "Carol Example", username: "carol", active: true }],
    });

    const result = await engine.reconcileTask(pairFor(collection, issue).task, issue);

    expect(kanban.mutations()).toEqual([]);
    expect(result.outcomes).toContainEqual({ field: "owner", status: "unchanged" });
    expect(
      logger.entries
        .filter((entry) => entry.message === "Board user not found for forge assignee")
        .map((entry) => entry.data),
    ).toEqual([{ taskId: 1, ref: "#5", username: "carol", name: "Carol Example" }]);
  });

  it("leaves a closed item on hold where it is", async () => {
    const kanban = new MemoryKanban();
    kanban.seedTask({
      id: 3,
      url: issueUrl(5),
      title: "Issue #5: (CLOSED) Issue 5 title",
      column: "On Hold",
    });
    const { collection, engine } = await setup(kanban);
    const issue = makeIssue(5, { state: "closed" });

    await engine.reconcileTask(pairFor(collection, issue).task, issue);

    expect(kanban.mutations()).toEqual([]);
  });
});

describe("ReconcileEngine.reconcileAll", () => {
  it("isolates one failing task among fifty", async () => {
    const kanban = new MemoryKanban();
    const items: ForgeItem[] = [];
    for (let id = 1; id <= 50; id += 1) {
      kanban.seedTask({ id, url: mergeRequestUrl(id), title: "old title", colorId: "blue" });
      items.push(makeMergeRequest(id));
    }
    const { collection, engine } = await setup(kanban);
    kanban.failWhen = (method, args) => method === "updateTask" && args[0] === 17;

    const summary = await engine.reconcileAll(items.map((item) => pairFor(collection, item)));

    expect(kanban.callsTo("updateTask")).toHaveLength(50);
    const updated = summary.results.filter((result) =>
      result.outcomes.some((outcome) => outcome.status === "updated"),
    );
    expect(updated).toHaveLength(49);
    expect(summary.failures).toEqual([
      { taskId: 17, field: "title", attemptedValue: "MR !17: Change 17", error: "updateTask rejected" },
    ]);
    expect(summary.changesMade).toBe(true);
    expect(kanban.tasks.get(18)?.title).toBe("MR !18: Change 18");
  });

  it("records a task whose labels contradict each other", async () => {
    const kanban = new MemoryKanban();
    kanban.seedTask({ id: 1, url: mergeRequestUrl(3) });
    const { collection, engine } = await setup(kanban);
    const mr = makeMergeRequest(3, { labels: ["Contractor:Approved", "Outside IPR Framework"] });

    const summary = await engine.reconcileAll([pairFor(collection, mr)]);

    expect(summary.results).toEqual([]);
    expect(summary.failures).toEqual([
      {
        taskId: 1,
        field: null,
        attemptedValue: null,
        error: "!3 is labeled both 'Contractor:Approved' and 'Outside IPR Framework'",
      },
    ]);
    expect(summary.changesMade).toBe(false);
    expect(kanban.mutations()).toEqual([]);
  });
});

describe("ReconcileEngine.createTask", () => {
  it("creates the task with its state and its forge link", async () => {
    const kanban = new MemoryKanban();
    const { collection, engine } = await setup(kanban);
    const mr = makeMergeRequest(77, { labels: ["Contractor:Approved"] });

    const outcome = await engine.createTask(mr, collection);

    expect(outcome.status).toBe("created");
    expect(kanban.mutations()).toEqual([
      {
        method: "createTask",
        args: [
          {
            projectId: PROJECT_ID,
            title: "MR !77: Change 77",
            description: mergeRequestUrl(77),
            columnId: 4,
            swimlaneId: 2,
            categoryId: 1,
            colorId: "blue",
            tags: [],
            reference: "!77",
          },
        ],
      },
      {
        method: "createExternalLink",
        args: [501, { url: mergeRequestUrl(77), title: "MR !77", dependency: "related" }],
      },
    ]);
    expect(collection.getByMergeRequest(77)?.taskId).toBe(501);
  });

  it("returns the existing task instead of creating a second one", async () => {
    const kanban = new MemoryKanban();
    kanban.seedTask({ id: 1, url: issueUrl(4) });
    const { collection, engine } = await setup(kanban);

    const outcome = await engine.createTask(makeIssue(4), collection);

    expect(outcome.status).toBe("exists");
    expect(kanban.mutations()).toEqual([]);
  });

  it("only logs the creation when not authorized", async () => {
    const kanban = new MemoryKanban();
    const { collection, engine, logger } = await setup(kanban, optionsFromSwitches(
      {
        title: true,
        category: true,
        tags: true,
        color: true,
        owner: true,
        column: true,
        createTask: true,
        internalLinks: true,
        forgeDescription: true,
        forgeLabels: true,
        forgeNotes: true,
      },
      true,
    ));

    const outcome = await engine.createTask(makeIssue(4), collection);

    expect(outcome.status).toBe("skipped");
    expect(kanban.mutations()).toEqual([]);
    expect(logger.entries.map((entry) => entry.message)).toEqual([
      "Skipping task creation by request",
    ]);
  });
});
