import { describe, expect, it } from "vitest";

import { BoardSync } from "../src/board-sync.js";
import { allDisabled, allEnabled } from "../src/reconcile-engine.js";
import type { ReconcileOptions } from "../src/reconcile-engine.js";
import { SchemaError } from "../src/schema-index.js";
import { createCapturingLogger } from "./support/logger.js";
import {
  MemoryForge,
  codec,
  issueUrl,
  makeIssue,
  makeMergeRequest,
  mergeRequestUrl,
} from "./support/memory-forge.js";
import { MemoryKanban } from "./support/memory-kanban.js";

const TASK_BASE = "https://board.example.org/task/";
const SEARCH_LABELS = ["Contractor:Approved", "CTS:conformance"];

/**
 * Task 1 tracks !42. Issue #5 is approved and closed by !43 and by a
 * release candidate; issue #6 is filtered out.
 */
const seedBoard = () => {
  const kanban = new MemoryKanban();
  kanban.seedTask({
    id: 1,
    url: mergeRequestUrl(42),
    title: "MR !42: Change 42",
    column: "Awaiting Review",
    colorId: "blue",
  });

  const forge = new MemoryForge();
  forge.addMergeRequest(makeMergeRequest(42, { labels: ["CTS:conformance"] }));
  forge.addIssue(makeIssue(5, { labels: SEARCH_LABELS }));
  forge.addIssue(makeIssue(6, { labels: SEARCH_LABELS }));
  forge.addMergeRequest(makeMergeRequest(43));
  forge.addMergeRequest(makeMergeRequest(44, { title: "Release Candidate 2" }));
  forge.closedBy.set(5, [43, 44]);
  forge.closedBy.set(6, [43]);
  return { kanban, forge };
};

const createSync = (
  kanban: MemoryKanban,
  forge: MemoryForge,
  options: ReconcileOptions = allEnabled(),
  projectName = "Spec Work",
) => {
  const logger = createCapturingLogger();
  const sync = new BoardSync({
    kanban,
    forge,
    codec,
    projectName,
    taskBaseUrl: TASK_BASE,
    options,
    placement: { contractorUsernames: [] },
    search: {
      issueLabels: SEARCH_LABELS,
      mergeRequestLabels: ["CTS:conformance"],
      filteredRefs: ["#6"],
    },
    logger,
  });
  return { sync, logger };
};

describe("BoardSync", () => {
  it("reconciles, creates missing tasks and links issues to their merge requests", async () => {
    const { kanban, forge } = seedBoard();
    const { sync } = createSync(kanban, forge);

    const report = await sync.run();

    expect(report.reconcile.results).toHaveLength(1);
    expect(report.reconcile.changesMade).toBe(false);
    expect(kanban.callsTo("createTask").map((call) => call.args[0])).toEqual([
      {
        projectId: 7,
        title: "Issue #5: Issue 5 title",
        description: issueUrl(5),
        columnId: 1,
        swimlaneId: 2,
        categoryId: 1,
        colorId: "grey",
        tags: [],
        reference: "#5",
      },
      {
        projectId: 7,
        title: "MR !43: Change 43",
        description: mergeRequestUrl(43),
        columnId: 4,
        swimlaneId: 1,
        categoryId: 0,
        colorId: "blue",
        tags: [],
        reference: "!43",
      },
    ]);
    expect(kanban.callsTo("createExternalLink").map((call) => call.args)).toEqual([
      [501, { url: issueUrl(5), title: "Issue #5", dependency: "related" }],
      [502, { url: mergeRequestUrl(43), title: "MR !43", dependency: "related" }],
    ]);
    expect(
      report.creations.map((outcome) => [outcome.status, outcome.ref.number]),
    ).toEqual([
      ["created", 5],
      ["created", 43],
    ]);

    expect(kanban.callsTo("createInternalLink").map((call) => call.args)).toEqual([
      [501, 502, 3],
    ]);
    expect(report.links).toEqual([
      { fromTaskId: 501, toTaskId: 502, relation: "is blocked by", outcome: "created" },
    ]);

    expect(forge.callsTo("updateDescription").map((call) => call.args)).toEqual([
      [
        { kind: "merge_request", number: 42 },
        "Board Tracking Task: https://board.example.org/task/1",
      ],
    ]);
    expect(forge.callsTo("createNote").map((call) => call.args)).toEqual([
      [
        { kind: "issue", number: 5 },
        "This item is now tracked on the board: https://board.example.org/task/501",
      ],
      [
        { kind: "merge_request", number: 43 },
        "This item is now tracked on the board: https://board.example.org/task/502",
      ],
    ]);
    expect(forge.callsTo("listMergeRequestsClosingIssue").map((call) => call.args)).toEqual([
      [5],
    ]);
    expect(report.changesMade).toBe(true);
    expect(report.fetchFailures).toEqual([]);
    expect(report.creationFailures).toEqual([]);
    expect(report.linkFailures).toEqual([]);
  });

  it("changes nothing when every switch is off", async () => {
    const { kanban, forge } = seedBoard();
    const { sync } = createSync(kanban, forge, allDisabled());

    const report = await sync.run();

    expect(kanban.mutations()).toEqual([]);
    expect(forge.callsTo("updateDescription")).toEqual([]);
    expect(forge.callsTo("createNote")).toEqual([]);
    expect(
      report.creations.map((outcome) => [outcome.status, outcome.ref.number]),
    ).toEqual([
      ["skipped", 5],
      ["skipped", 43],
    ]);
    expect(report.forge.map((result) => [result.kind, result.taskId, result.outcome])).toEqual([
      ["description", 1, "skipped"],
    ]);
    expect(report.links).toEqual([]);
    expect(report.changesMade).toBe(false);
  });

  it("keeps going when a tracked item cannot be fetched", async () => {
    const { kanban, forge } = seedBoard();
    kanban.seedTask({ id: 2, url: issueUrl(99), title: "Issue #99: Gone" });
    const { sync, logger } = createSync(kanban, forge);

    const report = await sync.run();

    expect(report.fetchFailures).toEqual([
      { ref: "#99", taskId: 2, error: "Issue 99 not found" },
    ]);
    expect(report.reconcile.results.map((result) => result.taskId)).toEqual([1]);
    expect(report.creations).toHaveLength(2);
    expect(
      logger.entries.filter((entry) => entry.message === "Forge item could not be fetched"),
    ).toHaveLength(1);
  });

  it("does not link tasks that are already linked", async () => {
    const { kanban, forge } = seedBoard();
    kanban.seedTask({ id: 10, url: issueUrl(5), title: "Issue #5: Issue 5 title" });
    kanban.seedTask({ id: 11, url: mergeRequestUrl(43), title: "MR !43: Change 43" });
    kanban.internalLinks.set(10, [{ id: 900, taskId: 11, label: "is blocked by" }]);
    const { sync } = createSync(kanban, forge);

    const report = await sync.run();

    expect(kanban.callsTo("createTask")).toEqual([]);
    expect(kanban.callsTo("createInternalLink")).toEqual([]);
    expect(report.links).toEqual([
      { fromTaskId: 10, toTaskId: 11, relation: "is blocked by", outcome: "exists" },
    ]);
  });

  it("sees links made by an earlier run on the same instance", async () => {
    const { kanban, forge } = seedBoard();
    kanban.seedTask({ id: 10, url: issueUrl(5), title: "Issue #5: Issue 5 title" });
    kanban.seedTask({ id: 11, url: mergeRequestUrl(43), title: "MR !43: Change 43" });
    const { sync } = createSync(kanban, forge);

    const first = await sync.run();
    const second = await sync.run();

    expect(kanban.callsTo("createInternalLink").map((call) => call.args)).toEqual([
      [10, 11, 3],
    ]);
    expect(first.links.map((link) => link.outcome)).toEqual(["created"]);
    expect(second.links).toEqual([
      { fromTaskId: 10, toTaskId: 11, relation: "is blocked by", outcome: "exists" },
    ]);
    expect(second.linkFailures).toEqual([]);
  });

  it("reports a task whose links cannot be refreshed and skips its links", async () => {
    const { kanban, forge } = seedBoard();
    kanban.seedTask({ id: 10, url: issueUrl(5), title: "Issue #5: Issue 5 title" });
    kanban.seedTask({ id: 11, url: mergeRequestUrl(43), title: "MR !43: Change 43" });
    const { sync } = createSync(kanban, forge);
    await sync.prepare();
    kanban.failWhen = (method, args) => method === "getInternalLinks" && args[0] === 10;

    const report = await sync.run();

    expect(kanban.callsTo("createInternalLink")).toEqual([]);
    expect(report.links).toEqual([]);
    expect(report.linkFailures).toEqual([
      { ref: "task 10 links", taskId: 10, error: "getInternalLinks rejected" },
    ]);
  });

  it("records a creation failure without stopping the run", async () => {
    const { kanban, forge } = seedBoard();
    kanban.failWhen = (method, args) =>
      method === "createTask" &&
      typeof args[0] === "object" &&
      args[0] !== null &&
      "reference" in args[0] &&
      args[0].reference === "!43";
    const { sync } = createSync(kanban, forge);

    const report = await sync.run();

    expect(report.creationFailures).toEqual([
      { ref: "!43", taskId: null, error: "createTask rejected" },
    ]);
    expect(report.creations.map((outcome) => outcome.status)).toEqual(["created"]);
    expect(report.links).toEqual([]);
  });

  it("rejects an unknown board project", async () => {
    const { kanban, forge } = seedBoard();
    const { sync } = createSync(kanban, forge, allEnabled(), "Nope");

    const error = await sync.run().catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(SchemaError);
    expect(error).toMatchObject({ message: "Board project 'Nope' does not exist" });
  });
});
