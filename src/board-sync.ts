import type {
  ForgeAdapter,
  ForgeIssue,
  ForgeItem,
  ForgeMergeRequest,
  KanbanAdapter,
} from "./adapters.js";
import { fetchForgeItem, forgeItemRef } from "./adapters.js";
import { errorMessage, settleInBatches } from "./batch.js";
import type { PlacementOptions } from "./desired-state.js";
import { ForgeFeedback } from "./forge-feedback.js";
import type { ForgeFeedbackResult } from "./forge-feedback.js";
import { formatShortRef } from "./forge-refs.js";
import type { ExternalRef, ForgeRefCodec } from "./forge-refs.js";
import { LinkManager } from "./link-manager.js";
import type { LinkResult } from "./link-manager.js";
import type { Logger } from "./logger.js";
import { ReconcileEngine } from "./reconcile-engine.js";
import type {
  ReconcileOptions,
  ReconcilePair,
  ReconcileSummary,
  TaskCreateOutcome,
} from "./reconcile-engine.js";
import { SchemaError, SchemaIndex } from "./schema-index.js";
import type { Task } from "./task.js";
import { TaskCollection } from "./task-collection.js";
import type { TaskLoadFailure } from "./task-collection.js";

export interface SearchSettings {
  issueLabels: string[];
  mergeRequestLabels: string[];
  /** Short refs (`#12`, `!34`) never given a task. */
  filteredRefs: string[];
}

export interface BoardSyncOptions {
  kanban: KanbanAdapter;
  forge: ForgeAdapter;
  codec: ForgeRefCodec;
  projectName: string;
  taskBaseUrl: string;
  options: ReconcileOptions;
  placement: PlacementOptions;
  search: SearchSettings;
  onlyOpen?: boolean;
  batchSize?: number;
  commentUserId?: number | null;
  /** Forge accounts never made task owners. */
  botUsernames?: readonly string[];
  logger?: Logger;
}

export interface RefFailure {
  ref: string;
  taskId: number | null;
  error: string;
}

export interface BoardSyncReport {
  loadFailures: TaskLoadFailure[];
  fetchFailures: RefFailure[];
  reconcile: ReconcileSummary;
  forge: ForgeFeedbackResult[];
  creations: TaskCreateOutcome[];
  creationFailures: RefFailure[];
  links: LinkResult[];
  linkFailures: RefFailure[];
  changesMade: boolean;
}

interface PreparedBoard {
  schema: SchemaIndex;
  collection: TaskCollection;
  loadFailures: TaskLoadFailure[];
}

const isReleaseCandidate = (item: ForgeItem): boolean =>
  item.title.toLowerCase().includes("candidate");

/**
 * One full pass: load the board, reconcile tracked tasks against the forge,
 * then find untracked forge items, create their tasks and link them.
 */
export class BoardSync {
  private readonly kanban: KanbanAdapter;
  private readonly forge: ForgeAdapter;
  private readonly codec: ForgeRefCodec;
  private readonly settings: BoardSyncOptions;
  private readonly batchSize: number;
  private readonly logger?: Logger;
  private prepared: PreparedBoard | null = null;

  constructor(options: BoardSyncOptions) {
    this.kanban = options.kanban;
    this.forge = options.forge;
    this.codec = options.codec;
    this.settings = options;
    this.batchSize = options.batchSize ?? 25;
    this.logger = options.logger;
  }

  async prepare(): Promise<PreparedBoard> {
    if (this.prepared) {
      return this.prepared;
    }
    const project = await this.kanban.getProjectByName(this.settings.projectName);
    if (project === null) {
      throw new SchemaError(
        "project",
        `Board project '${this.settings.projectName}' does not exist`,
      );
    }
    const schema = new SchemaIndex({
      kanban: this.kanban,
      projectId: project.id,
      logger: this.logger,
    });
    await schema.fetchAllDimensions();
    schema.requireAll();

    const collection = new TaskCollection({
      kanban: this.kanban,
      schema,
      codec: this.codec,
      logger: this.logger,
    });
    const loadFailures = await collection.loadProject(this.settings.onlyOpen ?? true);
    this.prepared = { schema, collection, loadFailures };
    return this.prepared;
  }

  async run(): Promise<BoardSyncReport> {
    const { schema, collection, loadFailures } = await this.prepare();
    const options = this.settings.options;
    const engine = new ReconcileEngine({
      kanban: this.kanban,
      schema,
      codec: this.codec,
      options,
      placement: this.settings.placement,
      batchSize: this.batchSize,
      commentUserId: this.settings.commentUserId,
      botUsernames: this.settings.botUsernames,
      logger: this.logger,
    });
    const feedback = new ForgeFeedback({
      forge: this.forge,
      taskBaseUrl: this.settings.taskBaseUrl,
      options,
      batchSize: this.batchSize,
      logger: this.logger,
    });

    // Every forge fetch completes before any update is computed.
    const { pairs, fetchFailures } = await this.fetchTrackedItems(collection.all());
    const reconcile = await engine.reconcileAll(pairs);
    const forgeResults = [
      ...(await feedback.syncDescriptions(pairs)),
      ...(await feedback.syncLabels(pairs)),
    ];

    const search = await this.searchAndCreate(engine, collection);
    forgeResults.push(...(await feedback.announceTasks(search.created)));

    const linkManager = new LinkManager({
      kanban: this.kanban,
      schema,
      logger: this.logger,
    });
    const { links, linkFailures } = await this.linkIssuesToMergeRequests(
      linkManager,
      collection,
      search.closingMergeRequests,
    );

    const changesMade =
      reconcile.changesMade ||
      search.creations.some((outcome) => outcome.status === "created") ||
      links.some((link) => link.outcome === "created") ||
      forgeResults.some((result) => result.outcome === "updated");

    this.logger?.info("Board sync finished", {
      tasks: collection.size,
      reconcileFailures: reconcile.failures.length,
      created: search.created.length,
      linksCreated: links.filter((link) => link.outcome === "created").length,
      changesMade,
    });

    return {
      loadFailures,
      fetchFailures,
      reconcile,
      forge: forgeResults,
      creations: search.creations,
      creationFailures: search.failures,
      links,
      linkFailures,
      changesMade,
    };
  }

  private async fetchTrackedItems(
    tasks: readonly Task[],
  ): Promise<{ pairs: ReconcilePair[]; fetchFailures: RefFailure[] }> {
    const settled = await settleInBatches(tasks, this.batchSize, (task) =>
      fetchForgeItem(this.forge, task.ref),
    );
    const pairs: ReconcilePair[] = [];
    const fetchFailures: RefFailure[] = [];
    settled.forEach((result, index) => {
      const task = tasks[index];
      if (result.status === "fulfilled") {
        pairs.push({ task, item: result.value });
        return;
      }
      const failure = {
        ref: formatShortRef(task.ref),
        taskId: task.taskId,
        error: errorMessage(result.reason),
      };
      this.logger?.error("Forge item could not be fetched", failure);
      fetchFailures.push(failure);
    });
    return { pairs, fetchFailures };
  }

  private isFiltered(ref: ExternalRef): boolean {
    return this.settings.search.filteredRefs.includes(formatShortRef(ref));
  }

  private async searchAndCreate(
    engine: ReconcileEngine,
    collection: TaskCollection,
  ): Promise<{
    creations: TaskCreateOutcome[];
    created: ReconcilePair[];
    failures: RefFailure[];
    closingMergeRequests: Map<number, ForgeMergeRequest[]>;
  }> {
    const { search } = this.settings;
    const [issues, mergeRequests] = await Promise.all([
      this.forge.listIssues({ labels: search.issueLabels, state: "opened" }),
      this.forge.listMergeRequests({ labels: search.mergeRequestLabels, state: "opened" }),
    ]);
    const wantedIssues = issues.filter((issue) => !this.isFiltered(forgeItemRef(issue)));

    const closingMergeRequests = new Map<number, ForgeMergeRequest[]>();
    const failures: RefFailure[] = [];
    const closing = await settleInBatches(wantedIssues, this.batchSize, (issue) =>
      this.forge.listMergeRequestsClosingIssue(issue.number),
    );
    closing.forEach((result, index) => {
      const issue = wantedIssues[index];
      if (result.status === "fulfilled") {
        closingMergeRequests.set(
          issue.number,
          result.value.filter(
            (mr) => !this.isFiltered(forgeItemRef(mr)) && !isReleaseCandidate(mr),
          ),
        );
        return;
      }
      failures.push({
        ref: formatShortRef(forgeItemRef(issue)),
        taskId: null,
        error: errorMessage(result.reason),
      });
    });

    const candidates = new Map<string, ForgeItem>();
    const consider = (item: ForgeIssue | ForgeMergeRequest): void => {
      const ref = forgeItemRef(item);
      if (this.isFiltered(ref) || (item.kind === "merge_request" && isReleaseCandidate(item))) {
        this.logger?.debug("Forge item filtered out", { ref: formatShortRef(ref) });
        return;
      }
      if (!collection.getByRef(ref)) {
        candidates.set(formatShortRef(ref), item);
      }
    };
    wantedIssues.forEach(consider);
    mergeRequests.forEach(consider);
    closingMergeRequests.forEach((mrs) => mrs.forEach(consider));

    const items = [...candidates.values()];
    const settled = await settleInBatches(items, this.batchSize, (item) =>
      engine.createTask(item, collection),
    );
    const creations: TaskCreateOutcome[] = [];
    const created: ReconcilePair[] = [];
    settled.forEach((result, index) => {
      const item = items[index];
      if (result.status === "rejected") {
        const failure = {
          ref: formatShortRef(forgeItemRef(item)),
          taskId: null,
          error: errorMessage(result.reason),
        };
        this.logger?.error("Task creation failed", failure);
        failures.push(failure);
        return;
      }
      creations.push(result.value);
      if (result.value.status === "created") {
        created.push({ task: result.value.task, item });
      }
    });

    return { creations, created, failures, closingMergeRequests };
  }

  private async linkIssuesToMergeRequests(
    linkManager: LinkManager,
    collection: TaskCollection,
    closingMergeRequests: Map<number, ForgeMergeRequest[]>,
  ): Promise<{ links: LinkResult[]; linkFailures: RefFailure[] }> {
    const wanted: { issueTask: Task; mrTask: Task }[] = [];
    closingMergeRequests.forEach((mrs, issueNumber) => {
      const issueTask = collection.getByIssue(issueNumber);
      if (!issueTask) {
        return;
      }
      mrs.forEach((mr) => {
        const mrTask = collection.getByMergeRequest(mr.number);
        if (mrTask) {
          wanted.push({ issueTask, mrTask });
        }
      });
    });

    // Links made earlier (by a previous run or by hand) are only seen after a refresh.
    const issueTaskIds = [...new Set(wanted.map((entry) => entry.issueTask.taskId))];
    const refreshed = await settleInBatches(issueTaskIds, this.batchSize, (taskId) =>
      collection.refreshInternalLinks(taskId),
    );
    const current = new Map<number, Task>();
    const linkFailures: RefFailure[] = [];
    refreshed.forEach((result, index) => {
      const taskId = issueTaskIds[index];
      if (result.status === "fulfilled") {
        current.set(taskId, result.value);
        return;
      }
      const failure = { ref: `task ${taskId} links`, taskId, error: errorMessage(result.reason) };
      this.logger?.error("Task links could not be refreshed", failure);
      linkFailures.push(failure);
    });
    const ready = wanted.flatMap((entry) => {
      const issueTask = current.get(entry.issueTask.taskId);
      return issueTask ? [{ issueTask, mrTask: entry.mrTask }] : [];
    });

    const dryRun = !this.settings.options.addInternalLinks;
    const settled = await settleInBatches(ready, this.batchSize, (entry) =>
      linkManager.addLink(entry.issueTask, entry.mrTask, "is blocked by", dryRun),
    );
    const links: LinkResult[] = [];
    settled.forEach((result, index) => {
      if (result.status === "fulfilled") {
        links.push(result.value);
        return;
      }
      const { issueTask, mrTask } = ready[index];
      const failure = {
        ref: `${formatShortRef(issueTask.ref)} -> ${formatShortRef(mrTask.ref)}`,
        taskId: issueTask.taskId,
        error: errorMessage(result.reason),
      };
      this.logger?.error("Task link failed", failure);
      linkFailures.push(failure);
    });
    return { links, linkFailures };
  }
}
