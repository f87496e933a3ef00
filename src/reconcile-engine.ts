import type { ForgeItem, KanbanAdapter } from "./adapters.js";
import { forgeItemRef } from "./adapters.js";
import { errorMessage, settleInBatches } from "./batch.js";
import { STICKY_CATEGORIES } from "./board-schema.js";
import type { TaskCategory } from "./board-schema.js";
import type { UpdateSwitches } from "./config.js";
import {
  computeCreationData,
  computeDesiredState,
  desiredColumn,
  desiredOwner,
} from "./desired-state.js";
import type {
  DesiredTaskState,
  PlacementOptions,
  TaskCreationData,
} from "./desired-state.js";
import { formatShortRef } from "./forge-refs.js";
import type { ExternalRef, ForgeRefCodec } from "./forge-refs.js";
import type { Logger } from "./logger.js";
import type { SchemaIndex } from "./schema-index.js";
import type { Task } from "./task.js";
import type { TaskCollection } from "./task-collection.js";
import { flagsEqual, flagsToTags, nonFlagTags } from "./task-flags.js";

/** What the engine may change. Dry-run is every switch off. */
export interface ReconcileOptions {
  updateTitle: boolean;
  updateCategory: boolean;
  updateTags: boolean;
  updateColor: boolean;
  updateOwner: boolean;
  updateColumn: boolean;
  createTask: boolean;
  addInternalLinks: boolean;
  modifyForgeDescription: boolean;
  addForgeLabels: boolean;
  postForgeNotes: boolean;
}

export const allEnabled = (): ReconcileOptions => ({
  updateTitle: true,
  updateCategory: true,
  updateTags: true,
  updateColor: true,
  updateOwner: true,
  updateColumn: true,
  createTask: true,
  addInternalLinks: true,
  modifyForgeDescription: true,
  addForgeLabels: true,
  postForgeNotes: true,
});

export const allDisabled = (): ReconcileOptions => ({
  updateTitle: false,
  updateCategory: false,
  updateTags: false,
  updateColor: false,
  updateOwner: false,
  updateColumn: false,
  createTask: false,
  addInternalLinks: false,
  modifyForgeDescription: false,
  addForgeLabels: false,
  postForgeNotes: false,
});

export const optionsFromSwitches = (
  switches: UpdateSwitches,
  dryRun: boolean,
): ReconcileOptions => {
  if (dryRun) {
    return allDisabled();
  }
  return {
    updateTitle: switches.title,
    updateCategory: switches.category,
    updateTags: switches.tags,
    updateColor: switches.color,
    updateOwner: switches.owner,
    updateColumn: switches.column,
    createTask: switches.createTask,
    addInternalLinks: switches.internalLinks,
    modifyForgeDescription: switches.forgeDescription,
    addForgeLabels: switches.forgeLabels,
    postForgeNotes: switches.forgeNotes,
  };
};

export type ReconcileField = "title" | "category" | "tags" | "color" | "owner" | "column";

/** Fields in outcomes; a comment follows a move to Done. */
export type OutcomeField = ReconcileField | "comment";

const RECONCILE_FIELDS: readonly ReconcileField[] = [
  "title",
  "category",
  "tags",
  "color",
  "owner",
  "column",
];

const FIELD_SWITCHES: Record<ReconcileField, keyof ReconcileOptions> = {
  title: "updateTitle",
  category: "updateCategory",
  tags: "updateTags",
  color: "updateColor",
  owner: "updateOwner",
  column: "updateColumn",
};

export type FieldOutcome =
  | { field: OutcomeField; status: "unchanged" }
  | {
      field: OutcomeField;
      status: "skipped" | "updated";
      from: string;
      to: string;
    }
  | {
      field: OutcomeField;
      status: "failed";
      from: string;
      to: string;
      error: string;
    };

export interface TaskReconcileResult {
  taskId: number;
  ref: ExternalRef;
  outcomes: FieldOutcome[];
}

export interface ReconcileFailure {
  taskId: number;
  /** Null when the desired state itself could not be computed. */
  field: OutcomeField | null;
  attemptedValue: string | null;
  error: string;
}

export interface ReconcilePair {
  task: Task;
  item: ForgeItem;
}

export interface ReconcileSummary {
  results: TaskReconcileResult[];
  failures: ReconcileFailure[];
  changesMade: boolean;
}

export type TaskCreateOutcome =
  | { status: "exists"; ref: ExternalRef; task: Task }
  | { status: "skipped"; ref: ExternalRef; data: TaskCreationData }
  | { status: "created"; ref: ExternalRef; task: Task; data: TaskCreationData };

interface FieldChange {
  field: ReconcileField;
  from: string;
  to: string;
  apply: () => Promise<void>;
  /** Runs only once `apply` has succeeded; reported as its own outcome. */
  followUp?: { field: "comment"; to: string; apply: () => Promise<void> };
}

export interface ReconcileEngineOptions {
  kanban: KanbanAdapter;
  schema: SchemaIndex;
  codec: ForgeRefCodec;
  options: ReconcileOptions;
  placement: PlacementOptions;
  batchSize?: number;
  /** Posts a comment as this user when a task is moved to Done. */
  commentUserId?: number | null;
  /** Forge accounts that never become task owners. */
  botUsernames?: readonly string[];
  logger?: Logger;
}

const DEFAULT_BATCH_SIZE = 25;

const describeCategory = (category: TaskCategory | null): string =>
  category ?? "(none)";

const describeTags = (tags: readonly string[]): string => tags.join(", ");

export class ReconcileEngine {
  readonly options: ReconcileOptions;
  private readonly kanban: KanbanAdapter;
  private readonly schema: SchemaIndex;
  private readonly codec: ForgeRefCodec;
  private readonly placement: PlacementOptions;
  private readonly batchSize: number;
  private readonly commentUserId: number | null;
  private readonly botUsernames: readonly string[];
  private readonly logger?: Logger;

  constructor(options: ReconcileEngineOptions) {
    this.kanban = options.kanban;
    this.schema = options.schema;
    this.codec = options.codec;
    this.options = options.options;
    this.placement = options.placement;
    this.batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
    this.commentUserId = options.commentUserId ?? null;
    this.botUsernames = options.botUsernames ?? [];
    this.logger = options.logger;
  }

  /**
   * Brings one task in line with its forge item. Fields are independent:
   * each authorized change is its own remote call, all run concurrently, and
   * a failing field does not affect the others.
   */
  async reconcileTask(task: Task, item: ForgeItem): Promise<TaskReconcileResult> {
    const ref = forgeItemRef(item);
    const logger = this.logger?.withContext({
      taskId: task.taskId,
      ref: formatShortRef(ref),
    });
    const desired = computeDesiredState(item, task.flags);
    const changes = this.planChanges(task, desired, item, logger);

    const outcomes: FieldOutcome[] = [];
    const authorized: FieldChange[] = [];
    RECONCILE_FIELDS.forEach((field) => {
      const change = changes.find((entry) => entry.field === field);
      if (!change) {
        logger?.debug("No update needed", { field });
        outcomes.push({ field, status: "unchanged" });
        return;
      }
      if (!this.options[FIELD_SWITCHES[field]]) {
        logger?.info("Skipping update by request", {
          field,
          from: change.from,
          to: change.to,
        });
        outcomes.push({ field, status: "skipped", from: change.from, to: change.to });
        return;
      }
      authorized.push(change);
    });

    const applied = await Promise.all(
      authorized.map((change) => this.applyChange(change, logger)),
    );
    applied.forEach((entries) => outcomes.push(...entries));

    return { taskId: task.taskId, ref, outcomes };
  }

  async reconcileAll(pairs: readonly ReconcilePair[]): Promise<ReconcileSummary> {
    const settled = await settleInBatches(pairs, this.batchSize, (pair) =>
      this.reconcileTask(pair.task, pair.item),
    );

    const results: TaskReconcileResult[] = [];
    const failures: ReconcileFailure[] = [];
    settled.forEach((result, index) => {
      const taskId = pairs[index].task.taskId;
      if (result.status === "rejected") {
        const error = errorMessage(result.reason);
        this.logger?.error("Task reconciliation failed", { taskId, error });
        failures.push({ taskId, field: null, attemptedValue: null, error });
        return;
      }
      results.push(result.value);
      result.value.outcomes.forEach((outcome) => {
        if (outcome.status === "failed") {
          failures.push({
            taskId,
            field: outcome.field,
            attemptedValue: outcome.to,
            error: outcome.error,
          });
        }
      });
    });

    const changesMade = results.some((result) =>
      result.outcomes.some((outcome) => outcome.status === "updated"),
    );
    this.logger?.info("Reconciliation finished", {
      tasks: pairs.length,
      failures: failures.length,
      changesMade,
    });
    return { results, failures, changesMade };
  }

  /**
   * Creates the task for a forge item that has none yet, with its full state
   * and its one external link in place. An existing task is returned as is.
   */
  async createTask(
    item: ForgeItem,
    collection: TaskCollection,
  ): Promise<TaskCreateOutcome> {
    const ref = forgeItemRef(item);
    const shortRef = formatShortRef(ref);
    const existing = collection.getByRef(ref);
    if (existing) {
      return { status: "exists", ref, task: existing };
    }

    const data = computeCreationData(item, this.placement);
    if (!this.options.createTask) {
      this.logger?.info("Skipping task creation by request", {
        ref: shortRef,
        title: data.title,
        column: data.column,
        swimlane: data.swimlane,
        category: describeCategory(data.category),
      });
      return { status: "skipped", ref, data };
    }

    this.logger?.info("Creating task", {
      ref: shortRef,
      column: data.column,
      swimlane: data.swimlane,
    });
    const taskId = await this.kanban.createTask({
      projectId: this.schema.projectId,
      title: data.title,
      description: data.description,
      columnId: this.schema.columnId(data.column),
      swimlaneId: this.schema.swimlaneId(data.swimlane),
      categoryId: this.schema.categoryId(data.category),
      colorId: data.colorId,
      tags: flagsToTags(data.flags),
      reference: shortRef,
    });
    await this.kanban.createExternalLink(taskId, {
      url: this.codec.itemUrl(ref),
      title: this.codec.linkTitle(ref),
      dependency: "related",
    });
    const task = await collection.loadTaskId(taskId);
    return { status: "created", ref, task, data };
  }

  /** Never rejects: a failure becomes a `failed` outcome. */
  private async applyChange(change: FieldChange, logger?: Logger): Promise<FieldOutcome[]> {
    const { field, from, to } = change;
    logger?.info("Updating task field", { field, from, to });
    try {
      await change.apply();
    } catch (caught) {
      const error = errorMessage(caught);
      logger?.error("Task field update failed", { field, error });
      return [{ field, status: "failed", from, to, error }];
    }
    const updated: FieldOutcome = { field, status: "updated", from, to };
    const followUp = change.followUp;
    if (!followUp) {
      return [updated];
    }
    try {
      await followUp.apply();
    } catch (caught) {
      const error = errorMessage(caught);
      logger?.error("Task field update failed", { field: followUp.field, error });
      return [
        updated,
        { field: followUp.field, status: "failed", from: "", to: followUp.to, error },
      ];
    }
    return [updated, { field: followUp.field, status: "updated", from: "", to: followUp.to }];
  }

  private planOwnerChange(
    task: Task,
    desired: DesiredTaskState,
    item: ForgeItem,
    logger?: Logger,
  ): FieldChange | null {
    // Finished work keeps whoever owned it.
    if (desired.closedOrMerged) {
      return null;
    }
    const owner = desiredOwner(item);
    if (owner === null || this.botUsernames.includes(owner.username)) {
      return null;
    }
    if (task.owner === owner.username) {
      return null;
    }
    const ownerId = this.schema.userIdFor(owner.username);
    if (ownerId === null) {
      logger?.warn("Board user not found for forge assignee", {
        username: owner.username,
        name: owner.name,
      });
      return null;
    }
    return {
      field: "owner",
      from: task.owner ?? "(none)",
      to: owner.username,
      apply: () => this.kanban.updateTask(task.taskId, { ownerId }),
    };
  }

  private planChanges(
    task: Task,
    desired: DesiredTaskState,
    item: ForgeItem,
    logger?: Logger,
  ): FieldChange[] {
    const changes: FieldChange[] = [];

    if (task.title.trim() !== desired.title.trim()) {
      changes.push({
        field: "title",
        from: task.title,
        to: desired.title,
        apply: () => this.kanban.updateTask(task.taskId, { title: desired.title }),
      });
    }

    const keepManualCategory =
      desired.category === null &&
      task.category !== null &&
      STICKY_CATEGORIES.includes(task.category);
    if (task.category !== desired.category && !keepManualCategory) {
      const category = desired.category;
      changes.push({
        field: "category",
        from: describeCategory(task.category),
        to: describeCategory(category),
        apply: () =>
          this.kanban.updateTask(task.taskId, {
            categoryId: this.schema.categoryId(category),
          }),
      });
    }

    if (!flagsEqual(task.flags, desired.flags)) {
      const tags = [...flagsToTags(desired.flags), ...nonFlagTags(task.tags)];
      changes.push({
        field: "tags",
        from: describeTags(task.tags),
        to: describeTags(tags),
        apply: () => this.kanban.updateTask(task.taskId, { tags }),
      });
    }

    if (task.colorId !== desired.colorId) {
      changes.push({
        field: "color",
        from: task.colorId,
        to: desired.colorId,
        apply: () => this.kanban.updateTask(task.taskId, { colorId: desired.colorId }),
      });
    }

    const ownerChange = this.planOwnerChange(task, desired, item, logger);
    if (ownerChange) {
      changes.push(ownerChange);
    }

    const column = desiredColumn(task.column, desired);
    if (column !== task.column) {
      const commentUserId = this.commentUserId;
      const comment = `Moved to ${column}: ${formatShortRef(desired.ref)} is ${item.state}.`;
      changes.push({
        field: "column",
        from: task.column,
        to: column,
        apply: () =>
          this.kanban.moveTaskPosition({
            projectId: task.projectId,
            taskId: task.taskId,
            columnId: this.schema.columnId(column),
            swimlaneId: this.schema.swimlaneId(task.swimlane),
            position: 1,
          }),
        followUp:
          commentUserId === null
            ? undefined
            : {
                field: "comment",
                to: comment,
                apply: async () => {
                  await this.kanban.createComment(task.taskId, commentUserId, comment);
                },
              },
      });
    }

    return changes;
  }
}
