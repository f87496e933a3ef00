import type { KanbanAdapter } from "./adapters.js";
import { formatShortRef, parseShortRef } from "./forge-refs.js";
import type { ExternalRef, ForgeRefCodec } from "./forge-refs.js";
import type { Logger } from "./logger.js";
import type { SchemaIndex } from "./schema-index.js";
import {
  TaskIntegrityError,
  decodeTaskListing,
  hydrateTask,
  loadTaskById,
  refreshInternalLinks,
} from "./task.js";
import type { Task } from "./task.js";

export interface TaskLoadFailure {
  taskId: number;
  error: TaskIntegrityError;
}

/**
 * In-memory index of a board project's tasks, keyed by task ID and by the
 * issue or merge request each one tracks.
 */
export class TaskCollection {
  private readonly kanban: KanbanAdapter;
  private readonly schema: SchemaIndex;
  private readonly codec: ForgeRefCodec;
  private readonly logger?: Logger;
  private readonly tasks = new Map<number, Task>();
  private readonly issueToTaskId = new Map<number, number>();
  private readonly mergeRequestToTaskId = new Map<number, number>();

  constructor(options: {
    kanban: KanbanAdapter;
    schema: SchemaIndex;
    codec: ForgeRefCodec;
    logger?: Logger;
  }) {
    this.kanban = options.kanban;
    this.schema = options.schema;
    this.codec = options.codec;
    this.logger = options.logger;
  }

  get size(): number {
    return this.tasks.size;
  }

  /**
   * Lists and hydrates every task of the project. Integrity problems are
   * returned per task; any other failure rejects, since an unloaded task
   * would later look untracked.
   */
  async loadProject(onlyOpen = true): Promise<TaskLoadFailure[]> {
    const records = await this.kanban.getAllTasks(this.schema.projectId, onlyOpen);
    const listings = records.map((record) => decodeTaskListing(this.schema, record));
    const settled = await Promise.allSettled(
      listings.map((listing) => hydrateTask(this.kanban, this.codec, listing)),
    );

    const failures: TaskLoadFailure[] = [];
    settled.forEach((result, index) => {
      const taskId = listings[index].taskId;
      if (result.status === "rejected") {
        if (result.reason instanceof TaskIntegrityError) {
          failures.push({ taskId, error: result.reason });
          return;
        }
        throw result.reason;
      }
      try {
        this.add(result.value);
      } catch (error) {
        if (error instanceof TaskIntegrityError) {
          failures.push({ taskId, error });
          return;
        }
        throw error;
      }
    });

    failures.forEach((failure) => {
      this.logger?.warn("Task could not be loaded", {
        taskId: failure.taskId,
        error: failure.error.message,
        details: failure.error.details,
      });
    });
    this.logger?.info("Board tasks loaded", {
      loaded: this.tasks.size,
      failed: failures.length,
      onlyOpen,
    });
    return failures;
  }

  /** Loads (or reloads) one task, typically right after creating it. */
  async loadTaskId(taskId: number): Promise<Task> {
    const task = await loadTaskById(this.kanban, this.schema, this.codec, taskId);
    this.add(task);
    return task;
  }

  async refreshInternalLinks(taskId: number): Promise<Task> {
    const current = this.tasks.get(taskId);
    if (!current) {
      return this.loadTaskId(taskId);
    }
    const refreshed = await refreshInternalLinks(this.kanban, current);
    this.tasks.set(taskId, refreshed);
    return refreshed;
  }

  add(task: Task): void {
    const index = this.indexFor(task.ref);
    const existingId = index.get(task.ref.number);
    if (existingId !== undefined && existingId !== task.taskId) {
      throw new TaskIntegrityError(
        `Tasks ${existingId} and ${task.taskId} both track ${formatShortRef(task.ref)}`,
        task.taskId,
        [String(existingId)],
      );
    }
    index.set(task.ref.number, task.taskId);
    this.tasks.set(task.taskId, task);
  }

  getById(taskId: number): Task | undefined {
    return this.tasks.get(taskId);
  }

  getByIssue(number: number): Task | undefined {
    const taskId = this.issueToTaskId.get(number);
    return taskId === undefined ? undefined : this.tasks.get(taskId);
  }

  getByMergeRequest(number: number): Task | undefined {
    const taskId = this.mergeRequestToTaskId.get(number);
    return taskId === undefined ? undefined : this.tasks.get(taskId);
  }

  /** Accepts a reference or its short form (`#12`, `!34`). */
  getByRef(ref: ExternalRef | string): Task | undefined {
    const parsed = typeof ref === "string" ? parseShortRef(ref) : ref;
    if (parsed === null) {
      return undefined;
    }
    return parsed.kind === "issue"
      ? this.getByIssue(parsed.number)
      : this.getByMergeRequest(parsed.number);
  }

  all(): Task[] {
    return [...this.tasks.values()];
  }

  private indexFor(ref: ExternalRef): Map<number, number> {
    return ref.kind === "issue" ? this.issueToTaskId : this.mergeRequestToTaskId;
  }
}
