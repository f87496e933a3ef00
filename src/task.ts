import type {
  KanbanAdapter,
  KanbanExternalLink,
  KanbanInternalLink,
  KanbanTaskRecord,
} from "./adapters.js";
import { asLinkRelation } from "./board-schema.js";
import type {
  LinkRelation,
  TaskCategory,
  TaskColumn,
  TaskSwimlane,
} from "./board-schema.js";
import type { ExternalRef, ForgeRefCodec } from "./forge-refs.js";
import type { SchemaIndex } from "./schema-index.js";
import { tagsToFlags } from "./task-flags.js";
import type { TaskFlags } from "./task-flags.js";

/**
 * A task whose data cannot be interpreted: no recognizable external link,
 * two tasks tracking the same item, or contradictory forge labels.
 */
export class TaskIntegrityError extends Error {
  readonly taskId: number | null;
  readonly details: readonly string[];

  constructor(message: string, taskId: number | null, details: readonly string[] = []) {
    super(message);
    this.name = "TaskIntegrityError";
    this.taskId = taskId;
    this.details = details;
  }
}

/** Fields decoded synchronously from a task listing entry. */
export interface TaskListing {
  readonly taskId: number;
  readonly projectId: number;
  readonly title: string;
  readonly description: string;
  readonly column: TaskColumn;
  readonly swimlane: TaskSwimlane;
  readonly category: TaskCategory | null;
  readonly colorId: string;
  /** 0 when nobody owns the task. */
  readonly ownerId: number;
  /** Board username of the owner; null when unowned or the user is gone. */
  readonly owner: string | null;
  readonly isActive: boolean;
  readonly url: string;
}

export interface InternalLink {
  readonly linkId: number;
  readonly otherTaskId: number;
  /** Null for link labels this board does not define. */
  readonly relation: LinkRelation | null;
  readonly label: string;
}

export interface Task extends TaskListing {
  readonly ref: ExternalRef;
  readonly tags: readonly string[];
  readonly flags: TaskFlags;
  readonly externalLinks: readonly KanbanExternalLink[];
  readonly internalLinks: readonly InternalLink[];
}

export const decodeTaskListing = (
  schema: SchemaIndex,
  record: KanbanTaskRecord,
): TaskListing => ({
  taskId: record.id,
  projectId: record.projectId,
  title: record.title,
  description: record.description,
  column: schema.columnFromId(record.columnId),
  swimlane: schema.swimlaneFromId(record.swimlaneId),
  category: schema.categoryFromId(record.categoryId),
  colorId: record.colorId,
  ownerId: record.ownerId,
  owner: record.ownerId === 0 ? null : schema.usernameFor(record.ownerId),
  isActive: record.isActive,
  url: record.url,
});

const decodeInternalLink = (link: KanbanInternalLink): InternalLink => ({
  linkId: link.id,
  otherTaskId: link.taskId,
  relation: asLinkRelation(link.label) ?? null,
  label: link.label,
});

const findExternalRef = (
  taskId: number,
  codec: ForgeRefCodec,
  links: readonly KanbanExternalLink[],
): ExternalRef => {
  for (const link of links) {
    const ref = codec.parseUrl(link.url);
    if (ref) {
      return ref;
    }
  }
  throw new TaskIntegrityError(
    `Task ${taskId} has no external link to an issue or merge request`,
    taskId,
    links.map((link) => link.url),
  );
};

export const hydrateTask = async (
  kanban: KanbanAdapter,
  codec: ForgeRefCodec,
  listing: TaskListing,
): Promise<Task> => {
  const [externalLinks, tags, internalLinks] = await Promise.all([
    kanban.getExternalLinks(listing.taskId),
    kanban.getTaskTags(listing.taskId),
    kanban.getInternalLinks(listing.taskId),
  ]);
  return Object.freeze({
    ...listing,
    ref: findExternalRef(listing.taskId, codec, externalLinks),
    tags: Object.freeze([...tags]),
    flags: tagsToFlags(tags),
    externalLinks: Object.freeze([...externalLinks]),
    internalLinks: Object.freeze(internalLinks.map(decodeInternalLink)),
  });
};

export const loadTaskById = async (
  kanban: KanbanAdapter,
  schema: SchemaIndex,
  codec: ForgeRefCodec,
  taskId: number,
): Promise<Task> => {
  const record = await kanban.getTask(taskId);
  if (record === null) {
    throw new TaskIntegrityError(`Task ${taskId} does not exist`, taskId);
  }
  return hydrateTask(kanban, codec, decodeTaskListing(schema, record));
};

export const refreshInternalLinks = async (
  kanban: KanbanAdapter,
  task: Task,
): Promise<Task> => {
  const links = await kanban.getInternalLinks(task.taskId);
  return Object.freeze({
    ...task,
    internalLinks: Object.freeze(links.map(decodeInternalLink)),
  });
};

export const hasLinkTo = (task: Task, otherTaskId: number): boolean =>
  task.internalLinks.some((link) => link.otherTaskId === otherTaskId);
