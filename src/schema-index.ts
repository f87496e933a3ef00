import type { KanbanAdapter, KanbanDimensionEntry, KanbanUser } from "./adapters.js";
import {
  LINK_RELATIONS,
  TASK_CATEGORIES,
  TASK_COLUMNS,
  TASK_SWIMLANES,
  asLinkRelation,
  asTaskCategory,
  asTaskColumn,
  asTaskSwimlane,
} from "./board-schema.js";
import type {
  LinkRelation,
  TaskCategory,
  TaskColumn,
  TaskSwimlane,
} from "./board-schema.js";
import type { Logger } from "./logger.js";

/** Category ID Kanboard uses for "no category". */
export const NO_CATEGORY_ID = 0;

export class SchemaError extends Error {
  readonly dimension: string;

  constructor(dimension: string, message: string) {
    super(message);
    this.name = "SchemaError";
    this.dimension = dimension;
  }
}

/**
 * Name/ID bijection for one board dimension. Remote names outside the
 * compile-time enum are ignored; lookups of either direction fail loudly.
 */
class DimensionMap<T extends string> {
  private readonly idByName = new Map<T, number>();
  private readonly nameById = new Map<number, T>();

  constructor(
    readonly dimension: string,
    private readonly narrow: (name: string) => T | undefined,
  ) {}

  replace(entries: readonly { id: number; name: string }[]): void {
    this.idByName.clear();
    this.nameById.clear();
    entries.forEach((entry) => {
      const name = this.narrow(entry.name);
      if (name === undefined) {
        return;
      }
      if (this.idByName.has(name)) {
        throw new SchemaError(
          this.dimension,
          `Duplicate ${this.dimension} '${name}' on the board`,
        );
      }
      this.idByName.set(name, entry.id);
      this.nameById.set(entry.id, name);
    });
  }

  idOf(name: T): number {
    const id = this.idByName.get(name);
    if (id === undefined) {
      throw new SchemaError(
        this.dimension,
        `Board has no ${this.dimension} named '${name}'`,
      );
    }
    return id;
  }

  nameOf(id: number): T {
    const name = this.nameById.get(id);
    if (name === undefined) {
      throw new SchemaError(
        this.dimension,
        `Unknown ${this.dimension} ID ${id}; the board schema has drifted`,
      );
    }
    return name;
  }

  missing(expected: readonly T[]): T[] {
    return expected.filter((name) => !this.idByName.has(name));
  }

  get size(): number {
    return this.idByName.size;
  }
}

export class SchemaIndex {
  readonly projectId: number;
  private readonly kanban: KanbanAdapter;
  private readonly logger?: Logger;
  private readonly columns = new DimensionMap<TaskColumn>("column", asTaskColumn);
  private readonly swimlanes = new DimensionMap<TaskSwimlane>(
    "swimlane",
    asTaskSwimlane,
  );
  private readonly categories = new DimensionMap<TaskCategory>(
    "category",
    asTaskCategory,
  );
  private readonly links = new DimensionMap<LinkRelation>(
    "link type",
    asLinkRelation,
  );
  private tagIds = new Map<string, number>();
  private users: readonly KanbanUser[] = [];
  private loaded = false;

  constructor(options: { kanban: KanbanAdapter; projectId: number; logger?: Logger }) {
    this.kanban = options.kanban;
    this.projectId = options.projectId;
    this.logger = options.logger;
  }

  /** Fetches every dimension and the user list in one concurrent batch; repeated calls replace the maps. */
  async fetchAllDimensions(): Promise<void> {
    const [columns, swimlanes, categories, tags, linkTypes, users] = await Promise.all([
      this.kanban.getColumns(this.projectId),
      this.kanban.getSwimlanes(this.projectId),
      this.kanban.getCategories(this.projectId),
      this.kanban.getTags(this.projectId),
      this.kanban.getLinkTypes(),
      this.kanban.getAllUsers(),
    ]);
    this.columns.replace(columns);
    this.swimlanes.replace(swimlanes);
    this.categories.replace(categories);
    this.links.replace(
      linkTypes.map((linkType) => ({ id: linkType.id, name: linkType.label })),
    );
    this.tagIds = indexTags(tags);
    this.users = users;
    this.loaded = true;
    this.logger?.debug("Board schema loaded", {
      projectId: this.projectId,
      columns: this.columns.size,
      swimlanes: this.swimlanes.size,
      categories: this.categories.size,
      tags: this.tagIds.size,
      linkTypes: this.links.size,
      users: users.length,
    });
  }

  /** Fails when any compile-time column, swimlane, category or relation is absent remotely. */
  requireAll(): void {
    this.assertLoaded();
    const problems = [
      ...this.columns.missing(TASK_COLUMNS).map((name) => `column '${name}'`),
      ...this.swimlanes.missing(TASK_SWIMLANES).map((name) => `swimlane '${name}'`),
      ...this.categories.missing(TASK_CATEGORIES).map((name) => `category '${name}'`),
      ...this.links.missing(LINK_RELATIONS).map((name) => `link type '${name}'`),
    ];
    if (problems.length > 0) {
      throw new SchemaError(
        "board",
        `Board project ${this.projectId} is missing: ${problems.join(", ")}`,
      );
    }
  }

  columnId(column: TaskColumn): number {
    this.assertLoaded();
    return this.columns.idOf(column);
  }

  columnFromId(id: number): TaskColumn {
    this.assertLoaded();
    return this.columns.nameOf(id);
  }

  swimlaneId(swimlane: TaskSwimlane): number {
    this.assertLoaded();
    return this.swimlanes.idOf(swimlane);
  }

  swimlaneFromId(id: number): TaskSwimlane {
    this.assertLoaded();
    return this.swimlanes.nameOf(id);
  }

  categoryId(category: TaskCategory | null): number {
    this.assertLoaded();
    return category === null ? NO_CATEGORY_ID : this.categories.idOf(category);
  }

  categoryFromId(id: number): TaskCategory | null {
    this.assertLoaded();
    return id === NO_CATEGORY_ID ? null : this.categories.nameOf(id);
  }

  tagId(tag: string): number {
    this.assertLoaded();
    const id = this.tagIds.get(tag);
    if (id === undefined) {
      throw new SchemaError("tag", `Board has no tag named '${tag}'`);
    }
    return id;
  }

  linkTypeId(relation: LinkRelation): number {
    this.assertLoaded();
    return this.links.idOf(relation);
  }

  /** Null when nobody on the board has this username, e.g. before their first login. */
  userIdFor(username: string): number | null {
    this.assertLoaded();
    return this.users.find((user) => user.username === username)?.id ?? null;
  }

  usernameFor(userId: number): string | null {
    this.assertLoaded();
    return this.users.find((user) => user.id === userId)?.username ?? null;
  }

  private assertLoaded(): void {
    if (!this.loaded) {
      throw new SchemaError("board", "Board schema has not been fetched yet");
    }
  }
}

const indexTags = (tags: readonly KanbanDimensionEntry[]): Map<string, number> =>
  new Map(tags.map((tag) => [tag.name, tag.id]));
