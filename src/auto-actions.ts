import type {
  KanbanActionParams,
  KanbanAdapter,
  KanbanAutoAction,
  KanbanAutoActionInput,
} from "./adapters.js";
import { errorMessage } from "./batch.js";
import type { TaskCategory, TaskColumn, TaskSwimlane } from "./board-schema.js";
import type { Logger } from "./logger.js";
import { SchemaError } from "./schema-index.js";
import type { SchemaIndex } from "./schema-index.js";

export const AUTO_ACTION_EVENTS = [
  "task.create",
  "task.create_update",
  "task.move.column",
] as const;
export type AutoActionEvent = (typeof AUTO_ACTION_EVENTS)[number];

/**
 * Every populated field must match for the action to fire. `category: null`
 * means "the task has no category"; an absent key means "any category".
 */
export interface ActionCondition {
  column?: TaskColumn;
  swimlane?: TaskSwimlane;
  category?: TaskCategory | null;
}

export type ActionPayload =
  | { type: "subtasks"; titles: readonly string[]; allowDuplicates: boolean }
  | { type: "tag"; tag: string };

export interface AutoActionRule {
  event: AutoActionEvent;
  condition: ActionCondition;
  payload: ActionPayload;
  /** Where the rule came from, for logs. */
  source?: string;
}

export type ActionShape =
  | "category"
  | "column"
  | "column+category"
  | "column+swimlane"
  | "column+swimlane+category";

export class AutoActionRuleError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "AutoActionRuleError";
  }
}

const SUBTASK_PLUGIN = "\\Kanboard\\Plugin\\AutoSubtasks\\Action";
const TAG_PLUGIN = "\\Kanboard\\Plugin\\TagAutomaticAction\\Action";

const ACTION_CLASSES: Record<ActionPayload["type"], Partial<Record<ActionShape, string>>> = {
  subtasks: {
    category: `${SUBTASK_PLUGIN}\\CategoryAutoSubtaskVanilla`,
    column: `${SUBTASK_PLUGIN}\\AutoCreateSubtaskVanilla`,
    "column+category": `${SUBTASK_PLUGIN}\\CategoryColAutoSubtaskVanilla`,
    "column+swimlane": `${SUBTASK_PLUGIN}\\SwimlaneAutoCreateSubtaskVanilla`,
    "column+swimlane+category": `${SUBTASK_PLUGIN}\\SwimlaneCategoryColAutoSubtaskVanilla`,
  },
  tag: {
    column: `${TAG_PLUGIN}\\TaskAssignTagCol`,
    "column+swimlane": `${TAG_PLUGIN}\\TaskAssignTagColSwimlane`,
  },
};

const hasCategory = (condition: ActionCondition): boolean =>
  condition.category !== undefined;

export const shapeOf = (condition: ActionCondition): ActionShape | null => {
  const column = condition.column !== undefined;
  const swimlane = condition.swimlane !== undefined;
  const category = hasCategory(condition);
  if (!column) {
    return category && !swimlane ? "category" : null;
  }
  if (swimlane) {
    return category ? "column+swimlane+category" : "column+swimlane";
  }
  return category ? "column+category" : "column";
};

/** The plugin action class for a rule, or null when the plugins have none. */
export const actionClassFor = (rule: AutoActionRule): string | null => {
  const shape = shapeOf(rule.condition);
  return shape === null ? null : ACTION_CLASSES[rule.payload.type][shape] ?? null;
};

export const describeRule = (rule: AutoActionRule): string => {
  const parts: string[] = [];
  if (rule.condition.column !== undefined) {
    parts.push(`column=${rule.condition.column}`);
  }
  if (rule.condition.swimlane !== undefined) {
    parts.push(`swimlane=${rule.condition.swimlane}`);
  }
  if (rule.condition.category !== undefined) {
    parts.push(`category=${rule.condition.category ?? "(none)"}`);
  }
  const payload =
    rule.payload.type === "tag"
      ? `tag '${rule.payload.tag}'`
      : `${rule.payload.titles.length} subtasks`;
  return `${rule.event} [${parts.join(", ")}] -> ${payload}`;
};

export const rulesEqual = (left: AutoActionRule, right: AutoActionRule): boolean => {
  if (left.event !== right.event) {
    return false;
  }
  if (
    left.condition.column !== right.condition.column ||
    left.condition.swimlane !== right.condition.swimlane ||
    left.condition.category !== right.condition.category
  ) {
    return false;
  }
  const a = left.payload;
  const b = right.payload;
  if (a.type === "tag" || b.type === "tag") {
    return a.type === "tag" && b.type === "tag" && a.tag === b.tag;
  }
  return (
    a.allowDuplicates === b.allowDuplicates &&
    a.titles.length === b.titles.length &&
    a.titles.every((title, index) => title === b.titles[index])
  );
};

export const toActionInput = (
  schema: SchemaIndex,
  rule: AutoActionRule,
): KanbanAutoActionInput => {
  const actionName = actionClassFor(rule);
  if (actionName === null) {
    throw new AutoActionRuleError(`No automatic action supports ${describeRule(rule)}`);
  }
  const params: KanbanActionParams = {};
  const { column, swimlane, category } = rule.condition;
  if (column !== undefined) {
    params.column_id = String(schema.columnId(column));
  }
  if (swimlane !== undefined) {
    params.swimlane_id = String(schema.swimlaneId(swimlane));
  }
  if (category !== undefined) {
    params.category_id = String(schema.categoryId(category));
  }
  if (rule.payload.type === "tag") {
    params.tag = rule.payload.tag;
  } else {
    params.user_id = "0";
    params.multitasktitles = rule.payload.titles.join("\n");
    params.time_estimated = "0";
    params.check_box_no_duplicates = rule.payload.allowDuplicates ? "0" : "1";
    if (shapeOf(rule.condition) === "column") {
      params.check_box_all_columns = "0";
    }
  }
  return { eventName: rule.event, actionName, params };
};

const SHAPES: readonly ActionShape[] = [
  "category",
  "column",
  "column+category",
  "column+swimlane",
  "column+swimlane+category",
];

const PAYLOAD_TYPES: readonly ActionPayload["type"][] = ["subtasks", "tag"];

const findClass = (
  actionName: string,
): { type: ActionPayload["type"]; shape: ActionShape } | null => {
  for (const type of PAYLOAD_TYPES) {
    for (const shape of SHAPES) {
      if (ACTION_CLASSES[type][shape] === actionName) {
        return { type, shape };
      }
    }
  }
  return null;
};

const readId = (params: KanbanActionParams, key: string): number | null => {
  const raw = params[key];
  if (raw === undefined || raw.trim() === "") {
    return null;
  }
  const id = Number(raw);
  return Number.isInteger(id) ? id : null;
};

/**
 * Reads a remote automatic action back into a rule. Returns null for action
 * classes, events or IDs this board does not define.
 */
export const parseRemoteAction = (
  schema: SchemaIndex,
  action: KanbanAutoAction,
): AutoActionRule | null => {
  const event = AUTO_ACTION_EVENTS.find((candidate) => candidate === action.eventName);
  const found = findClass(action.actionName);
  if (event === undefined || found === null) {
    return null;
  }
  const { params } = action;
  const condition: ActionCondition = {};
  try {
    if (found.shape.includes("column")) {
      const columnId = readId(params, "column_id");
      if (columnId === null) {
        return null;
      }
      condition.column = schema.columnFromId(columnId);
    }
    if (found.shape.includes("swimlane")) {
      const swimlaneId = readId(params, "swimlane_id");
      if (swimlaneId === null) {
        return null;
      }
      condition.swimlane = schema.swimlaneFromId(swimlaneId);
    }
    if (found.shape.includes("category")) {
      const categoryId = readId(params, "category_id");
      if (categoryId === null) {
        return null;
      }
      condition.category = schema.categoryFromId(categoryId);
    }
  } catch (error) {
    if (error instanceof SchemaError) {
      return null;
    }
    throw error;
  }

  if (found.type === "tag") {
    const tag = params.tag;
    return tag === undefined || tag === ""
      ? null
      : { event, condition, payload: { type: "tag", tag } };
  }
  const titles = params.multitasktitles;
  if (titles === undefined) {
    return null;
  }
  return {
    event,
    condition,
    payload: {
      type: "subtasks",
      titles: titles
        .split("\n")
        .map((title) => title.replace(/\r$/, ""))
        .filter((title) => title !== ""),
      allowDuplicates: params.check_box_no_duplicates !== "1",
    },
  };
};

export interface AutoActionSyncOptions {
  removeUnexpected: boolean;
  dryRun: boolean;
}

export interface AutoActionSyncResult {
  matched: number;
  unparsed: KanbanAutoAction[];
  duplicates: KanbanAutoAction[];
  unexpected: KanbanAutoAction[];
  missing: AutoActionRule[];
  removed: number[];
  created: AutoActionRule[];
  failures: { target: string; error: string }[];
}

export class AutoActionSynchronizer {
  private readonly kanban: KanbanAdapter;
  private readonly schema: SchemaIndex;
  private readonly logger?: Logger;

  constructor(options: { kanban: KanbanAdapter; schema: SchemaIndex; logger?: Logger }) {
    this.kanban = options.kanban;
    this.schema = options.schema;
    this.logger = options.logger;
  }

  async sync(
    declared: readonly AutoActionRule[],
    options: AutoActionSyncOptions,
  ): Promise<AutoActionSyncResult> {
    // Equal rules describe one action; a second copy would never match.
    const expected = declared.filter(
      (rule, index) => declared.findIndex((other) => rulesEqual(other, rule)) === index,
    );
    const remote = await this.kanban.getAutoActions(this.schema.projectId);
    // Oldest action wins when several match the same rule.
    const ordered = [...remote].sort((left, right) => left.id - right.id);

    const matchedIndices = new Set<number>();
    const unparsed: KanbanAutoAction[] = [];
    const duplicates: KanbanAutoAction[] = [];
    const unexpected: KanbanAutoAction[] = [];

    ordered.forEach((action) => {
      const parsed = parseRemoteAction(this.schema, action);
      if (parsed === null) {
        this.logger?.warn("Automatic action not understood; leaving it alone", {
          actionId: action.id,
          actionName: action.actionName,
          eventName: action.eventName,
        });
        unparsed.push(action);
        return;
      }
      const index = expected.findIndex((rule) => rulesEqual(rule, parsed));
      if (index === -1) {
        this.logger?.info("Unexpected automatic action", {
          actionId: action.id,
          rule: describeRule(parsed),
        });
        unexpected.push(action);
        return;
      }
      if (matchedIndices.has(index)) {
        this.logger?.info("Duplicate automatic action", {
          actionId: action.id,
          rule: describeRule(parsed),
        });
        duplicates.push(action);
        return;
      }
      matchedIndices.add(index);
    });

    const missing = expected.filter((_, index) => !matchedIndices.has(index));
    const toRemove =
      options.removeUnexpected && !options.dryRun ? [...duplicates, ...unexpected] : [];
    const toCreate = options.dryRun ? [] : missing;

    if (options.dryRun) {
      missing.forEach((rule) => {
        this.logger?.info("Skipping creation of automatic action by request", {
          rule: describeRule(rule),
          source: rule.source,
        });
      });
    }
    if (!options.removeUnexpected || options.dryRun) {
      [...duplicates, ...unexpected].forEach((action) => {
        this.logger?.info("Skipping removal of automatic action by request", {
          actionId: action.id,
        });
      });
    }

    const failures: AutoActionSyncResult["failures"] = [];
    const removed: number[] = [];
    const removals = await Promise.allSettled(
      toRemove.map((action) => this.kanban.removeAutoAction(action.id)),
    );
    removals.forEach((result, index) => {
      const actionId = toRemove[index].id;
      if (result.status === "fulfilled") {
        removed.push(actionId);
        return;
      }
      failures.push({ target: `action ${actionId}`, error: errorMessage(result.reason) });
    });

    const created: AutoActionRule[] = [];
    const creations = await Promise.allSettled(
      toCreate.map(async (rule) =>
        this.kanban.createAutoAction(this.schema.projectId, toActionInput(this.schema, rule)),
      ),
    );
    creations.forEach((result, index) => {
      const rule = toCreate[index];
      if (result.status === "fulfilled") {
        created.push(rule);
        return;
      }
      failures.push({ target: describeRule(rule), error: errorMessage(result.reason) });
    });

    failures.forEach((failure) => {
      this.logger?.error("Automatic action change failed", failure);
    });
    this.logger?.info("Automatic actions synchronized", {
      matched: matchedIndices.size,
      unparsed: unparsed.length,
      duplicates: duplicates.length,
      unexpected: unexpected.length,
      removed: removed.length,
      created: created.length,
    });

    return {
      matched: matchedIndices.size,
      unparsed,
      duplicates,
      unexpected,
      missing,
      removed,
      created,
      failures,
    };
  }
}
