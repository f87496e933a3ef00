import { readFile } from "node:fs/promises";

import { parse } from "smol-toml";

import { actionClassFor, describeRule, rulesEqual } from "./auto-actions.js";
import type {
  ActionCondition,
  AutoActionEvent,
  AutoActionRule,
} from "./auto-actions.js";
import { TASK_CATEGORIES, TASK_COLUMNS, TASK_SWIMLANES } from "./board-schema.js";
import {
  ConfigError,
  optionalBoolean,
  optionalObject,
  optionalString,
  requireEnum,
  requireNonEmptyString,
  requireObject,
} from "./config.js";

const EVENT_NAMES = ["TASK_CREATE", "TASK_CREATE_UPDATE", "TASK_MOVE_COLUMN"] as const;
type EventName = (typeof EVENT_NAMES)[number];

const EVENTS: Record<EventName, AutoActionEvent> = {
  TASK_CREATE: "task.create",
  TASK_CREATE_UPDATE: "task.create_update",
  TASK_MOVE_COLUMN: "task.move.column",
};

export interface SubtaskGroup {
  name: string;
  subtasks: string[];
  condition: ActionCondition | null;
  events: AutoActionEvent[];
  allowDuplicates: boolean;
}

export interface AutoTagEntry {
  tag: string;
  condition: ActionCondition;
  events: AutoActionEvent[];
}

export interface RulesConfig {
  subtaskGroups: SubtaskGroup[];
  autoTags: AutoTagEntry[];
}

const optionalArray = (value: unknown, label: string): unknown[] => {
  if (value === undefined) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw new ConfigError(`${label} must be an array`);
  }
  return value;
};

const parseEvents = (value: unknown, label: string): AutoActionEvent[] =>
  optionalArray(value, label).map(
    (entry, index) => EVENTS[requireEnum(entry, `${label}[${index}]`, EVENT_NAMES)],
  );

const parseCondition = (value: unknown, label: string): ActionCondition => {
  const input = requireObject(value, label);
  const condition: ActionCondition = {};
  if (input.column !== undefined) {
    condition.column = requireEnum(input.column, `${label}.column`, TASK_COLUMNS);
  }
  if (input.swimlane !== undefined) {
    condition.swimlane = requireEnum(input.swimlane, `${label}.swimlane`, TASK_SWIMLANES);
  }
  const excludeCategories = optionalBoolean(
    input.exclude_categories,
    `${label}.exclude_categories`,
    false,
  );
  if (input.category !== undefined) {
    if (excludeCategories) {
      throw new ConfigError(
        `${label} cannot set both category and exclude_categories`,
      );
    }
    condition.category = requireEnum(input.category, `${label}.category`, TASK_CATEGORIES);
  } else if (excludeCategories) {
    condition.category = null;
  }
  return condition;
};

const parseSubtaskGroup = (value: unknown, label: string): SubtaskGroup => {
  const input = requireObject(value, label);
  const name = requireNonEmptyString(input.group_name, `${label}.group_name`);
  const prefix = optionalString(input.prefix, `${label}.prefix`, "").trim();
  const entries = optionalArray(input.subtask, `${label}.subtask`);
  if (entries.length === 0) {
    throw new ConfigError(`${label} must define at least one subtask`);
  }
  const subtasks = entries.map((entry, index) => {
    const subtask = requireObject(entry, `${label}.subtask[${index}]`);
    const subtaskName = requireNonEmptyString(
      subtask.name,
      `${label}.subtask[${index}].name`,
    );
    return prefix === "" ? subtaskName : `${prefix} ${subtaskName}`;
  });
  return {
    name,
    subtasks,
    condition:
      input.condition === undefined
        ? null
        : parseCondition(input.condition, `${label}.condition`),
    events: parseEvents(input.events, `${label}.events`),
    allowDuplicates: optionalBoolean(
      input.allow_duplicate_subtasks,
      `${label}.allow_duplicate_subtasks`,
      false,
    ),
  };
};

const parseAutoTag = (value: unknown, label: string): AutoTagEntry => {
  const input = requireObject(value, label);
  return {
    tag: requireNonEmptyString(input.tag, `${label}.tag`),
    condition: parseCondition(input.condition, `${label}.condition`),
    events: parseEvents(input.events, `${label}.events`),
  };
};

export const parseRulesConfig = (text: string, sourceLabel = "rules"): RulesConfig => {
  let parsed: unknown;
  try {
    parsed = parse(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : "Unknown TOML parse error";
    throw new ConfigError(`Invalid TOML in ${sourceLabel}: ${message}`);
  }
  const root = optionalObject(parsed, sourceLabel);
  return {
    subtaskGroups: optionalArray(root.subtask_group, "subtask_group").map((entry, index) =>
      parseSubtaskGroup(entry, `subtask_group[${index}]`),
    ),
    autoTags: optionalArray(root.auto_tag, "auto_tag").map((entry, index) =>
      parseAutoTag(entry, `auto_tag[${index}]`),
    ),
  };
};

/**
 * One automatic action per (group or tag entry, event). Groups without a
 * condition or events are checklist templates only and yield none.
 */
export const rulesFromConfig = (config: RulesConfig): AutoActionRule[] => {
  const rules: AutoActionRule[] = [];
  config.subtaskGroups.forEach((group) => {
    const condition = group.condition;
    if (condition === null) {
      return;
    }
    group.events.forEach((event) => {
      rules.push({
        event,
        condition,
        payload: {
          type: "subtasks",
          titles: group.subtasks,
          allowDuplicates: group.allowDuplicates,
        },
        source: group.name,
      });
    });
  });
  config.autoTags.forEach((entry) => {
    entry.events.forEach((event) => {
      rules.push({
        event,
        condition: entry.condition,
        payload: { type: "tag", tag: entry.tag },
        source: `auto_tag ${entry.tag}`,
      });
    });
  });
  rules.forEach((rule, index) => {
    const earlier = rules.findIndex((other) => rulesEqual(other, rule));
    if (earlier !== index) {
      throw new ConfigError(
        `${rule.source ?? "rule"}: ${describeRule(rule)} is already declared by ` +
          `${rules[earlier].source ?? "another rule"}`,
      );
    }
    if (actionClassFor(rule) === null) {
      throw new ConfigError(
        `${rule.source ?? "rule"}: no automatic action supports ${describeRule(rule)}`,
      );
    }
  });
  return rules;
};

export const loadRules = async (rulesPath: string): Promise<AutoActionRule[]> => {
  let text: string;
  try {
    text = await readFile(rulesPath, "utf8");
  } catch (error) {
    const message = error instanceof Error ? error.message : "Unknown file system error";
    throw new ConfigError(`Failed to read rules at ${rulesPath}: ${message}`);
  }
  return rulesFromConfig(parseRulesConfig(text, rulesPath));
};
