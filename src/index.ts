export {
  ConfigError,
  DEFAULT_CONFIG_PATH,
  GITLAB_TOKEN_ENV,
  KANBOARD_TOKEN_ENV,
  loadWorkboardConfig,
  normalizeConfig,
} from "./config.js";
export type { LogFormat, LogLevel, UpdateSwitches, WorkboardConfig } from "./config.js";
export { createLogger } from "./logger.js";
export type { LogData, LogEntry, Logger, LoggerOptions } from "./logger.js";
export type {
  ForgeAdapter,
  ForgeIssue,
  ForgeItem,
  ForgeItemState,
  ForgeListQuery,
  ForgeMergeRequest,
  ForgeUser,
  IsoTimestamp,
  KanbanActionParams,
  KanbanAdapter,
  KanbanAutoAction,
  KanbanAutoActionInput,
  KanbanDimensionEntry,
  KanbanExternalLink,
  KanbanExternalLinkInput,
  KanbanInternalLink,
  KanbanLinkType,
  KanbanProject,
  KanbanTaskInput,
  KanbanTaskMove,
  KanbanTaskRecord,
  KanbanTaskUpdate,
  KanbanUser,
} from "./adapters.js";
export { fetchForgeItem, forgeItemRef } from "./adapters.js";
export {
  FLAG_TAGS,
  FORGE_LABELS,
  LINK_RELATIONS,
  STICKY_CATEGORIES,
  TASK_CATEGORIES,
  TASK_COLORS,
  TASK_COLUMNS,
  TASK_SWIMLANES,
} from "./board-schema.js";
export type {
  FlagTag,
  LinkRelation,
  TaskCategory,
  TaskColor,
  TaskColumn,
  TaskSwimlane,
} from "./board-schema.js";
export {
  ForgeRefFormatError,
  createForgeRefCodec,
  formatShortRef,
  issueRef,
  mergeRequestRef,
  parseShortRef,
} from "./forge-refs.js";
export type { ExternalRef, ExternalRefKind, ForgeRefCodec } from "./forge-refs.js";
export { NO_CATEGORY_ID, SchemaError, SchemaIndex } from "./schema-index.js";
export {
  EMPTY_FLAGS,
  applyLabelFlags,
  flagsEqual,
  flagsToForgeLabels,
  flagsToTags,
  tagsToFlags,
} from "./task-flags.js";
export type { TaskFlagName, TaskFlags } from "./task-flags.js";
export { TaskIntegrityError, hasLinkTo } from "./task.js";
export type { InternalLink, Task, TaskListing } from "./task.js";
export { TaskCollection } from "./task-collection.js";
export type { TaskLoadFailure } from "./task-collection.js";
export {
  computeCreationData,
  computeDesiredState,
  desiredOwner,
  formatTaskTitle,
  guessColumn,
  guessSwimlane,
} from "./desired-state.js";
export type {
  DesiredTaskState,
  PlacementOptions,
  TaskCreationData,
} from "./desired-state.js";
export {
  ReconcileEngine,
  allDisabled,
  allEnabled,
  optionsFromSwitches,
} from "./reconcile-engine.js";
export type {
  FieldOutcome,
  OutcomeField,
  ReconcileFailure,
  ReconcileField,
  ReconcileOptions,
  ReconcilePair,
  ReconcileSummary,
  TaskCreateOutcome,
  TaskReconcileResult,
} from "./reconcile-engine.js";
export { LinkManager } from "./link-manager.js";
export type { LinkOutcome, LinkResult } from "./link-manager.js";
export {
  AUTO_ACTION_EVENTS,
  AutoActionRuleError,
  AutoActionSynchronizer,
  describeRule,
  parseRemoteAction,
  toActionInput,
} from "./auto-actions.js";
export type {
  ActionCondition,
  ActionPayload,
  AutoActionEvent,
  AutoActionRule,
  AutoActionSyncOptions,
  AutoActionSyncResult,
} from "./auto-actions.js";
export { loadRules, parseRulesConfig, rulesFromConfig } from "./rules-config.js";
export type { AutoTagEntry, RulesConfig, SubtaskGroup } from "./rules-config.js";
export { ForgeFeedback, formatTrackingLink, withTrackingLink } from "./forge-feedback.js";
export type { ForgeFeedbackKind, ForgeFeedbackResult } from "./forge-feedback.js";
export { BoardSync } from "./board-sync.js";
export type {
  BoardSyncOptions,
  BoardSyncReport,
  RefFailure,
  SearchSettings,
} from "./board-sync.js";
export { formatAutoActionReport, formatSyncReport } from "./run-report-output.js";
export type { SyncReportOutputOptions } from "./run-report-output.js";
export { KanboardAdapter, KanboardApiError } from "./kanboard-adapter.js";
export type { KanboardAdapterConfig } from "./kanboard-adapter.js";
export { GitLabAdapter, GitLabApiError } from "./gitlab-adapter.js";
export type { GitLabAdapterConfig } from "./gitlab-adapter.js";
