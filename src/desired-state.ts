import type { ForgeItem, ForgeMergeRequest, ForgeUser } from "./adapters.js";
import { forgeItemRef } from "./adapters.js";
import { FORGE_LABELS } from "./board-schema.js";
import type {
  TaskCategory,
  TaskColor,
  TaskColumn,
  TaskSwimlane,
} from "./board-schema.js";
import { formatShortRef, refKindLabel } from "./forge-refs.js";
import type { ExternalRef } from "./forge-refs.js";
import { EMPTY_FLAGS, applyLabelFlags } from "./task-flags.js";
import type { TaskFlags } from "./task-flags.js";
import { TaskIntegrityError } from "./task.js";

export interface DesiredTaskState {
  ref: ExternalRef;
  title: string;
  category: TaskCategory | null;
  flags: TaskFlags;
  colorId: TaskColor;
  closedOrMerged: boolean;
}

export interface TaskCreationData extends DesiredTaskState {
  column: TaskColumn;
  swimlane: TaskSwimlane;
  description: string;
}

export interface PlacementOptions {
  contractorUsernames: readonly string[];
}

/** Columns a closed or merged item never pulls a task out of. */
const SETTLED_COLUMNS: readonly TaskColumn[] = ["Done", "On Hold"];

const isClosedOrMerged = (item: ForgeItem): boolean =>
  item.state === "closed" || item.state === "merged";

const stateMarker = (item: ForgeItem): string | null => {
  if (item.state === "merged") {
    return "(MERGED)";
  }
  if (item.state === "closed") {
    return "(CLOSED)";
  }
  return null;
};

const mergeRequestMarkers = (item: ForgeMergeRequest): string[] => {
  const markers: string[] = [];
  if (item.upvotes > 0) {
    markers.push("👍".repeat(item.upvotes));
  }
  if (item.downvotes > 0) {
    markers.push("👎".repeat(item.downvotes));
  }
  if (item.hasConflicts) {
    markers.push("⚠️");
  }
  return markers;
};

const labelMarkers = (labels: readonly string[]): string[] => {
  const markers: string[] = [];
  if (labels.includes(FORGE_LABELS.objectionWindow)) {
    markers.push("⏰");
  }
  if (labels.includes(FORGE_LABELS.needsAuthorAction)) {
    markers.push("🚧");
  }
  if (labels.some((label) => label.toLowerCase().includes("fast track"))) {
    markers.push("⏩");
  }
  return markers;
};

export const titleMarkers = (item: ForgeItem): string[] => {
  const markers: string[] = [];
  const state = stateMarker(item);
  if (state) {
    markers.push(state);
  }
  if (item.kind === "merge_request") {
    markers.push(...mergeRequestMarkers(item));
  }
  markers.push(...labelMarkers(item.labels));
  if (item.kind === "merge_request" && !item.discussionsResolved) {
    markers.push("💬");
  }
  return markers;
};

/** `MR !42: 👍 ⏰ Title`; each marker is followed by one space. */
export const formatTaskTitle = (item: ForgeItem): string => {
  const ref = forgeItemRef(item);
  const prefix = titleMarkers(item)
    .map((marker) => `${marker} `)
    .join("");
  return `${refKindLabel(ref)} ${formatShortRef(ref)}: ${prefix}${item.title.trim()}`;
};

export const categoryFromLabels = (
  ref: ExternalRef,
  labels: readonly string[],
): TaskCategory | null => {
  const contractor = labels.includes(FORGE_LABELS.contractorApproved);
  const outsideIpr = labels.includes(FORGE_LABELS.outsideIpr);
  if (contractor && outsideIpr) {
    throw new TaskIntegrityError(
      `${formatShortRef(ref)} is labeled both '${FORGE_LABELS.contractorApproved}' and '${FORGE_LABELS.outsideIpr}'`,
      null,
      [...labels],
    );
  }
  if (contractor) {
    return "Contractor";
  }
  return outsideIpr ? "Outside IPR Policy" : null;
};

export const colorForRef = (ref: ExternalRef): TaskColor =>
  ref.kind === "issue" ? "grey" : "blue";

export const computeDesiredState = (
  item: ForgeItem,
  currentFlags: TaskFlags = EMPTY_FLAGS,
): DesiredTaskState => {
  const ref = forgeItemRef(item);
  return {
    ref,
    title: formatTaskTitle(item),
    category: categoryFromLabels(ref, item.labels),
    flags: applyLabelFlags(currentFlags, item.labels),
    colorId: colorForRef(ref),
    closedOrMerged: isClosedOrMerged(item),
  };
};

/**
 * Who should own the task: the first active assignee, unless that is the
 * merge request's reviewer; otherwise a merge request falls back to its
 * active author. Issues without a usable assignee have no desired owner.
 */
export const desiredOwner = (item: ForgeItem): ForgeUser | null => {
  const assignee = item.assignees.find((user) => user.active);
  const reviewer =
    item.kind === "merge_request" && item.reviewers[0]?.active ? item.reviewers[0] : undefined;
  if (assignee && assignee.username !== reviewer?.username) {
    return assignee;
  }
  if (item.kind === "merge_request" && item.author.active) {
    return item.author;
  }
  return null;
};

/** The column a task should be in, or its current column when no move applies. */
export const desiredColumn = (
  current: TaskColumn,
  desired: DesiredTaskState,
): TaskColumn =>
  desired.closedOrMerged && !SETTLED_COLUMNS.includes(current) ? "Done" : current;

export const guessColumn = (item: ForgeItem): TaskColumn => {
  if (item.kind === "issue") {
    return "Backlog";
  }
  if (item.draft) {
    return "In Progress";
  }
  if (item.labels.includes(FORGE_LABELS.needsAuthorAction)) {
    return "Needs Revisions";
  }
  return "Awaiting Review";
};

export const guessSwimlane = (
  item: ForgeItem,
  options: PlacementOptions,
): TaskSwimlane => {
  if (
    item.labels.includes(FORGE_LABELS.contractorApproved) ||
    options.contractorUsernames.includes(item.author.username)
  ) {
    return "Contractor Work";
  }
  if (item.labels.includes(FORGE_LABELS.extension)) {
    return "Spec Review";
  }
  return "General Work";
};

export const computeCreationData = (
  item: ForgeItem,
  options: PlacementOptions,
): TaskCreationData => {
  const desired = computeDesiredState(item);
  return {
    ...desired,
    column: desired.closedOrMerged ? "Done" : guessColumn(item),
    swimlane: guessSwimlane(item, options),
    description: item.webUrl,
  };
};
