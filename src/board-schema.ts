export const TASK_COLUMNS = [
  "Backlog",
  "On Hold",
  "In Progress",
  "Awaiting Review",
  "In Review",
  "Needs Revisions",
  "Done",
] as const;
export type TaskColumn = (typeof TASK_COLUMNS)[number];

export const TASK_SWIMLANES = [
  "General Work",
  "Contractor Work",
  "Spec Review",
] as const;
export type TaskSwimlane = (typeof TASK_SWIMLANES)[number];

export const TASK_CATEGORIES = [
  "Contractor",
  "Outside IPR Policy",
  "Not Contractor Work",
] as const;
export type TaskCategory = (typeof TASK_CATEGORIES)[number];

/** Categories set by hand on the board; reconciliation never clears them. */
export const STICKY_CATEGORIES: readonly TaskCategory[] = ["Not Contractor Work"];

/** Tag names interpreted as task flags, in canonical order. */
export const FLAG_TAGS = [
  "Initial Spec Review Complete",
  "API Frozen",
  "Blocked on Spec",
  "Reviewed by Contractor",
] as const;
export type FlagTag = (typeof FLAG_TAGS)[number];

export const TASK_COLORS = ["grey", "blue"] as const;
export type TaskColor = (typeof TASK_COLORS)[number];

export const LINK_RELATIONS = [
  "relates to",
  "blocks",
  "is blocked by",
  "duplicates",
  "is duplicated by",
  "is a parent of",
  "is a child of",
  "targets milestone",
  "is a milestone of",
  "fixes",
  "is fixed by",
] as const;
export type LinkRelation = (typeof LINK_RELATIONS)[number];

export const FORGE_LABELS = {
  contractorApproved: "Contractor:Approved",
  outsideIpr: "Outside IPR Framework",
  needsAuthorAction: "Needs Author Action",
  objectionWindow: "Objection Window",
  extension: "Extension",
  initialReviewComplete: "initial-review-complete",
  frozenNeedsImplementation: "status:FrozenNeedsImplOrCTS",
  shippedPublicly: "API Shipped Publicly",
} as const;

const isMember = <T extends string>(
  allowed: readonly T[],
  value: string,
): T | undefined => allowed.find((item) => item === value);

export const asTaskColumn = (value: string): TaskColumn | undefined =>
  isMember(TASK_COLUMNS, value);

export const asTaskSwimlane = (value: string): TaskSwimlane | undefined =>
  isMember(TASK_SWIMLANES, value);

export const asTaskCategory = (value: string): TaskCategory | undefined =>
  isMember(TASK_CATEGORIES, value);

export const asFlagTag = (value: string): FlagTag | undefined =>
  isMember(FLAG_TAGS, value);

export const asLinkRelation = (value: string): LinkRelation | undefined =>
  isMember(LINK_RELATIONS, value);
