import type { ExternalRef } from "./forge-refs.js";

export type IsoTimestamp = string;

export interface KanbanProject {
  id: number;
  name: string;
}

/** A named board dimension: column, swimlane, category or tag. */
export interface KanbanDimensionEntry {
  id: number;
  name: string;
}

export interface KanbanLinkType {
  id: number;
  label: string;
  oppositeId: number;
}

export interface KanbanTaskRecord {
  id: number;
  projectId: number;
  title: string;
  description: string;
  columnId: number;
  swimlaneId: number;
  /** 0 when the task has no category. */
  categoryId: number;
  colorId: string;
  /** 0 when nobody owns the task. */
  ownerId: number;
  isActive: boolean;
  url: string;
}

export interface KanbanExternalLink {
  id: number;
  url: string;
  title: string;
  dependency: string;
}

export interface KanbanInternalLink {
  id: number;
  /** The task on the other end of the link. */
  taskId: number;
  label: string;
}

export interface KanbanTaskInput {
  projectId: number;
  title: string;
  description: string;
  columnId: number;
  swimlaneId: number;
  categoryId: number;
  colorId: string;
  tags: string[];
  reference?: string;
}

export interface KanbanTaskUpdate {
  title?: string;
  description?: string;
  categoryId?: number;
  colorId?: string;
  ownerId?: number;
  tags?: string[];
}

export interface KanbanTaskMove {
  projectId: number;
  taskId: number;
  columnId: number;
  swimlaneId: number;
  position: number;
}

export interface KanbanExternalLinkInput {
  url: string;
  title: string;
  dependency: string;
}

export interface KanbanUser {
  id: number;
  username: string;
  name: string;
}

export type KanbanActionParams = Record<string, string>;

export interface KanbanAutoAction {
  id: number;
  eventName: string;
  actionName: string;
  params: KanbanActionParams;
}

export interface KanbanAutoActionInput {
  eventName: string;
  actionName: string;
  params: KanbanActionParams;
}

export interface KanbanAdapter {
  getProjectByName(name: string): Promise<KanbanProject | null>;
  getColumns(projectId: number): Promise<KanbanDimensionEntry[]>;
  getSwimlanes(projectId: number): Promise<KanbanDimensionEntry[]>;
  getCategories(projectId: number): Promise<KanbanDimensionEntry[]>;
  getTags(projectId: number): Promise<KanbanDimensionEntry[]>;
  getLinkTypes(): Promise<KanbanLinkType[]>;
  getAllUsers(): Promise<KanbanUser[]>;
  getTask(taskId: number): Promise<KanbanTaskRecord | null>;
  getAllTasks(projectId: number, onlyOpen: boolean): Promise<KanbanTaskRecord[]>;
  getTaskTags(taskId: number): Promise<string[]>;
  getExternalLinks(taskId: number): Promise<KanbanExternalLink[]>;
  getInternalLinks(taskId: number): Promise<KanbanInternalLink[]>;
  createTask(input: KanbanTaskInput): Promise<number>;
  updateTask(taskId: number, update: KanbanTaskUpdate): Promise<void>;
  moveTaskPosition(move: KanbanTaskMove): Promise<void>;
  createExternalLink(taskId: number, input: KanbanExternalLinkInput): Promise<number>;
  createInternalLink(
    taskId: number,
    oppositeTaskId: number,
    linkTypeId: number,
  ): Promise<number>;
  createComment(taskId: number, userId: number, content: string): Promise<number>;
  getAutoActions(projectId: number): Promise<KanbanAutoAction[]>;
  createAutoAction(projectId: number, input: KanbanAutoActionInput): Promise<number>;
  removeAutoAction(actionId: number): Promise<void>;
}

export type ForgeItemState = "opened" | "closed" | "merged" | "locked";

export interface ForgeUser {
  name: string;
  username: string;
  /** False for blocked or deactivated accounts. */
  active: boolean;
}

interface ForgeItemBase {
  number: number;
  title: string;
  description: string;
  state: ForgeItemState;
  labels: string[];
  author: ForgeUser;
  assignees: ForgeUser[];
  webUrl: string;
  createdAt: IsoTimestamp;
  updatedAt: IsoTimestamp;
}

export interface ForgeIssue extends ForgeItemBase {
  kind: "issue";
}

export interface ForgeMergeRequest extends ForgeItemBase {
  kind: "merge_request";
  draft: boolean;
  upvotes: number;
  downvotes: number;
  hasConflicts: boolean;
  /** False while blocking discussion threads remain open. */
  discussionsResolved: boolean;
  targetBranch: string;
  reviewers: ForgeUser[];
}

export type ForgeItem = ForgeIssue | ForgeMergeRequest;

export interface ForgeListQuery {
  labels: string[];
  state: "opened" | "closed" | "all";
}

export interface ForgeAdapter {
  getIssue(number: number): Promise<ForgeIssue>;
  getMergeRequest(number: number): Promise<ForgeMergeRequest>;
  listIssues(query: ForgeListQuery): Promise<ForgeIssue[]>;
  listMergeRequests(query: ForgeListQuery): Promise<ForgeMergeRequest[]>;
  listMergeRequestsClosingIssue(issueNumber: number): Promise<ForgeMergeRequest[]>;
  updateDescription(ref: ExternalRef, description: string): Promise<void>;
  updateLabels(ref: ExternalRef, labels: string[]): Promise<void>;
  createNote(ref: ExternalRef, body: string): Promise<void>;
}

export const forgeItemRef = (item: ForgeItem): ExternalRef => ({
  kind: item.kind,
  number: item.number,
});

export const fetchForgeItem = (
  forge: ForgeAdapter,
  ref: ExternalRef,
): Promise<ForgeItem> =>
  ref.kind === "issue"
    ? forge.getIssue(ref.number)
    : forge.getMergeRequest(ref.number);
