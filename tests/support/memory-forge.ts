import type {
  ForgeAdapter,
  ForgeIssue,
  ForgeItem,
  ForgeListQuery,
  ForgeMergeRequest,
} from "../../src/adapters.js";
import type { ExternalRef } from "../../src/forge-refs.js";
import { createForgeRefCodec } from "../../src/forge-refs.js";
import type { RecordedCall } from "./memory-kanban.js";

export const FORGE_URL = "https://gitlab.example.org";
export const FORGE_PROJECT = "group/spec";

export const codec = createForgeRefCodec({ webUrl: FORGE_URL, projectPath: FORGE_PROJECT });

export const issueUrl = (number: number): string =>
  `${FORGE_URL}/${FORGE_PROJECT}/-/issues/${number}`;

export const mergeRequestUrl = (number: number): string =>
  `${FORGE_URL}/${FORGE_PROJECT}/-/merge_requests/${number}`;

export const makeIssue = (number: number, overrides: Partial<ForgeIssue> = {}): ForgeIssue => ({
  kind: "issue",
  number,
  title: `Issue ${number} title`,
  description: "",
  state: "opened",
  labels: [],
  author: { name: "Author", username: "author", active: true },
  assignees: [],
  webUrl: issueUrl(number),
  createdAt: "2024-01-01T00:00:00.000Z",
  updatedAt: "2024-01-02T00:00:00.000Z",
  ...overrides,
});

export const makeMergeRequest = (
  number: number,
  overrides: Partial<ForgeMergeRequest> = {},
): ForgeMergeRequest => ({
  kind: "merge_request",
  number,
  title: `Change ${number}`,
  description: "",
  state: "opened",
  labels: [],
  author: { name: "Author", username: "author", active: true },
  assignees: [],
  webUrl: mergeRequestUrl(number),
  createdAt: "2024-01-01T00:00:00.000Z",
  updatedAt: "2024-01-02T00:00:00.000Z",
  draft: false,
  upvotes: 0,
  downvotes: 0,
  hasConflicts: false,
  discussionsResolved: true,
  targetBranch: "main",
  reviewers: [],
  ...overrides,
});

const matchesQuery = (item: ForgeItem, query: ForgeListQuery): boolean =>
  (query.state === "all" || item.state === query.state) &&
  query.labels.every((label) => item.labels.includes(label));

/** Forge project held in memory; list queries require every label, like GitLab. */
export class MemoryForge implements ForgeAdapter {
  readonly calls: RecordedCall[] = [];
  readonly issues = new Map<number, ForgeIssue>();
  readonly mergeRequests = new Map<number, ForgeMergeRequest>();
  readonly closedBy = new Map<number, number[]>();
  failWhen: (method: string, args: unknown[]) => boolean = () => false;

  addIssue(issue: ForgeIssue): ForgeIssue {
    this.issues.set(issue.number, issue);
    return issue;
  }

  addMergeRequest(mr: ForgeMergeRequest): ForgeMergeRequest {
    this.mergeRequests.set(mr.number, mr);
    return mr;
  }

  callsTo(method: string): RecordedCall[] {
    return this.calls.filter((call) => call.method === method);
  }

  async getIssue(number: number): Promise<ForgeIssue> {
    this.record("getIssue", number);
    const issue = this.issues.get(number);
    if (!issue) {
      throw new Error(`Issue ${number} not found`);
    }
    return issue;
  }

  async getMergeRequest(number: number): Promise<ForgeMergeRequest> {
    this.record("getMergeRequest", number);
    const mr = this.mergeRequests.get(number);
    if (!mr) {
      throw new Error(`Merge request ${number} not found`);
    }
    return mr;
  }

  async listIssues(query: ForgeListQuery): Promise<ForgeIssue[]> {
    this.record("listIssues", query);
    return [...this.issues.values()].filter((issue) => matchesQuery(issue, query));
  }

  async listMergeRequests(query: ForgeListQuery): Promise<ForgeMergeRequest[]> {
    this.record("listMergeRequests", query);
    return [...this.mergeRequests.values()].filter((mr) => matchesQuery(mr, query));
  }

  async listMergeRequestsClosingIssue(issueNumber: number): Promise<ForgeMergeRequest[]> {
    this.record("listMergeRequestsClosingIssue", issueNumber);
    return (this.closedBy.get(issueNumber) ?? []).flatMap((number) => {
      const mr = this.mergeRequests.get(number);
      return mr ? [mr] : [];
    });
  }

  async updateDescription(ref: ExternalRef, description: string): Promise<void> {
    this.record("updateDescription", ref, description);
  }

  async updateLabels(ref: ExternalRef, labels: string[]): Promise<void> {
    this.record("updateLabels", ref, labels);
  }

  async createNote(ref: ExternalRef, body: string): Promise<void> {
    this.record("createNote", ref, body);
  }

  private record(method: string, ...args: unknown[]): void {
    this.calls.push({ method, args });
    if (this.failWhen(method, args)) {
      throw new Error(`${method} rejected`);
    }
  }
}
