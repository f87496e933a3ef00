import type {
  ForgeAdapter,
  ForgeIssue,
  ForgeItemState,
  ForgeListQuery,
  ForgeMergeRequest,
  ForgeUser,
} from "./adapters.js";
import type { ExternalRef } from "./forge-refs.js";
import { errorMessage } from "./batch.js";
import { fetchWithRetry } from "./http-retry.js";
import type { RetryConfig } from "./http-retry.js";

export interface GitLabAdapterConfig {
  /** Web root of the instance, e.g. `https://gitlab.example.org`. */
  url: string;
  token: string;
  projectPath: string;
  retry?: Partial<RetryConfig>;
  perPage?: number;
}

export class GitLabApiError extends Error {
  readonly status: number | null;

  constructor(message: string, status: number | null = null) {
    super(message);
    this.name = "GitLabApiError";
    this.status = status;
  }
}

type QueryValue = string | number | boolean | undefined;

interface GitLabUser {
  name: string;
  username: string;
  state?: string;
}

interface GitLabIssue {
  iid: number;
  title: string;
  description: string | null;
  state: string;
  labels: string[];
  author: GitLabUser | null;
  assignees?: GitLabUser[];
  web_url: string;
  created_at: string;
  updated_at: string;
}

interface GitLabMergeRequest extends GitLabIssue {
  draft?: boolean;
  work_in_progress?: boolean;
  upvotes: number;
  downvotes: number;
  has_conflicts: boolean;
  blocking_discussions_resolved: boolean;
  target_branch: string;
  reviewers?: GitLabUser[];
}

interface PageResult<T> {
  items: T;
  nextPage: string | null;
}

const DEFAULT_RETRY: RetryConfig = {
  maxRetries: 3,
  baseDelayMs: 500,
};
const DEFAULT_PER_PAGE = 100;

const ITEM_STATES: readonly ForgeItemState[] = ["opened", "closed", "merged", "locked"];

const mapState = (state: string): ForgeItemState =>
  ITEM_STATES.find((candidate) => candidate === state) ?? "opened";

const mapUser = (user: GitLabUser | null): ForgeUser => ({
  name: user?.name ?? "",
  username: user?.username ?? "",
  active: user !== null && (user.state ?? "active") === "active",
});

const mapIssue = (issue: GitLabIssue): ForgeIssue => ({
  kind: "issue",
  number: issue.iid,
  title: issue.title,
  description: issue.description ?? "",
  state: mapState(issue.state),
  labels: issue.labels ?? [],
  author: mapUser(issue.author),
  assignees: (issue.assignees ?? []).map(mapUser),
  webUrl: issue.web_url,
  createdAt: issue.created_at,
  updatedAt: issue.updated_at,
});

const mapMergeRequest = (mr: GitLabMergeRequest): ForgeMergeRequest => ({
  kind: "merge_request",
  number: mr.iid,
  title: mr.title,
  description: mr.description ?? "",
  state: mapState(mr.state),
  labels: mr.labels ?? [],
  author: mapUser(mr.author),
  assignees: (mr.assignees ?? []).map(mapUser),
  webUrl: mr.web_url,
  createdAt: mr.created_at,
  updatedAt: mr.updated_at,
  draft: mr.draft ?? mr.work_in_progress ?? false,
  upvotes: mr.upvotes ?? 0,
  downvotes: mr.downvotes ?? 0,
  hasConflicts: mr.has_conflicts ?? false,
  discussionsResolved: mr.blocking_discussions_resolved ?? true,
  targetBranch: mr.target_branch,
  reviewers: (mr.reviewers ?? []).map(mapUser),
});

const itemPath = (ref: ExternalRef): string =>
  `${ref.kind === "issue" ? "issues" : "merge_requests"}/${ref.number}`;

const buildSearchParams = (params: Record<string, QueryValue>): URLSearchParams => {
  const search = new URLSearchParams();
  Object.entries(params).forEach(([key, value]) => {
    if (value !== undefined) {
      search.set(key, String(value));
    }
  });
  return search;
};

export class GitLabAdapter implements ForgeAdapter {
  private readonly apiRoot: string;
  private readonly projectId: string;
  private readonly token: string;
  private readonly retry: RetryConfig;
  private readonly perPage: number;

  constructor(config: GitLabAdapterConfig) {
    this.apiRoot = `${config.url.replace(/\/+$/, "")}/api/v4`;
    this.projectId = encodeURIComponent(config.projectPath.replace(/^\/+|\/+$/g, ""));
    this.token = config.token;
    this.retry = {
      maxRetries: config.retry?.maxRetries ?? DEFAULT_RETRY.maxRetries,
      baseDelayMs: config.retry?.baseDelayMs ?? DEFAULT_RETRY.baseDelayMs,
    };
    this.perPage = config.perPage ?? DEFAULT_PER_PAGE;
  }

  async getIssue(number: number): Promise<ForgeIssue> {
    const { items } = await this.request<GitLabIssue>(`issues/${number}`);
    return mapIssue(items);
  }

  async getMergeRequest(number: number): Promise<ForgeMergeRequest> {
    const { items } = await this.request<GitLabMergeRequest>(`merge_requests/${number}`);
    return mapMergeRequest(items);
  }

  async listIssues(query: ForgeListQuery): Promise<ForgeIssue[]> {
    const issues = await this.listAll<GitLabIssue>("issues", query);
    return issues.map(mapIssue);
  }

  async listMergeRequests(query: ForgeListQuery): Promise<ForgeMergeRequest[]> {
    const mergeRequests = await this.listAll<GitLabMergeRequest>("merge_requests", query);
    return mergeRequests.map(mapMergeRequest);
  }

  async listMergeRequestsClosingIssue(issueNumber: number): Promise<ForgeMergeRequest[]> {
    const { items } = await this.request<GitLabMergeRequest[]>(
      `issues/${issueNumber}/closed_by`,
    );
    return items.map(mapMergeRequest);
  }

  async updateDescription(ref: ExternalRef, description: string): Promise<void> {
    await this.request<unknown>(itemPath(ref), {
      method: "PUT",
      body: { description },
    });
  }

  async updateLabels(ref: ExternalRef, labels: string[]): Promise<void> {
    await this.request<unknown>(itemPath(ref), {
      method: "PUT",
      body: { labels: labels.join(",") },
    });
  }

  async createNote(ref: ExternalRef, body: string): Promise<void> {
    await this.request<unknown>(`${itemPath(ref)}/notes`, {
      method: "POST",
      body: { body },
    });
  }

  private async listAll<T>(collection: string, query: ForgeListQuery): Promise<T[]> {
    const results: T[] = [];
    let page: string | null = "1";
    while (page !== null) {
      const response: PageResult<T[]> = await this.request<T[]>(collection, {
        params: {
          labels: query.labels.length > 0 ? query.labels.join(",") : undefined,
          state: query.state,
          per_page: this.perPage,
          page,
        },
      });
      results.push(...response.items);
      page = response.nextPage;
    }
    return results;
  }

  /** GET requests are retried on transient failures; writes never are. */
  private async request<T>(
    path: string,
    options?: {
      method?: "GET" | "PUT" | "POST";
      params?: Record<string, QueryValue>;
      body?: Record<string, unknown>;
    },
  ): Promise<PageResult<T>> {
    const method = options?.method ?? "GET";
    const url = new URL(`${this.apiRoot}/projects/${this.projectId}/${path}`);
    if (options?.params) {
      url.search = buildSearchParams(options.params).toString();
    }
    const headers: Record<string, string> = { "PRIVATE-TOKEN": this.token };
    let body: string | undefined;
    if (options?.body) {
      headers["Content-Type"] = "application/json";
      body = JSON.stringify(options.body);
    }
    const response = await fetchWithRetry(
      () => fetch(url.toString(), { method, headers, body }),
      {
        retry: { ...this.retry, maxRetries: method === "GET" ? this.retry.maxRetries : 0 },
        httpError: async (failed) => {
          const status = failed.status;
          if (status === 401 || status === 403) {
            return new GitLabApiError("GitLab rejected the access token", status);
          }
          let detail = "";
          try {
            detail = (await failed.text()).trim();
          } catch {
            detail = "";
          }
          return new GitLabApiError(
            detail
              ? `GitLab API error (${status}) for ${method} ${path}: ${detail}`
              : `GitLab API error (${status}) for ${method} ${path}`,
            status,
          );
        },
        requestError: (error) =>
          new GitLabApiError(`GitLab request failed for ${method} ${path}: ${errorMessage(error)}`),
      },
    );

    const nextPage = response.headers.get("x-next-page");
    let items: unknown;
    try {
      items = await response.json();
    } catch (error) {
      throw new GitLabApiError(
        `GitLab returned invalid JSON for ${method} ${path}: ${errorMessage(error)}`,
        response.status,
      );
    }
    return {
      items: items as T,
      nextPage: nextPage && nextPage.trim() !== "" ? nextPage.trim() : null,
    };
  }
}
