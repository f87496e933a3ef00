import type {
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
import { errorMessage } from "./batch.js";
import { fetchWithRetry } from "./http-retry.js";
import type { RetryConfig } from "./http-retry.js";

export interface KanboardAdapterConfig {
  /** JSON-RPC endpoint, e.g. `https://board.example.org/jsonrpc.php`. */
  url: string;
  username: string;
  token: string;
  retry?: Partial<RetryConfig>;
}

export class KanboardApiError extends Error {
  readonly status: number | null;
  readonly code: number | null;

  constructor(message: string, options: { status?: number; code?: number } = {}) {
    super(message);
    this.name = "KanboardApiError";
    this.status = options.status ?? null;
    this.code = options.code ?? null;
  }
}

type RpcId = string | number;
type RpcParams = Record<string, unknown> | unknown[];

interface RpcError {
  code: number;
  message: string;
}

interface RpcResponse {
  result: unknown;
  error: RpcError | null;
}

interface KanboardProject {
  id: RpcId;
  name: string;
}

interface KanboardColumn {
  id: RpcId;
  title: string;
}

interface KanboardNamed {
  id: RpcId;
  name: string;
}

interface KanboardLink {
  id: RpcId;
  label: string;
  opposite_id: RpcId;
}

interface KanboardTask {
  id: RpcId;
  project_id: RpcId;
  title: string;
  description: string | null;
  column_id: RpcId;
  swimlane_id: RpcId;
  category_id: RpcId | null;
  color_id: string;
  owner_id?: RpcId | null;
  is_active: RpcId;
  url?: string;
}

interface KanboardUser {
  id: RpcId;
  username: string;
  name: string | null;
}

interface KanboardExternalLink {
  id: RpcId;
  url: string;
  title: string;
  dependency: string;
}

interface KanboardTaskLink {
  id: RpcId;
  task_id: RpcId;
  label: string;
}

interface KanboardAction {
  id: RpcId;
  event_name: string;
  action_name: string;
  params: Record<string, RpcId | null> | unknown[];
}

const DEFAULT_RETRY: RetryConfig = {
  maxRetries: 3,
  baseDelayMs: 500,
};

const toId = (value: RpcId | null | undefined): number => {
  const id = Number(value ?? 0);
  return Number.isFinite(id) ? id : 0;
};

const mapNamed = (entry: KanboardNamed): KanbanDimensionEntry => ({
  id: toId(entry.id),
  name: entry.name,
});

const mapTask = (task: KanboardTask): KanbanTaskRecord => ({
  id: toId(task.id),
  projectId: toId(task.project_id),
  title: task.title,
  description: task.description ?? "",
  columnId: toId(task.column_id),
  swimlaneId: toId(task.swimlane_id),
  categoryId: toId(task.category_id),
  colorId: task.color_id,
  ownerId: toId(task.owner_id),
  isActive: toId(task.is_active) === 1,
  url: task.url ?? "",
});

const mapActionParams = (params: KanboardAction["params"]): KanbanActionParams => {
  const mapped: KanbanActionParams = {};
  if (Array.isArray(params)) {
    return mapped;
  }
  Object.entries(params).forEach(([key, value]) => {
    if (value !== null) {
      mapped[key] = String(value);
    }
  });
  return mapped;
};

const mapAction = (action: KanboardAction): KanbanAutoAction => ({
  id: toId(action.id),
  eventName: action.event_name,
  actionName: action.action_name,
  params: mapActionParams(action.params),
});

const isReadMethod = (method: string): boolean => method.startsWith("get");

const readRpcError = (value: unknown): RpcError | null => {
  if (typeof value !== "object" || value === null) {
    return null;
  }
  return {
    code: "code" in value && typeof value.code === "number" ? value.code : -1,
    message:
      "message" in value && typeof value.message === "string"
        ? value.message
        : "Unknown error",
  };
};

const readRpcResponse = (method: string, value: unknown): RpcResponse => {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    throw new KanboardApiError(`Kanboard ${method} returned a malformed response`);
  }
  return {
    result: "result" in value ? value.result : undefined,
    error: "error" in value ? readRpcError(value.error) : null,
  };
};

export class KanboardAdapter implements KanbanAdapter {
  private readonly url: string;
  private readonly authorization: string;
  private readonly retry: RetryConfig;
  private nextId = 1;

  constructor(config: KanboardAdapterConfig) {
    this.url = config.url;
    this.authorization = `Basic ${Buffer.from(
      `${config.username}:${config.token}`,
    ).toString("base64")}`;
    this.retry = {
      maxRetries: config.retry?.maxRetries ?? DEFAULT_RETRY.maxRetries,
      baseDelayMs: config.retry?.baseDelayMs ?? DEFAULT_RETRY.baseDelayMs,
    };
  }

  async getProjectByName(name: string): Promise<KanbanProject | null> {
    const project = await this.call<KanboardProject | false | null>(
      "getProjectByName",
      { name },
    );
    return project ? { id: toId(project.id), name: project.name } : null;
  }

  async getColumns(projectId: number): Promise<KanbanDimensionEntry[]> {
    const columns = await this.call<KanboardColumn[]>("getColumns", [projectId]);
    return columns.map((column) => ({ id: toId(column.id), name: column.title }));
  }

  async getSwimlanes(projectId: number): Promise<KanbanDimensionEntry[]> {
    const swimlanes = await this.call<KanboardNamed[]>("getAllSwimlanes", [projectId]);
    return swimlanes.map(mapNamed);
  }

  async getCategories(projectId: number): Promise<KanbanDimensionEntry[]> {
    const categories = await this.call<KanboardNamed[]>("getAllCategories", [projectId]);
    return categories.map(mapNamed);
  }

  async getTags(projectId: number): Promise<KanbanDimensionEntry[]> {
    const tags = await this.call<KanboardNamed[]>("getTagsByProject", [projectId]);
    return tags.map(mapNamed);
  }

  async getLinkTypes(): Promise<KanbanLinkType[]> {
    const links = await this.call<KanboardLink[]>("getAllLinks");
    return links.map((link) => ({
      id: toId(link.id),
      label: link.label,
      oppositeId: toId(link.opposite_id),
    }));
  }

  async getAllUsers(): Promise<KanbanUser[]> {
    const users = await this.call<KanboardUser[]>("getAllUsers");
    return users.map((user) => ({
      id: toId(user.id),
      username: user.username,
      name: user.name ?? "",
    }));
  }

  async getTask(taskId: number): Promise<KanbanTaskRecord | null> {
    const task = await this.call<KanboardTask | null | false>("getTask", {
      task_id: taskId,
    });
    return task ? mapTask(task) : null;
  }

  async getAllTasks(projectId: number, onlyOpen: boolean): Promise<KanbanTaskRecord[]> {
    const statuses = onlyOpen ? [1] : [1, 0];
    const batches = await Promise.all(
      statuses.map((statusId) =>
        this.call<KanboardTask[]>("getAllTasks", {
          project_id: projectId,
          status_id: statusId,
        }),
      ),
    );
    return batches.flat().map(mapTask);
  }

  async getTaskTags(taskId: number): Promise<string[]> {
    // An empty tag set comes back as [] rather than {}.
    const tags = await this.call<Record<string, string> | unknown[]>("getTaskTags", {
      task_id: taskId,
    });
    if (Array.isArray(tags)) {
      return [];
    }
    return Object.values(tags).filter((tag) => typeof tag === "string");
  }

  async getExternalLinks(taskId: number): Promise<KanbanExternalLink[]> {
    const links = await this.call<KanboardExternalLink[] | false>(
      "getAllExternalTaskLinks",
      { task_id: taskId },
    );
    return (links || []).map((link) => ({
      id: toId(link.id),
      url: link.url,
      title: link.title,
      dependency: link.dependency,
    }));
  }

  async getInternalLinks(taskId: number): Promise<KanbanInternalLink[]> {
    const links = await this.call<KanboardTaskLink[] | false>("getAllTaskLinks", {
      task_id: taskId,
    });
    return (links || []).map((link) => ({
      id: toId(link.id),
      taskId: toId(link.task_id),
      label: link.label,
    }));
  }

  async createTask(input: KanbanTaskInput): Promise<number> {
    const params: Record<string, unknown> = {
      project_id: input.projectId,
      title: input.title,
      description: input.description,
      column_id: input.columnId,
      swimlane_id: input.swimlaneId,
      category_id: input.categoryId,
      color_id: input.colorId,
      tags: input.tags,
    };
    if (input.reference !== undefined) {
      params.reference = input.reference;
    }
    return this.requireId("createTask", params);
  }

  async updateTask(taskId: number, update: KanbanTaskUpdate): Promise<void> {
    const params: Record<string, unknown> = { id: taskId };
    if (update.title !== undefined) {
      params.title = update.title;
    }
    if (update.description !== undefined) {
      params.description = update.description;
    }
    if (update.categoryId !== undefined) {
      params.category_id = update.categoryId;
    }
    if (update.colorId !== undefined) {
      params.color_id = update.colorId;
    }
    if (update.ownerId !== undefined) {
      params.owner_id = update.ownerId;
    }
    if (update.tags !== undefined) {
      params.tags = update.tags;
    }
    await this.requireSuccess("updateTask", params);
  }

  async moveTaskPosition(move: KanbanTaskMove): Promise<void> {
    await this.requireSuccess("moveTaskPosition", {
      project_id: move.projectId,
      task_id: move.taskId,
      column_id: move.columnId,
      position: move.position,
      swimlane_id: move.swimlaneId,
    });
  }

  async createExternalLink(
    taskId: number,
    input: KanbanExternalLinkInput,
  ): Promise<number> {
    return this.requireId("createExternalTaskLink", {
      task_id: taskId,
      url: input.url,
      dependency: input.dependency,
      type: "weblink",
      title: input.title,
    });
  }

  async createInternalLink(
    taskId: number,
    oppositeTaskId: number,
    linkTypeId: number,
  ): Promise<number> {
    return this.requireId("createTaskLink", {
      task_id: taskId,
      opposite_task_id: oppositeTaskId,
      link_id: linkTypeId,
    });
  }

  async createComment(taskId: number, userId: number, content: string): Promise<number> {
    return this.requireId("createComment", {
      task_id: taskId,
      user_id: userId,
      content,
    });
  }

  async getAutoActions(projectId: number): Promise<KanbanAutoAction[]> {
    const actions = await this.call<KanboardAction[]>("getActions", [projectId]);
    return actions.map(mapAction);
  }

  async createAutoAction(
    projectId: number,
    input: KanbanAutoActionInput,
  ): Promise<number> {
    return this.requireId("createAction", {
      project_id: projectId,
      event_name: input.eventName,
      action_name: input.actionName,
      params: input.params,
    });
  }

  async removeAutoAction(actionId: number): Promise<void> {
    await this.requireSuccess("removeAction", { action_id: actionId });
  }

  private async requireId(method: string, params: RpcParams): Promise<number> {
    const result = await this.call<RpcId | false | null>(method, params);
    const id = result === false || result === null ? 0 : toId(result);
    if (id <= 0) {
      throw new KanboardApiError(`Kanboard ${method} failed`);
    }
    return id;
  }

  private async requireSuccess(method: string, params: RpcParams): Promise<void> {
    const result = await this.call<boolean | null>(method, params);
    if (result !== true) {
      throw new KanboardApiError(`Kanboard ${method} failed`);
    }
  }

  /** Read methods are retried on transient failures; writes never are. */
  private async call<T>(method: string, params?: RpcParams): Promise<T> {
    const id = this.nextId;
    this.nextId += 1;
    const body = JSON.stringify({
      jsonrpc: "2.0",
      method,
      id,
      ...(params === undefined ? {} : { params }),
    });
    const response = await fetchWithRetry(
      () =>
        fetch(this.url, {
          method: "POST",
          headers: {
            Authorization: this.authorization,
            "Content-Type": "application/json",
          },
          body,
        }),
      {
        retry: {
          ...this.retry,
          maxRetries: isReadMethod(method) ? this.retry.maxRetries : 0,
        },
        httpError: (failed, retries) => {
          const status = failed.status;
          if (status === 401 || status === 403) {
            return new KanboardApiError("Kanboard rejected the API credentials", { status });
          }
          const suffix =
            retries > 0 ? ` after ${retries} ${retries === 1 ? "retry" : "retries"}` : "";
          return new KanboardApiError(`Kanboard ${method} failed with HTTP ${status}${suffix}`, {
            status,
          });
        },
        requestError: (error) =>
          new KanboardApiError(`Kanboard ${method} request failed: ${errorMessage(error)}`),
      },
    );

    let value: unknown;
    try {
      value = await response.json();
    } catch (error) {
      throw new KanboardApiError(`Kanboard ${method} returned invalid JSON: ${errorMessage(error)}`);
    }
    const payload = readRpcResponse(method, value);
    if (payload.error) {
      throw new KanboardApiError(
        `Kanboard ${method} error ${payload.error.code}: ${payload.error.message}`,
        { code: payload.error.code },
      );
    }
    return payload.result as T;
  }
}
