import { readFile } from "node:fs/promises";
import path from "node:path";

export const DEFAULT_CONFIG_PATH = ".workboard.json";

export const KANBOARD_TOKEN_ENV = "KANBOARD_API_TOKEN";
export const GITLAB_TOKEN_ENV = "GITLAB_ACCESS_TOKEN";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";
export type LogFormat = "text" | "json";

export interface UpdateSwitches {
  title: boolean;
  category: boolean;
  tags: boolean;
  color: boolean;
  owner: boolean;
  column: boolean;
  createTask: boolean;
  internalLinks: boolean;
  forgeDescription: boolean;
  forgeLabels: boolean;
  forgeNotes: boolean;
}

export interface WorkboardConfig {
  version: number;
  kanboard: {
    url: string;
    username: string;
    token: string;
    projectName: string;
    taskBaseUrl: string;
    commentUserId: number | null;
  };
  gitlab: {
    url: string;
    token: string;
    projectPath: string;
  };
  paths: {
    rulesFile: string;
  };
  search: {
    issueLabels: string[];
    mergeRequestLabels: string[];
    contractorUsernames: string[];
    /** Forge accounts (merge bots) never made task owners. */
    botUsernames: string[];
    filteredRefs: string[];
  };
  sync: {
    dryRun: boolean;
    onlyOpen: boolean;
    batchSize: number;
    removeUnexpectedActions: boolean;
    update: UpdateSwitches;
    retry: {
      maxRetries: number;
      baseDelayMs: number;
    };
  };
  logging: {
    level: LogLevel;
    format: LogFormat;
  };
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

type PlainObject = Record<string, unknown>;

const DEFAULTS = {
  version: 1,
  kanboard: {
    username: "jsonrpc",
  },
  paths: {
    rulesFile: "workboard-rules.toml",
  },
  search: {
    issueLabels: ["Contractor:Approved", "CTS:conformance"],
    mergeRequestLabels: ["CTS:conformance"],
  },
  sync: {
    dryRun: false,
    onlyOpen: true,
    batchSize: 25,
    removeUnexpectedActions: false,
    retry: {
      maxRetries: 3,
      baseDelayMs: 500,
    },
  },
};

const DEFAULT_LOG_LEVEL: LogLevel = "info";
const DEFAULT_LOG_FORMAT: LogFormat = "text";

const UPDATE_SWITCHES: readonly (keyof UpdateSwitches)[] = [
  "title",
  "category",
  "tags",
  "color",
  "owner",
  "column",
  "createTask",
  "internalLinks",
  "forgeDescription",
  "forgeLabels",
  "forgeNotes",
];
const VALID_LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];
const VALID_LOG_FORMATS: readonly LogFormat[] = ["text", "json"];

export const isPlainObject = (value: unknown): value is PlainObject =>
  value !== null && typeof value === "object" && !Array.isArray(value);

export const requireObject = (value: unknown, label: string): PlainObject => {
  if (!isPlainObject(value)) {
    throw new ConfigError(`${label} must be an object`);
  }
  return value;
};

export const optionalObject = (value: unknown, label: string): PlainObject => {
  if (value === undefined) {
    return {};
  }
  if (!isPlainObject(value)) {
    throw new ConfigError(`${label} must be an object`);
  }
  return value;
};

export const requireNonEmptyString = (value: unknown, label: string): string => {
  if (typeof value !== "string" || value.trim() === "") {
    throw new ConfigError(`Missing required ${label}`);
  }
  return value;
};

export const optionalString = (
  value: unknown,
  label: string,
  fallback: string,
): string => {
  if (value === undefined) {
    return fallback;
  }
  if (typeof value !== "string") {
    throw new ConfigError(`${label} must be a string`);
  }
  return value;
};

export const optionalBoolean = (
  value: unknown,
  label: string,
  fallback: boolean,
): boolean => {
  if (value === undefined) {
    return fallback;
  }
  if (typeof value !== "boolean") {
    throw new ConfigError(`${label} must be a boolean`);
  }
  return value;
};

export const optionalInteger = (
  value: unknown,
  label: string,
  fallback: number,
  minValue: number,
): number => {
  if (value === undefined) {
    return fallback;
  }
  if (
    typeof value !== "number" ||
    !Number.isInteger(value) ||
    value < minValue
  ) {
    throw new ConfigError(
      `${label} must be an integer greater than or equal to ${minValue}`,
    );
  }
  return value;
};

export const optionalStringArray = (
  value: unknown,
  label: string,
  fallback: readonly string[],
): string[] => {
  if (value === undefined) {
    return [...fallback];
  }
  if (!Array.isArray(value) || value.some((item) => typeof item !== "string")) {
    throw new ConfigError(`${label} must be an array of strings`);
  }
  return value.map((item) => String(item));
};

export const requireEnum = <T extends string>(
  value: unknown,
  label: string,
  allowed: readonly T[],
): T => {
  if (typeof value !== "string") {
    throw new ConfigError(`${label} must be a string`);
  }
  const match = allowed.find((item) => item === value);
  if (match === undefined) {
    throw new ConfigError(
      `${label} must be one of: ${allowed.map((item) => `'${item}'`).join(", ")}`,
    );
  }
  return match;
};

export const optionalEnum = <T extends string>(
  value: unknown,
  label: string,
  fallback: T,
  allowed: readonly T[],
): T => (value === undefined ? fallback : requireEnum(value, label, allowed));

const resolveToken = (
  value: unknown,
  label: string,
  envName: string,
  env: NodeJS.ProcessEnv,
): string | null => {
  if (value !== undefined) {
    return requireNonEmptyString(value, label);
  }
  const fromEnv = env[envName];
  return fromEnv && fromEnv.trim() !== "" ? fromEnv : null;
};

const normalizeUpdateSwitches = (value: unknown): UpdateSwitches => {
  const input = optionalObject(value, "sync.update");
  const unknownKeys = Object.keys(input).filter(
    (key) => !UPDATE_SWITCHES.some((name) => name === key),
  );
  if (unknownKeys.length > 0) {
    throw new ConfigError(`Unknown sync.update switches: ${unknownKeys.join(", ")}`);
  }
  const read = (name: keyof UpdateSwitches): boolean =>
    optionalBoolean(input[name], `sync.update.${name}`, true);
  return {
    title: read("title"),
    category: read("category"),
    tags: read("tags"),
    color: read("color"),
    owner: read("owner"),
    column: read("column"),
    createTask: read("createTask"),
    internalLinks: read("internalLinks"),
    forgeDescription: read("forgeDescription"),
    forgeLabels: read("forgeLabels"),
    forgeNotes: read("forgeNotes"),
  };
};

export const normalizeConfig = (
  input: unknown,
  env: NodeJS.ProcessEnv = {},
): WorkboardConfig => {
  const root = requireObject(input, "Config");

  const version = optionalInteger(root.version, "version", DEFAULTS.version, 1);

  const kanboardInput = requireObject(root.kanboard, "kanboard");
  const gitlabInput = requireObject(root.gitlab, "gitlab");
  const kanboardToken = resolveToken(
    kanboardInput.token,
    "kanboard.token",
    KANBOARD_TOKEN_ENV,
    env,
  );
  const gitlabToken = resolveToken(
    gitlabInput.token,
    "gitlab.token",
    GITLAB_TOKEN_ENV,
    env,
  );
  const missingCredentials: string[] = [];
  if (kanboardToken === null) {
    missingCredentials.push(`kanboard.token (or ${KANBOARD_TOKEN_ENV})`);
  }
  if (gitlabToken === null) {
    missingCredentials.push(`gitlab.token (or ${GITLAB_TOKEN_ENV})`);
  }
  if (kanboardToken === null || gitlabToken === null) {
    throw new ConfigError(
      `Missing required credentials: ${missingCredentials.join(", ")}`,
    );
  }

  const commentUserId =
    kanboardInput.commentUserId === undefined
      ? null
      : optionalInteger(kanboardInput.commentUserId, "kanboard.commentUserId", 0, 1);

  const kanboard = {
    url: requireNonEmptyString(kanboardInput.url, "kanboard.url"),
    username: optionalString(
      kanboardInput.username,
      "kanboard.username",
      DEFAULTS.kanboard.username,
    ),
    token: kanboardToken,
    projectName: requireNonEmptyString(
      kanboardInput.projectName,
      "kanboard.projectName",
    ),
    taskBaseUrl: requireNonEmptyString(
      kanboardInput.taskBaseUrl,
      "kanboard.taskBaseUrl",
    ),
    commentUserId,
  };

  const gitlab = {
    url: requireNonEmptyString(gitlabInput.url, "gitlab.url"),
    token: gitlabToken,
    projectPath: requireNonEmptyString(gitlabInput.projectPath, "gitlab.projectPath"),
  };

  const pathsInput = optionalObject(root.paths, "paths");
  const paths = {
    rulesFile: optionalString(
      pathsInput.rulesFile,
      "paths.rulesFile",
      DEFAULTS.paths.rulesFile,
    ),
  };

  const searchInput = optionalObject(root.search, "search");
  const search = {
    issueLabels: optionalStringArray(
      searchInput.issueLabels,
      "search.issueLabels",
      DEFAULTS.search.issueLabels,
    ),
    mergeRequestLabels: optionalStringArray(
      searchInput.mergeRequestLabels,
      "search.mergeRequestLabels",
      DEFAULTS.search.mergeRequestLabels,
    ),
    contractorUsernames: optionalStringArray(
      searchInput.contractorUsernames,
      "search.contractorUsernames",
      [],
    ),
    botUsernames: optionalStringArray(
      searchInput.botUsernames,
      "search.botUsernames",
      [],
    ),
    filteredRefs: optionalStringArray(
      searchInput.filteredRefs,
      "search.filteredRefs",
      [],
    ),
  };

  const syncInput = optionalObject(root.sync, "sync");
  const retryInput = optionalObject(syncInput.retry, "sync.retry");
  const sync = {
    dryRun: optionalBoolean(syncInput.dryRun, "sync.dryRun", DEFAULTS.sync.dryRun),
    onlyOpen: optionalBoolean(
      syncInput.onlyOpen,
      "sync.onlyOpen",
      DEFAULTS.sync.onlyOpen,
    ),
    batchSize: optionalInteger(
      syncInput.batchSize,
      "sync.batchSize",
      DEFAULTS.sync.batchSize,
      1,
    ),
    removeUnexpectedActions: optionalBoolean(
      syncInput.removeUnexpectedActions,
      "sync.removeUnexpectedActions",
      DEFAULTS.sync.removeUnexpectedActions,
    ),
    update: normalizeUpdateSwitches(syncInput.update),
    retry: {
      maxRetries: optionalInteger(
        retryInput.maxRetries,
        "sync.retry.maxRetries",
        DEFAULTS.sync.retry.maxRetries,
        0,
      ),
      baseDelayMs: optionalInteger(
        retryInput.baseDelayMs,
        "sync.retry.baseDelayMs",
        DEFAULTS.sync.retry.baseDelayMs,
        0,
      ),
    },
  };

  const loggingInput = optionalObject(root.logging, "logging");
  const logging = {
    level: optionalEnum(
      loggingInput.level,
      "logging.level",
      DEFAULT_LOG_LEVEL,
      VALID_LOG_LEVELS,
    ),
    format: optionalEnum(
      loggingInput.format,
      "logging.format",
      DEFAULT_LOG_FORMAT,
      VALID_LOG_FORMATS,
    ),
  };

  return {
    version,
    kanboard,
    gitlab,
    paths,
    search,
    sync,
    logging,
  };
};

const resolveConfigPath = (configPath: string | undefined, cwd: string): string => {
  const targetPath = configPath ?? DEFAULT_CONFIG_PATH;
  return path.isAbsolute(targetPath) ? targetPath : path.resolve(cwd, targetPath);
};

export const loadWorkboardConfig = async (
  configPath?: string,
  options?: { cwd?: string; env?: NodeJS.ProcessEnv },
): Promise<WorkboardConfig> => {
  const cwd = options?.cwd ?? process.cwd();
  const resolvedPath = resolveConfigPath(configPath, cwd);
  let rawConfig: string;
  try {
    rawConfig = await readFile(resolvedPath, "utf8");
  } catch (error) {
    const message =
      error instanceof Error ? error.message : "Unknown file system error";
    throw new ConfigError(`Failed to read config at ${resolvedPath}: ${message}`);
  }

  let parsedConfig: unknown;
  try {
    parsedConfig = JSON.parse(rawConfig);
  } catch (error) {
    const message =
      error instanceof Error ? error.message : "Unknown JSON parse error";
    throw new ConfigError(`Invalid JSON in config at ${resolvedPath}: ${message}`);
  }

  return normalizeConfig(parsedConfig, options?.env ?? process.env);
};
