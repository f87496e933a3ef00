#!/usr/bin/env node
import path from "node:path";
import { fileURLToPath } from "node:url";

import { AutoActionSynchronizer } from "./auto-actions.js";
import { BoardSync } from "./board-sync.js";
import type { BoardSyncReport } from "./board-sync.js";
import { ConfigError, DEFAULT_CONFIG_PATH, loadWorkboardConfig } from "./config.js";
import type { WorkboardConfig } from "./config.js";
import { createForgeRefCodec } from "./forge-refs.js";
import { GitLabAdapter } from "./gitlab-adapter.js";
import { KanboardAdapter } from "./kanboard-adapter.js";
import { createLogger } from "./logger.js";
import type { Logger } from "./logger.js";
import { optionsFromSwitches } from "./reconcile-engine.js";
import { loadRules } from "./rules-config.js";
import { formatAutoActionReport, formatSyncReport } from "./run-report-output.js";
import { SchemaError, SchemaIndex } from "./schema-index.js";

type Command = "sync" | "auto-actions";

interface CommandOptions {
  configPath?: string;
  dryRun?: boolean;
  projectName?: string;
  removeUnexpected?: boolean;
}

interface ParseResult {
  command?: Command;
  options?: CommandOptions;
  error?: string;
  showHelp?: boolean;
}

const USAGE = [
  "Usage:",
  "  workboard sync [--config <path>] [--dry-run] [--project <name>]",
  "  workboard auto-actions [--config <path>] [--dry-run] [--remove-unexpected]",
  "",
  "Options:",
  "  --config              Path to configuration file (default: .workboard.json)",
  "  --dry-run             Report what would change without changing anything",
  "  --project             Board project name, overriding kanboard.projectName",
  "  --remove-unexpected   Remove automatic actions not described by the rules file",
];

const parseOptionValue = (
  arg: string,
  argv: string[],
  index: number,
): { value?: string; nextIndex: number; error?: string } => {
  const equalsIndex = arg.indexOf("=");
  if (equalsIndex !== -1) {
    const value = arg.slice(equalsIndex + 1);
    if (!value) {
      return {
        nextIndex: index,
        error: `Missing value for ${arg.slice(0, equalsIndex)}`,
      };
    }
    return { value, nextIndex: index };
  }
  const value = argv[index + 1];
  if (!value) {
    return { nextIndex: index, error: `Missing value for ${arg}` };
  }
  return { value, nextIndex: index + 1 };
};

const matchesOption = (arg: string, name: string): boolean =>
  arg === name || arg.startsWith(`${name}=`);

export const parseArgs = (argv: string[]): ParseResult => {
  if (argv.length === 0) {
    return { error: "Missing command." };
  }

  const name = argv[0];
  const command: Command | undefined =
    name === "sync" || name === "auto-actions" ? name : undefined;
  if (command === undefined) {
    return { error: `Unknown command '${name}'.` };
  }

  const options: CommandOptions = {};

  for (let i = 1; i < argv.length; i += 1) {
    const arg = argv[i];
    if (arg === "--help" || arg === "-h") {
      return { command, options, showHelp: true };
    }
    if (arg === "--dry-run") {
      options.dryRun = true;
      continue;
    }
    if (matchesOption(arg, "--config")) {
      const parsed = parseOptionValue(arg, argv, i);
      if (parsed.error) {
        return { error: parsed.error };
      }
      options.configPath = parsed.value;
      i = parsed.nextIndex;
      continue;
    }
    if (command === "sync" && matchesOption(arg, "--project")) {
      const parsed = parseOptionValue(arg, argv, i);
      if (parsed.error) {
        return { error: parsed.error };
      }
      options.projectName = parsed.value;
      i = parsed.nextIndex;
      continue;
    }
    if (command === "auto-actions" && arg === "--remove-unexpected") {
      options.removeUnexpected = true;
      continue;
    }
    return { error: `Unknown option '${arg}'.` };
  }

  return { command, options };
};

const printUsage = (): void => {
  process.stderr.write(`${USAGE.join("\n")}\n`);
};

const resolveCliPath = (value: string): string =>
  path.isAbsolute(value) ? value : path.resolve(process.cwd(), value);

const resolveFromBase = (value: string, baseDir: string): string =>
  path.isAbsolute(value) ? value : path.resolve(baseDir, value);

const loadContext = async (
  options: CommandOptions,
): Promise<{ config: WorkboardConfig; configDir: string; logger: Logger }> => {
  const configPath = resolveCliPath(options.configPath ?? DEFAULT_CONFIG_PATH);
  const config = await loadWorkboardConfig(configPath);
  const logger = createLogger({
    level: config.logging.level,
    format: config.logging.format,
  });
  return { config, configDir: path.dirname(configPath), logger };
};

const createKanboard = (config: WorkboardConfig): KanboardAdapter =>
  new KanboardAdapter({
    url: config.kanboard.url,
    username: config.kanboard.username,
    token: config.kanboard.token,
    retry: config.sync.retry,
  });

const countFailures = (report: BoardSyncReport): number =>
  report.loadFailures.length +
  report.fetchFailures.length +
  report.reconcile.failures.length +
  report.creationFailures.length +
  report.linkFailures.length +
  report.forge.filter((result) => result.outcome === "failed").length;

const runSyncCommand = async (options: CommandOptions): Promise<void> => {
  const { config, logger } = await loadContext(options);
  const dryRun = options.dryRun ?? config.sync.dryRun;

  const boardSync = new BoardSync({
    kanban: createKanboard(config),
    forge: new GitLabAdapter({
      url: config.gitlab.url,
      token: config.gitlab.token,
      projectPath: config.gitlab.projectPath,
      retry: config.sync.retry,
    }),
    codec: createForgeRefCodec({
      webUrl: config.gitlab.url,
      projectPath: config.gitlab.projectPath,
    }),
    projectName: options.projectName ?? config.kanboard.projectName,
    taskBaseUrl: config.kanboard.taskBaseUrl,
    options: optionsFromSwitches(config.sync.update, dryRun),
    placement: { contractorUsernames: config.search.contractorUsernames },
    search: {
      issueLabels: config.search.issueLabels,
      mergeRequestLabels: config.search.mergeRequestLabels,
      filteredRefs: config.search.filteredRefs,
    },
    onlyOpen: config.sync.onlyOpen,
    batchSize: config.sync.batchSize,
    commentUserId: config.kanboard.commentUserId,
    botUsernames: config.search.botUsernames,
    logger,
  });

  const report = await boardSync.run();
  if (config.logging.format === "json") {
    const loadFailures = report.loadFailures.map((failure) => ({
      taskId: failure.taskId,
      error: failure.error.message,
      details: failure.error.details,
    }));
    process.stdout.write(
      `${JSON.stringify({ dryRun, report: { ...report, loadFailures } }, null, 2)}\n`,
    );
  } else {
    process.stdout.write(formatSyncReport(report));
  }
  if (countFailures(report) > 0) {
    process.exitCode = 1;
  }
};

const runAutoActionsCommand = async (options: CommandOptions): Promise<void> => {
  const { config, configDir, logger } = await loadContext(options);
  const dryRun = options.dryRun ?? config.sync.dryRun;
  const kanban = createKanboard(config);

  const rules = await loadRules(resolveFromBase(config.paths.rulesFile, configDir));
  const project = await kanban.getProjectByName(config.kanboard.projectName);
  if (project === null) {
    throw new SchemaError(
      "project",
      `Board project '${config.kanboard.projectName}' does not exist`,
    );
  }
  const schema = new SchemaIndex({ kanban, projectId: project.id, logger });
  await schema.fetchAllDimensions();
  schema.requireAll();

  const synchronizer = new AutoActionSynchronizer({ kanban, schema, logger });
  const result = await synchronizer.sync(rules, {
    removeUnexpected: options.removeUnexpected ?? config.sync.removeUnexpectedActions,
    dryRun,
  });

  if (config.logging.format === "json") {
    process.stdout.write(`${JSON.stringify({ dryRun, result }, null, 2)}\n`);
  } else {
    process.stdout.write(formatAutoActionReport(result));
  }
  if (result.failures.length > 0) {
    process.exitCode = 1;
  }
};

const isDirectRun = (): boolean => {
  if (!process.argv[1]) {
    return false;
  }
  const currentPath = fileURLToPath(import.meta.url);
  return path.resolve(process.argv[1]) === currentPath;
};

const handleError = (error: unknown): void => {
  if (error instanceof ConfigError || error instanceof SchemaError) {
    process.stderr.write(`${error.name}: ${error.message}\n`);
    process.exitCode = 1;
    return;
  }
  if (error instanceof Error) {
    process.stderr.write(`${error.message}\n`);
    process.exitCode = 1;
    return;
  }
  process.stderr.write("Unknown error\n");
  process.exitCode = 1;
};

export const runCli = async (argv = process.argv.slice(2)): Promise<void> => {
  const parsed = parseArgs(argv);
  if (parsed.error) {
    process.stderr.write(`${parsed.error}\n`);
    printUsage();
    process.exitCode = 1;
    return;
  }
  if (parsed.showHelp) {
    printUsage();
    return;
  }
  try {
    if (parsed.command === "sync") {
      await runSyncCommand(parsed.options ?? {});
      return;
    }
    if (parsed.command === "auto-actions") {
      await runAutoActionsCommand(parsed.options ?? {});
      return;
    }
    process.stderr.write("Missing command.\n");
    printUsage();
    process.exitCode = 1;
  } catch (error) {
    handleError(error);
  }
};

if (isDirectRun()) {
  runCli().catch(handleError);
}
