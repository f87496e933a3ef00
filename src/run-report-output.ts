import type { AutoActionSyncResult } from "./auto-actions.js";
import { describeRule } from "./auto-actions.js";
import type { BoardSyncReport } from "./board-sync.js";
import { formatShortRef } from "./forge-refs.js";
import type { FieldOutcome, TaskReconcileResult } from "./reconcile-engine.js";

export interface SyncReportOutputOptions {
  includeSkipped?: boolean;
}

const singleLine = (value: string): string => value.replace(/\s+/g, " ").trim();

const quote = (value: string): string => `"${singleLine(value)}"`;

const describeOutcome = (outcome: FieldOutcome): string | null => {
  switch (outcome.status) {
    case "unchanged":
      return null;
    case "updated":
      return `${outcome.field}: ${quote(outcome.from)} -> ${quote(outcome.to)}`;
    case "skipped":
      return `${outcome.field} (skipped): ${quote(outcome.from)} -> ${quote(outcome.to)}`;
    case "failed":
      return `${outcome.field} (failed): ${quote(outcome.to)}: ${outcome.error}`;
  }
};

const describeResult = (
  result: TaskReconcileResult,
  includeSkipped: boolean,
): string | null => {
  const parts = result.outcomes
    .filter((outcome) => includeSkipped || outcome.status !== "skipped")
    .map(describeOutcome)
    .filter((part): part is string => part !== null);
  if (parts.length === 0) {
    return null;
  }
  return `[${result.taskId} ${formatShortRef(result.ref)}] ${parts.join("; ")}`;
};

export const formatSyncReport = (
  report: BoardSyncReport,
  options: SyncReportOutputOptions = {},
): string => {
  const includeSkipped = options.includeSkipped ?? true;
  const created = report.creations.filter((outcome) => outcome.status === "created");
  const skipped = report.creations.filter((outcome) => outcome.status === "skipped");
  const linksCreated = report.links.filter((link) => link.outcome === "created");
  const failureCount =
    report.loadFailures.length +
    report.fetchFailures.length +
    report.reconcile.failures.length +
    report.creationFailures.length +
    report.linkFailures.length +
    report.forge.filter((result) => result.outcome === "failed").length;

  const lines: string[] = [];
  lines.push("Board sync");
  lines.push(
    `Tasks: ${report.reconcile.results.length}, Created: ${created.length}, ` +
      `Links: ${linksCreated.length}, Failures: ${failureCount}`,
  );

  const updates = report.reconcile.results
    .map((result) => describeResult(result, includeSkipped))
    .filter((line): line is string => line !== null);
  if (updates.length > 0) {
    lines.push("");
    lines.push("Task updates");
    updates.forEach((line) => lines.push(`- ${line}`));
  }

  if (created.length > 0 || (includeSkipped && skipped.length > 0)) {
    lines.push("");
    lines.push("New tasks");
    created.forEach((outcome) => {
      lines.push(
        `- [${outcome.task.taskId} ${formatShortRef(outcome.ref)}] ` +
          `${quote(outcome.data.title)} in ${outcome.data.column} / ${outcome.data.swimlane}`,
      );
    });
    if (includeSkipped) {
      skipped.forEach((outcome) => {
        lines.push(
          `- [${formatShortRef(outcome.ref)}] (skipped) ${quote(outcome.data.title)} ` +
            `in ${outcome.data.column} / ${outcome.data.swimlane}`,
        );
      });
    }
  }

  const links = report.links.filter(
    (link) => link.outcome === "created" || (includeSkipped && link.outcome === "dry-run"),
  );
  if (links.length > 0) {
    lines.push("");
    lines.push("Links");
    links.forEach((link) => {
      const suffix = link.outcome === "dry-run" ? " (skipped)" : "";
      lines.push(`- ${link.fromTaskId} ${link.relation} ${link.toTaskId}${suffix}`);
    });
  }

  const forge = report.forge.filter(
    (result) => result.outcome === "updated" || (includeSkipped && result.outcome === "skipped"),
  );
  if (forge.length > 0) {
    lines.push("");
    lines.push("Forge updates");
    forge.forEach((result) => {
      const suffix = result.outcome === "skipped" ? " (skipped)" : "";
      lines.push(`- ${formatShortRef(result.ref)} ${result.kind} for task ${result.taskId}${suffix}`);
    });
  }

  if (failureCount > 0) {
    lines.push("");
    lines.push("Failures");
    report.loadFailures.forEach((failure) => {
      lines.push(`- task ${failure.taskId}: ${failure.error.message}`);
    });
    report.fetchFailures.forEach((failure) => {
      lines.push(`- ${failure.ref} (task ${failure.taskId}): ${failure.error}`);
    });
    report.reconcile.failures.forEach((failure) => {
      const field = failure.field === null ? "" : ` ${failure.field}`;
      lines.push(`- task ${failure.taskId}${field}: ${failure.error}`);
    });
    [...report.creationFailures, ...report.linkFailures].forEach((failure) => {
      lines.push(`- ${failure.ref}: ${failure.error}`);
    });
    report.forge
      .filter((result) => result.outcome === "failed")
      .forEach((result) => {
        lines.push(`- ${formatShortRef(result.ref)} ${result.kind}: ${result.detail}`);
      });
  }

  return `${lines.join("\n")}\n`;
};

export const formatAutoActionReport = (result: AutoActionSyncResult): string => {
  const lines: string[] = [];
  lines.push("Automatic actions");
  lines.push(
    `Matched: ${result.matched}, Missing: ${result.missing.length}, ` +
      `Unexpected: ${result.unexpected.length}, Duplicates: ${result.duplicates.length}, ` +
      `Unparsed: ${result.unparsed.length}`,
  );

  if (result.missing.length > 0) {
    lines.push("");
    lines.push("Missing");
    result.missing.forEach((rule) => {
      const suffix = result.created.includes(rule) ? " (created)" : "";
      const source = rule.source ? ` (${rule.source})` : "";
      lines.push(`- ${describeRule(rule)}${source}${suffix}`);
    });
  }

  const extra = [...result.duplicates, ...result.unexpected];
  if (extra.length > 0) {
    lines.push("");
    lines.push("Unexpected");
    extra.forEach((action) => {
      const suffix = result.removed.includes(action.id) ? " (removed)" : "";
      lines.push(`- action ${action.id} ${action.eventName} ${action.actionName}${suffix}`);
    });
  }

  if (result.failures.length > 0) {
    lines.push("");
    lines.push("Failures");
    result.failures.forEach((failure) => {
      lines.push(`- ${failure.target}: ${failure.error}`);
    });
  }

  return `${lines.join("\n")}\n`;
};
