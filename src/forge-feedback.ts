import type { ForgeAdapter, ForgeItem } from "./adapters.js";
import { forgeItemRef } from "./adapters.js";
import { errorMessage, settleInBatches } from "./batch.js";
import { formatShortRef } from "./forge-refs.js";
import type { ExternalRef } from "./forge-refs.js";
import type { Logger } from "./logger.js";
import type { ReconcileOptions, ReconcilePair } from "./reconcile-engine.js";
import type { Task } from "./task.js";
import { flagsToForgeLabels } from "./task-flags.js";

export const TRACKING_LINK_LABEL = "Board Tracking Task:";

const TRACKING_LINE_REGEX = /^Board Tracking Task:[^\n]*\n?/gm;

export type ForgeFeedbackKind = "description" | "labels" | "note";

export interface ForgeFeedbackResult {
  kind: ForgeFeedbackKind;
  ref: ExternalRef;
  taskId: number;
  outcome: "updated" | "skipped" | "failed";
  detail: string;
}

export const formatTrackingLink = (taskBaseUrl: string, taskId: number): string =>
  `${TRACKING_LINK_LABEL} ${taskBaseUrl}${taskId}`;

/**
 * Returns the description with `link` as its first line followed by a blank
 * line, or null when it already starts that way. Stale tracking lines are
 * removed.
 */
export const withTrackingLink = (description: string, link: string): string | null => {
  if (description === link || description.startsWith(`${link}\n`)) {
    return null;
  }
  const rest = description.replace(TRACKING_LINE_REGEX, "").replace(/^\s*\n/, "");
  return rest.trim() === "" ? link : `${link}\n\n${rest}`;
};

const isOpen = (item: ForgeItem): boolean => item.state === "opened";

export interface ForgeFeedbackOptions {
  forge: ForgeAdapter;
  taskBaseUrl: string;
  options: ReconcileOptions;
  batchSize?: number;
  logger?: Logger;
}

export class ForgeFeedback {
  private readonly forge: ForgeAdapter;
  private readonly taskBaseUrl: string;
  private readonly options: ReconcileOptions;
  private readonly batchSize: number;
  private readonly logger?: Logger;

  constructor(options: ForgeFeedbackOptions) {
    this.forge = options.forge;
    this.taskBaseUrl = options.taskBaseUrl;
    this.options = options.options;
    this.batchSize = options.batchSize ?? 25;
    this.logger = options.logger;
  }

  /** Puts the tracking link at the top of every open item's description, newest first. */
  async syncDescriptions(pairs: readonly ReconcilePair[]): Promise<ForgeFeedbackResult[]> {
    const pending = pairs
      .filter((pair) => isOpen(pair.item))
      .sort((left, right) => right.item.updatedAt.localeCompare(left.item.updatedAt))
      .flatMap((pair) => {
        const link = formatTrackingLink(this.taskBaseUrl, pair.task.taskId);
        const description = withTrackingLink(pair.item.description, link);
        return description === null ? [] : [{ ...pair, description }];
      });

    return this.run("description", pending, this.options.modifyForgeDescription, (entry) =>
      this.forge.updateDescription(forgeItemRef(entry.item), entry.description),
    );
  }

  /** Adds forge labels implied by flags set on the board. Never removes any. */
  async syncLabels(pairs: readonly ReconcilePair[]): Promise<ForgeFeedbackResult[]> {
    const pending = pairs
      .filter((pair) => isOpen(pair.item))
      .flatMap((pair) => {
        const missing = flagsToForgeLabels(pair.task.flags).filter(
          (label) => !pair.item.labels.includes(label),
        );
        return missing.length === 0
          ? []
          : [{ ...pair, missing, labels: [...pair.item.labels, ...missing] }];
      });

    return this.run("labels", pending, this.options.addForgeLabels, (entry) =>
      this.forge.updateLabels(forgeItemRef(entry.item), entry.labels),
    );
  }

  /** Posts a note pointing at each newly created task. */
  async announceTasks(pairs: readonly ReconcilePair[]): Promise<ForgeFeedbackResult[]> {
    const pending = pairs.map((pair) => ({
      ...pair,
      body: `This item is now tracked on the board: ${this.taskBaseUrl}${pair.task.taskId}`,
    }));
    return this.run("note", pending, this.options.postForgeNotes, (entry) =>
      this.forge.createNote(forgeItemRef(entry.item), entry.body),
    );
  }

  private async run<T extends { task: Task; item: ForgeItem }>(
    kind: ForgeFeedbackKind,
    pending: readonly T[],
    authorized: boolean,
    apply: (entry: T) => Promise<void>,
  ): Promise<ForgeFeedbackResult[]> {
    const describe = (entry: T, outcome: ForgeFeedbackResult["outcome"], detail: string) => ({
      kind,
      ref: forgeItemRef(entry.item),
      taskId: entry.task.taskId,
      outcome,
      detail,
    });

    if (!authorized) {
      return pending.map((entry) => {
        this.logger?.info("Skipping forge update by request", {
          kind,
          ref: formatShortRef(forgeItemRef(entry.item)),
          taskId: entry.task.taskId,
        });
        return describe(entry, "skipped", "not authorized");
      });
    }

    const settled = await settleInBatches(pending, this.batchSize, async (entry) => {
      this.logger?.info("Updating forge item", {
        kind,
        ref: formatShortRef(forgeItemRef(entry.item)),
        taskId: entry.task.taskId,
      });
      await apply(entry);
    });
    return settled.map((result, index) => {
      const entry = pending[index];
      if (result.status === "fulfilled") {
        return describe(entry, "updated", "");
      }
      const error = errorMessage(result.reason);
      this.logger?.error("Forge update failed", {
        kind,
        ref: formatShortRef(forgeItemRef(entry.item)),
        error,
      });
      return describe(entry, "failed", error);
    });
  }
}
