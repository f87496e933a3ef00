import type { KanbanAdapter } from "./adapters.js";
import type { LinkRelation } from "./board-schema.js";
import { formatShortRef } from "./forge-refs.js";
import type { Logger } from "./logger.js";
import type { SchemaIndex } from "./schema-index.js";
import { hasLinkTo } from "./task.js";
import type { Task } from "./task.js";

export type LinkOutcome = "self-link" | "exists" | "dry-run" | "created";

export interface LinkResult {
  fromTaskId: number;
  toTaskId: number;
  relation: LinkRelation;
  outcome: LinkOutcome;
}

/**
 * Creates directed task relations without duplicates. `from` must carry
 * fresh internal links: the duplicate check reads them, not the board.
 */
export class LinkManager {
  private readonly kanban: KanbanAdapter;
  private readonly schema: SchemaIndex;
  private readonly logger?: Logger;

  constructor(options: { kanban: KanbanAdapter; schema: SchemaIndex; logger?: Logger }) {
    this.kanban = options.kanban;
    this.schema = options.schema;
    this.logger = options.logger;
  }

  async addLink(
    from: Task,
    to: Task,
    relation: LinkRelation,
    dryRun: boolean,
  ): Promise<LinkResult> {
    const result = (outcome: LinkOutcome): LinkResult => ({
      fromTaskId: from.taskId,
      toTaskId: to.taskId,
      relation,
      outcome,
    });
    const details = {
      fromTaskId: from.taskId,
      fromRef: formatShortRef(from.ref),
      toTaskId: to.taskId,
      toRef: formatShortRef(to.ref),
      relation,
    };

    if (from.taskId === to.taskId) {
      this.logger?.warn("Refusing to link a task to itself", details);
      return result("self-link");
    }
    if (hasLinkTo(from, to.taskId)) {
      this.logger?.info("Tasks already linked", details);
      return result("exists");
    }
    if (dryRun) {
      this.logger?.info("Skipping creation of link by request", details);
      return result("dry-run");
    }

    this.logger?.info("Creating task link", details);
    await this.kanban.createInternalLink(
      from.taskId,
      to.taskId,
      this.schema.linkTypeId(relation),
    );
    return result("created");
  }
}
