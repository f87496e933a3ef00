import { FLAG_TAGS, FORGE_LABELS, asFlagTag } from "./board-schema.js";
import type { FlagTag } from "./board-schema.js";

export interface TaskFlags {
  readonly initialSpecReviewComplete: boolean;
  readonly apiFrozen: boolean;
  readonly blockedOnSpec: boolean;
  readonly contractorReviewed: boolean;
}

export type TaskFlagName = keyof TaskFlags;

type MutableFlags = { -readonly [K in TaskFlagName]: boolean };

const FLAG_BY_TAG: Record<FlagTag, TaskFlagName> = {
  "Initial Spec Review Complete": "initialSpecReviewComplete",
  "API Frozen": "apiFrozen",
  "Blocked on Spec": "blockedOnSpec",
  "Reviewed by Contractor": "contractorReviewed",
};

/** Forge labels that switch a flag on. Labels never switch one off. */
const FLAG_BY_LABEL: ReadonlyMap<string, TaskFlagName> = new Map([
  [FORGE_LABELS.initialReviewComplete, "initialSpecReviewComplete"],
  [FORGE_LABELS.frozenNeedsImplementation, "apiFrozen"],
  [FORGE_LABELS.shippedPublicly, "apiFrozen"],
]);

/** Labels written back to the forge for flags set on the board. */
const LABEL_BY_FLAG: readonly (readonly [TaskFlagName, string])[] = [
  ["initialSpecReviewComplete", FORGE_LABELS.initialReviewComplete],
];

export const EMPTY_FLAGS: TaskFlags = Object.freeze({
  initialSpecReviewComplete: false,
  apiFrozen: false,
  blockedOnSpec: false,
  contractorReviewed: false,
});

export const tagsToFlags = (tags: Iterable<string>): TaskFlags => {
  const flags: MutableFlags = { ...EMPTY_FLAGS };
  for (const tag of tags) {
    const flagTag = asFlagTag(tag);
    if (flagTag !== undefined) {
      flags[FLAG_BY_TAG[flagTag]] = true;
    }
  }
  return Object.freeze(flags);
};

export const flagsToTags = (flags: TaskFlags): FlagTag[] =>
  FLAG_TAGS.filter((tag) => flags[FLAG_BY_TAG[tag]]);

export const flagsEqual = (left: TaskFlags, right: TaskFlags): boolean =>
  FLAG_TAGS.every((tag) => left[FLAG_BY_TAG[tag]] === right[FLAG_BY_TAG[tag]]);

export const applyLabelFlags = (
  current: TaskFlags,
  labels: Iterable<string>,
): TaskFlags => {
  const flags: MutableFlags = { ...current };
  for (const label of labels) {
    const flag = FLAG_BY_LABEL.get(label);
    if (flag !== undefined) {
      flags[flag] = true;
    }
  }
  return Object.freeze(flags);
};

export const flagsToForgeLabels = (flags: TaskFlags): string[] =>
  LABEL_BY_FLAG.filter(([flag]) => flags[flag]).map(([, label]) => label);

/** Tags that carry no flag meaning; kept as-is when a task's tags are rewritten. */
export const nonFlagTags = (tags: Iterable<string>): string[] =>
  [...tags].filter((tag) => asFlagTag(tag) === undefined);
