export type ExternalRefKind = "issue" | "merge_request";

export interface ExternalRef {
  kind: ExternalRefKind;
  number: number;
}

export interface ForgeRefLocation {
  /** Web root of the forge, e.g. `https://gitlab.example.org`. */
  webUrl: string;
  /** Namespaced project path, e.g. `group/project`. */
  projectPath: string;
}

export class ForgeRefFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ForgeRefFormatError";
  }
}

export interface ForgeRefCodec {
  itemUrl(ref: ExternalRef): string;
  linkTitle(ref: ExternalRef): string;
  parseUrl(url: string): ExternalRef | null;
}

const SHORT_REF_REGEX = /^([#!])(\d+)$/;

const PATH_SEGMENTS: Record<ExternalRefKind, string> = {
  issue: "issues",
  merge_request: "merge_requests",
};

const escapeRegExp = (value: string): string =>
  value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

const trimSlashes = (value: string): string => value.replace(/^\/+|\/+$/g, "");

export const issueRef = (number: number): ExternalRef => ({
  kind: "issue",
  number,
});

export const mergeRequestRef = (number: number): ExternalRef => ({
  kind: "merge_request",
  number,
});

export const formatShortRef = (ref: ExternalRef): string =>
  `${ref.kind === "issue" ? "#" : "!"}${ref.number}`;

export const parseShortRef = (value: string): ExternalRef | null => {
  const match = SHORT_REF_REGEX.exec(value.trim());
  if (!match) {
    return null;
  }
  const number = Number.parseInt(match[2], 10);
  return match[1] === "#" ? issueRef(number) : mergeRequestRef(number);
};

export const refKindLabel = (ref: ExternalRef): string =>
  ref.kind === "issue" ? "Issue" : "MR";

export const createForgeRefCodec = (location: ForgeRefLocation): ForgeRefCodec => {
  const webUrl = location.webUrl.replace(/\/+$/, "");
  const projectPath = trimSlashes(location.projectPath);
  if (!/^https?:\/\//.test(webUrl)) {
    throw new ForgeRefFormatError(`Forge web URL must be http(s): '${location.webUrl}'`);
  }
  if (projectPath === "") {
    throw new ForgeRefFormatError("Forge project path must not be empty");
  }
  const itemRegex = new RegExp(
    `^${escapeRegExp(webUrl)}/${escapeRegExp(projectPath)}/(?:-/)?(issues|merge_requests)/(\\d+)`,
  );

  return {
    itemUrl: (ref) =>
      `${webUrl}/${projectPath}/-/${PATH_SEGMENTS[ref.kind]}/${ref.number}`,
    linkTitle: (ref) => `${refKindLabel(ref)} ${formatShortRef(ref)}`,
    parseUrl: (url) => {
      const match = itemRegex.exec(url.trim());
      if (!match) {
        return null;
      }
      const number = Number.parseInt(match[2], 10);
      return match[1] === "issues" ? issueRef(number) : mergeRequestRef(number);
    },
  };
};
