import { describe, expect, it } from "vitest";

import {
  ForgeRefFormatError,
  createForgeRefCodec,
  formatShortRef,
  issueRef,
  mergeRequestRef,
  parseShortRef,
} from "../src/forge-refs.js";

describe("short references", () => {
  it("formats issues with # and merge requests with !", () => {
    expect(formatShortRef(issueRef(12))).toBe("#12");
    expect(formatShortRef(mergeRequestRef(34))).toBe("!34");
  });

  it("parses short references and rejects anything else", () => {
    expect(parseShortRef(" #12 ")).toEqual({ kind: "issue", number: 12 });
    expect(parseShortRef("!34")).toEqual({ kind: "merge_request", number: 34 });
    expect(parseShortRef("34")).toBeNull();
    expect(parseShortRef("#")).toBeNull();
  });
});

describe("createForgeRefCodec", () => {
  const codec = createForgeRefCodec({
    webUrl: "https://gitlab.example.org/",
    projectPath: "/group/spec/",
  });

  it("builds item URLs and link titles", () => {
    expect(codec.itemUrl(mergeRequestRef(42))).toBe(
      "https://gitlab.example.org/group/spec/-/merge_requests/42",
    );
    expect(codec.itemUrl(issueRef(7))).toBe("https://gitlab.example.org/group/spec/-/issues/7");
    expect(codec.linkTitle(mergeRequestRef(42))).toBe("MR !42");
    expect(codec.linkTitle(issueRef(7))).toBe("Issue #7");
  });

  it("parses item URLs with or without the /-/ segment", () => {
    expect(codec.parseUrl("https://gitlab.example.org/group/spec/-/issues/7")).toEqual(
      issueRef(7),
    );
    expect(codec.parseUrl("https://gitlab.example.org/group/spec/merge_requests/42")).toEqual(
      mergeRequestRef(42),
    );
  });

  it("ignores URLs of other projects and hosts", () => {
    expect(codec.parseUrl("https://gitlab.example.org/group/other/-/issues/7")).toBeNull();
    expect(codec.parseUrl("https://elsewhere.example.org/group/spec/-/issues/7")).toBeNull();
    expect(codec.parseUrl("not a url")).toBeNull();
  });

  it("rejects a web URL that is not http(s)", () => {
    expect(() => createForgeRefCodec({ webUrl: "gitlab.example.org", projectPath: "g/p" })).toThrow(
      ForgeRefFormatError,
    );
  });
});
