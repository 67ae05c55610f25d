import { describe, it, expect } from "vitest";
import { InvalidFrontmatterError } from "../src/errors.js";
import {
  Frontmatter,
  formatScalar,
  parseFrontmatterBlock,
  renderFrontmatter,
  splitFrontmatter,
} from "../src/metadata/frontmatter.js";
import { MetadataStore } from "../src/metadata/store.js";

describe("splitFrontmatter", () => {
  it("splits the block from the body", () => {
    expect(splitFrontmatter("---\ntitle: x\n---\nbody\n")).toEqual({
      preamble: "",
      block: "---\ntitle: x\n---\n",
      body: "body\n",
    });
  });

  it("returns no block when the note does not open with a delimiter", () => {
    expect(splitFrontmatter("text\n---\nmore\n")).toEqual({
      preamble: "",
      block: null,
      body: "text\n---\nmore\n",
    });
  });

  it("keeps a byte-order mark as the preamble", () => {
    expect(splitFrontmatter("\uFEFF---\na: 1\n---\n")).toEqual({
      preamble: "\uFEFF",
      block: "---\na: 1\n---\n",
      body: "",
    });
  });

  it("accepts CRLF delimiters", () => {
    expect(splitFrontmatter("---\r\na: 1\r\n---\r\nbody")).toEqual({
      preamble: "",
      block: "---\r\na: 1\r\n---\r\n",
      body: "body",
    });
  });

  it("throws on an unterminated block and carries the block text", () => {
    let caught: unknown;
    try {
      splitFrontmatter("---\ntitle: x\nbody\n");
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(InvalidFrontmatterError);
    expect(caught instanceof InvalidFrontmatterError && caught.block).toBe("---\ntitle: x\nbody\n");
  });
});

describe("parseFrontmatterBlock", () => {
  it("reads scalars, lists and empty keys in order", () => {
    const store = parseFrontmatterBlock(
      "---\ntags:\n  - a\n  - b\ncount: 3\nempty:\ndone: true\n---\n"
    );
    expect(store.entries()).toEqual([
      ["tags", ["a", "b"]],
      ["count", ["3"]],
      ["empty", []],
      ["done", ["true"]],
    ]);
  });

  it("keeps dates as written", () => {
    const store = parseFrontmatterBlock("---\ncreated: 2024-01-05\n---\n");
    expect(store.get("created")).toEqual(["2024-01-05"]);
  });

  it("keeps number-like scalars as the text they were written as", () => {
    const store = parseFrontmatterBlock("---\nzip: 01234\nversion: 1.10\nhex: 0x1F\n---\n");
    expect(store.entries()).toEqual([
      ["zip", ["01234"]],
      ["version", ["1.10"]],
      ["hex", ["0x1F"]],
    ]);
  });

  it("rejects a list at the top level", () => {
    expect(() => parseFrontmatterBlock("---\n- a\n---\n")).toThrow(InvalidFrontmatterError);
  });

  it("rejects a bare scalar at the top level", () => {
    expect(() => parseFrontmatterBlock("---\njust text\n---\n")).toThrow(
      InvalidFrontmatterError
    );
  });

  it("returns an empty store for an empty block", () => {
    expect(parseFrontmatterBlock("---\n---\n").size).toBe(0);
  });

  it("rejects nested mappings", () => {
    expect(() => parseFrontmatterBlock("---\nauthor:\n  name: x\n---\n")).toThrow(
      InvalidFrontmatterError
    );
  });

  it("rejects malformed YAML every time it is seen", () => {
    const block = "---\ntitle: [unclosed\n---\n";
    expect(() => parseFrontmatterBlock(block)).toThrow(InvalidFrontmatterError);
    expect(() => parseFrontmatterBlock(block)).toThrow(InvalidFrontmatterError);
  });

  it("splits values on configured separators", () => {
    const store = parseFrontmatterBlock("---\ntags: one two\n---\n", {
      tags: { frontmatterSeparators: [" "] },
    });
    expect(store.get("tags")).toEqual(["one", "two"]);
  });
});

describe("renderFrontmatter", () => {
  it("writes one value inline, several as a list and none bare", () => {
    const store = new MetadataStore([
      ["title", ["Hello"]],
      ["tags", ["a", "b"]],
      ["empty", []],
    ]);
    expect(renderFrontmatter(store)).toBe(
      "---\ntitle: Hello\ntags:\n  - a\n  - b\nempty:\n---\n"
    );
  });

  it("renders nothing for an empty store", () => {
    expect(renderFrontmatter(new MetadataStore())).toBe("");
  });

  it("quotes values YAML would read differently", () => {
    expect(formatScalar("plain text")).toBe("plain text");
    expect(formatScalar("a: b")).toBe('"a: b"');
    expect(formatScalar("#tag")).toBe('"#tag"');
    expect(formatScalar("007")).toBe('"007"');
    expect(formatScalar("123")).toBe("123");
    expect(formatScalar("null")).toBe('"null"');
    expect(formatScalar("")).toBe('""');
  });

  it("quotes values holding tabs", () => {
    expect(formatScalar("a:\tb")).toBe('"a:\\tb"');
    expect(formatScalar("-\ta")).toBe('"-\\ta"');
    expect(formatScalar("a\t#b")).toBe('"a\\t#b"');
  });

  it("reads back what it writes", () => {
    const store = new MetadataStore([
      ["title", ["a: b"]],
      ["tags", ["#x", "007", "plain"]],
      ["tabs", ["a:\tb", "-\ta", "a\t#b"]],
      ["version", ["1.10"]],
    ]);
    expect(parseFrontmatterBlock(renderFrontmatter(store)).equals(store)).toBe(true);
  });
});

describe("Frontmatter", () => {
  it("reports whether the note had a block", () => {
    expect(Frontmatter.parse("---\na: 1\n---\nbody").exists()).toBe(true);
    expect(Frontmatter.parse("body").exists()).toBe(false);
  });
});
