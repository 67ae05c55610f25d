import { describe, it, expect } from "vitest";
import {
  CALLOUT_MARKER,
  InlineMetadata,
  eraseInline,
  isInlineKey,
  renderField,
  renderInline,
  scanBody,
} from "../src/metadata/inline.js";
import { MetadataStore } from "../src/metadata/store.js";

const BODY = [
  "Intro line",
  "status :: draft",
  "- tags :: a, b",
  "> owner:: me",
  "```",
  "code :: ignored",
  "```",
  "status :: final",
  "",
].join("\n");

describe("InlineMetadata.parse", () => {
  it("collects fields in first-seen order and accumulates repeated keys", () => {
    const inline = InlineMetadata.parse(BODY);
    expect(inline.store.entries()).toEqual([
      ["status", ["draft", "final"]],
      ["tags", ["a", "b"]],
      ["owner", ["me"]],
    ]);
    expect(inline.exists()).toBe(true);
  });

  it("reads a field without values as a declared key", () => {
    expect(InlineMetadata.parse("todo ::\n").store.get("todo")).toEqual([]);
  });

  it("finds nothing in plain text", () => {
    const inline = InlineMetadata.parse("Just text: with a colon\n");
    expect(inline.store.size).toBe(0);
    expect(inline.exists()).toBe(false);
  });

  it("reads keys written in any alphabet", () => {
    const inline = InlineMetadata.parse("Größe :: 5\nstatus-2 :: ok\n");
    expect(inline.store.entries()).toEqual([
      ["Größe", ["5"]],
      ["status-2", ["ok"]],
    ]);
  });

  it("splits values on configured separators", () => {
    const inline = InlineMetadata.parse("tags :: a;b, c\n", { tags: { inlineSeparators: [";"] } });
    expect(inline.store.get("tags")).toEqual(["a", "b", "c"]);
  });
});

describe("isInlineKey", () => {
  it("accepts letters, digits, underscores, spaces and hyphens", () => {
    expect(isInlineKey("status")).toBe(true);
    expect(isInlineKey("due date")).toBe(true);
    expect(isInlineKey("Größe")).toBe(true);
    expect(isInlineKey("a_b-c")).toBe(true);
  });

  it("rejects keys the field pattern would not read back", () => {
    expect(isInlineKey("my.key")).toBe(false);
    expect(isInlineKey("_id")).toBe(false);
    expect(isInlineKey("key ")).toBe(false);
    expect(isInlineKey("")).toBe(false);
  });
});

describe("scanBody", () => {
  it("records the prefix of quoted and listed fields", () => {
    const scan = scanBody(BODY);
    expect(scan.fields.map((f) => [f.index, f.prefix, f.key])).toEqual([
      [1, "", "status"],
      [2, "- ", "tags"],
      [3, "> ", "owner"],
      [7, "", "status"],
    ]);
  });

  it("finds callout markers", () => {
    const scan = scanBody(`Text\n${CALLOUT_MARKER}\n> a :: 1`);
    expect(scan.markers).toEqual([1]);
  });
});

describe("rendering", () => {
  const store = new MetadataStore([
    ["status", ["draft"]],
    ["tags", ["a", "b"]],
    ["todo", []],
  ]);

  it("renders one line per key", () => {
    expect(renderInline(store)).toBe("status :: draft\ntags :: a, b\ntodo ::");
  });

  it("renders a callout block", () => {
    expect(renderInline(store, "callout")).toBe(
      "> [!info]- metadata\n> status :: draft\n> tags :: a, b\n> todo ::"
    );
  });

  it("renders nothing for an empty store", () => {
    expect(renderInline(new MetadataStore())).toBe("");
  });

  it("keeps a prefix", () => {
    expect(renderField("tags", ["x"], "- ")).toBe("- tags :: x");
  });
});

describe("eraseInline", () => {
  it("removes field lines and collapses the blank lines they leave", () => {
    expect(eraseInline("Intro\n\nstatus :: draft\n\nMore\n")).toBe("Intro\n\nMore\n");
  });

  it("removes a callout whose fields are all gone", () => {
    expect(eraseInline("Text\n\n> [!info]- metadata\n> a :: 1\n")).toBe("Text\n");
  });

  it("is available on the model", () => {
    expect(InlineMetadata.erase("a :: 1\nText\n")).toBe("Text\n");
  });

  it("leaves fenced code alone", () => {
    const body = "```\nkey :: value\n```\n";
    expect(eraseInline(body)).toBe(body);
  });
});
