import { describe, it, expect, vi } from "vitest";
import { Frontmatter } from "../src/metadata/frontmatter.js";
import { InlineMetadata } from "../src/metadata/inline.js";
import { NoteMetadata } from "../src/metadata/noteMetadata.js";
import { MetadataStore } from "../src/metadata/store.js";
import { MetadataKind } from "../src/metadata/types.js";

function metadata(
  frontmatter: Array<[string, string[]]>,
  inline: Array<[string, string[]]> = [],
  onChange: () => void = () => {}
): NoteMetadata {
  return new NoteMetadata(
    new Frontmatter(new MetadataStore(frontmatter), true),
    new InlineMetadata(new MetadataStore(inline), inline.length > 0),
    onChange
  );
}

describe("NoteMetadata", () => {
  it("moves a key onto the end of the destination's values", () => {
    const meta = metadata([["tags", ["t1", "t2", "t3"]]], [["tags", ["t4", "t5", "t6"]]]);
    meta.move("tags", MetadataKind.FRONTMATTER, MetadataKind.INLINE);

    expect(meta.frontmatter.store.hasKey("tags")).toBe(false);
    expect(meta.inline.store.get("tags")).toEqual(["t4", "t5", "t6", "t1", "t2", "t3"]);
  });

  it("moves every key when none are named", () => {
    const meta = metadata([
      ["a", ["1"]],
      ["b", []],
    ]);
    meta.move(undefined, MetadataKind.FRONTMATTER, MetadataKind.INLINE);
    expect(meta.frontmatter.store.size).toBe(0);
    expect(meta.inline.store.entries()).toEqual([
      ["a", ["1"]],
      ["b", []],
    ]);
  });

  it("leaves keys an inline field cannot carry in the frontmatter", () => {
    const meta = metadata([
      ["my.key", ["v"]],
      ["_id", ["3"]],
      ["status", ["draft"]],
    ]);
    meta.move(undefined, MetadataKind.FRONTMATTER, MetadataKind.INLINE);
    expect(meta.frontmatter.store.entries()).toEqual([
      ["my.key", ["v"]],
      ["_id", ["3"]],
    ]);
    expect(meta.inline.store.entries()).toEqual([["status", ["draft"]]]);
  });

  it("does nothing when moving a store onto itself", () => {
    const onChange = vi.fn();
    const meta = metadata([["a", ["1"]]], [], onChange);
    meta.move("a", MetadataKind.INLINE, MetadataKind.INLINE);
    expect(onChange).not.toHaveBeenCalled();
    expect(meta.frontmatter.store.get("a")).toEqual(["1"]);
  });

  it("declares a key without values", () => {
    const meta = metadata([]);
    meta.add("newmeta", undefined, MetadataKind.FRONTMATTER);
    expect(meta.frontmatter.store.get("newmeta")).toEqual([]);
    expect(meta.has("newmeta", [])).toBe(true);
  });

  it("orders frontmatter keys and leaves values as they are", () => {
    const meta = metadata([
      ["f1", ["a", "b", "c", "z"]],
      ["f2", ["1", "2", "3"]],
      ["f0", ["a", "b", "c"]],
    ]);
    meta.orderKeys("asc", MetadataKind.FRONTMATTER);
    expect(meta.frontmatter.store.entries()).toEqual([
      ["f0", ["a", "b", "c"]],
      ["f1", ["a", "b", "c", "z"]],
      ["f2", ["1", "2", "3"]],
    ]);
  });

  it("removes listed values and keeps the key", () => {
    const meta = metadata([["tags", ["t1", "t2", "t3"]]]);
    meta.remove("tags", ["t1", "t3"], MetadataKind.FRONTMATTER);
    expect(meta.frontmatter.store.get("tags")).toEqual(["t2"]);
  });

  it("adds to every store that declares the key", () => {
    const meta = metadata([["tags", ["a"]]], [["tags", ["b"]]]);
    meta.add("tags", "c");
    expect(meta.frontmatter.store.get("tags")).toEqual(["a", "c"]);
    expect(meta.inline.store.get("tags")).toEqual(["b", "c"]);
  });

  it("creates an unknown key in the frontmatter when no kind is given", () => {
    const meta = metadata([], [["status", ["draft"]]]);
    meta.add("tags", ["x"]);
    expect(meta.frontmatter.store.get("tags")).toEqual(["x"]);
    expect(meta.inline.store.hasKey("tags")).toBe(false);
  });

  it("only touches the inline store when asked to", () => {
    const meta = metadata([["tags", ["a"]]]);
    meta.add("tags", "b", MetadataKind.INLINE);
    expect(meta.frontmatter.store.get("tags")).toEqual(["a"]);
    expect(meta.inline.store.get("tags")).toEqual(["b"]);
  });

  it("gets values across stores, frontmatter first", () => {
    const meta = metadata([["tags", ["a"]]], [["tags", ["b"]], ["status", ["draft"]]]);
    expect(meta.get("tags")).toEqual(["a", "b"]);
    expect(meta.get("tags", MetadataKind.INLINE)).toEqual(["b"]);
    expect(meta.get("missing")).toBeUndefined();
    expect(meta.keys()).toEqual(["tags", "status"]);
  });

  it("checks stores independently", () => {
    const meta = metadata([["tags", ["a"]]], [["tags", ["b"]]]);
    expect(meta.has("tags", ["a", "b"])).toBe(false);
    expect(meta.has("tags", ["b"])).toBe(true);
    expect(meta.has("tags", ["b"], MetadataKind.FRONTMATTER)).toBe(false);
  });

  it("deduplicates, sorts and drops empty keys per store", () => {
    const meta = metadata(
      [
        ["tags", ["b", "a", "b"]],
        ["empty", []],
      ],
      [["tags", ["z", "z"]]]
    );
    meta.removeDuplicateValues("tags");
    meta.orderValues("tags", "asc");
    meta.removeEmpty();
    expect(meta.frontmatter.store.entries()).toEqual([["tags", ["a", "b"]]]);
    expect(meta.inline.store.entries()).toEqual([["tags", ["z"]]]);
  });

  it("reports every mutation", () => {
    const onChange = vi.fn();
    const meta = metadata([["a", ["1"]]], [], onChange);
    meta.add("b");
    meta.remove("a");
    meta.order(undefined, "desc", "asc");
    expect(onChange).toHaveBeenCalledTimes(3);
  });

  it("parses both forms from note text", () => {
    const meta = NoteMetadata.parse("---\ntitle: T\n---\nBody\nstatus :: draft\n");
    expect(meta.frontmatter.store.toObject()).toEqual({ title: ["T"] });
    expect(meta.inline.store.toObject()).toEqual({ status: ["draft"] });
  });
});
