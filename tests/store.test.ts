import { describe, it, expect } from "vitest";
import { MetadataStore, compareOrdinal, normalizeValues } from "../src/metadata/store.js";

describe("MetadataStore", () => {
  it("keeps keys in insertion order and appends values without deduplicating", () => {
    const store = new MetadataStore();
    store.add("tags", ["a", "b"]);
    store.add("title", "Hello");
    store.add("tags", ["b", "c"]);

    expect(store.keys()).toEqual(["tags", "title"]);
    expect(store.get("tags")).toEqual(["a", "b", "b", "c"]);
  });

  it("replaces values when overwriting", () => {
    const store = new MetadataStore([["tags", ["a", "b"]]]);
    store.add("tags", ["z"], true);
    expect(store.get("tags")).toEqual(["z"]);
  });

  it("stores numbers as strings", () => {
    const store = new MetadataStore();
    store.add("count", 3);
    store.add("ids", [1, "two"]);
    expect(store.toObject()).toEqual({ count: ["3"], ids: ["1", "two"] });
  });

  it("declares a key without values", () => {
    const store = new MetadataStore();
    store.add("newmeta");
    expect(store.hasKey("newmeta")).toBe(true);
    expect(store.get("newmeta")).toEqual([]);
    expect(store.has("newmeta", [])).toBe(true);
  });

  it("returns undefined for a missing key and copies otherwise", () => {
    const store = new MetadataStore([["tags", ["a"]]]);
    expect(store.get("missing")).toBeUndefined();

    const values = store.get("tags");
    values?.push("mutated");
    expect(store.get("tags")).toEqual(["a"]);
  });

  it("checks that every listed value is present", () => {
    const store = new MetadataStore([["tags", ["a", "b"]]]);
    expect(store.has("tags")).toBe(true);
    expect(store.has("tags", ["a", "b"])).toBe(true);
    expect(store.has("tags", ["a", "c"])).toBe(false);
    expect(store.has("other")).toBe(false);
    expect(store.has("other", [])).toBe(false);
  });

  it("removes values but keeps the key, or removes the whole key", () => {
    const store = new MetadataStore([
      ["tags", ["t1", "t2", "t3", "t1"]],
      ["title", ["x"]],
    ]);
    store.remove("tags", ["t1", "t3"]);
    expect(store.get("tags")).toEqual(["t2"]);

    store.remove("tags", ["t2"]);
    expect(store.get("tags")).toEqual([]);

    store.remove("title");
    expect(store.keys()).toEqual(["tags"]);

    store.remove("missing");
    expect(store.keys()).toEqual(["tags"]);
  });

  it("removes empty keys", () => {
    const store = new MetadataStore([
      ["a", []],
      ["b", ["1"]],
      ["c", []],
    ]);
    store.removeEmpty();
    expect(store.keys()).toEqual(["b"]);
  });

  it("removes duplicate values keeping first occurrences", () => {
    const store = new MetadataStore([
      ["tags", ["b", "a", "b", "c", "a"]],
      ["other", ["x", "x"]],
    ]);
    store.removeDuplicateValues("tags");
    expect(store.get("tags")).toEqual(["b", "a", "c"]);
    expect(store.get("other")).toEqual(["x", "x"]);

    store.removeDuplicateValues();
    expect(store.get("other")).toEqual(["x"]);
  });

  it("orders keys ordinally without touching values", () => {
    const store = new MetadataStore([
      ["f2", ["1", "2", "3"]],
      ["f0", ["a", "b", "c"]],
      ["f1", ["a", "b", "c", "z"]],
    ]);
    store.orderKeys("asc");
    expect(store.keys()).toEqual(["f0", "f1", "f2"]);
    expect(store.get("f1")).toEqual(["a", "b", "c", "z"]);

    store.orderKeys("desc");
    expect(store.keys()).toEqual(["f2", "f1", "f0"]);
  });

  it("orders values by code point, upper case before lower case", () => {
    const store = new MetadataStore([["tags", ["beta", "Alpha", "alpha", "Beta"]]]);
    store.orderValues("tags", "asc");
    expect(store.get("tags")).toEqual(["Alpha", "Beta", "alpha", "beta"]);
  });

  it("orders keys and selected values in one call, skipping missing keys", () => {
    const store = new MetadataStore([
      ["b", ["2", "1"]],
      ["a", ["z", "y"]],
    ]);
    store.order(["a", "missing"], "asc", "asc");
    expect(store.entries()).toEqual([
      ["a", ["y", "z"]],
      ["b", ["2", "1"]],
    ]);
  });

  it("compares stores by keys, order and values", () => {
    const store = new MetadataStore([["a", ["1"]]]);
    expect(store.equals(store.clone())).toBe(true);
    expect(store.equals(new MetadataStore([["a", ["2"]]]))).toBe(false);
    expect(store.equals(new MetadataStore())).toBe(false);
  });
});

describe("compareOrdinal", () => {
  it("compares UTF-8 bytes", () => {
    expect(compareOrdinal("a", "b")).toBeLessThan(0);
    expect(compareOrdinal("Z", "a")).toBeLessThan(0);
    expect(compareOrdinal("é", "z")).toBeGreaterThan(0);
    expect(compareOrdinal("same", "same")).toBe(0);
  });
});

describe("normalizeValues", () => {
  it("accepts a single value, a list or nothing", () => {
    expect(normalizeValues(undefined)).toEqual([]);
    expect(normalizeValues("a")).toEqual(["a"]);
    expect(normalizeValues(5)).toEqual(["5"]);
    expect(normalizeValues(["a", 1])).toEqual(["a", "1"]);
  });
});
