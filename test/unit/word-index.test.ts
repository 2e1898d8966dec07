import { describe, expect, it } from "vitest";
import {
  FieldIndex,
  indexFor,
  uniqueLengthsInRange,
  wordsOfLength,
  type Dictionary,
} from "../../src/core/word-index.js";

function dict(...words: string[]): Dictionary {
  return words.map((word) => ({ word, length: word.length }));
}

describe("uniqueLengthsInRange", () => {
  it("collapses duplicates and drops lengths outside the range", () => {
    const dictionary = dict("cat", "bird", "lion", "horse", "elephant");
    expect(uniqueLengthsInRange(dictionary, 4, 8)).toEqual([4, 5, 8]);
  });

  it("returns lengths in ascending order regardless of dictionary order", () => {
    const dictionary = dict("elephant", "cat", "horse", "lion");
    expect(uniqueLengthsInRange(dictionary, 1, 14)).toEqual([3, 4, 5, 8]);
  });

  it("includes both bounds", () => {
    expect(uniqueLengthsInRange(dict("cat", "lion", "horse"), 3, 5)).toEqual([3, 4, 5]);
  });

  it("returns an empty list when nothing falls in range", () => {
    expect(uniqueLengthsInRange(dict("cat", "dog"), 10, 12)).toEqual([]);
  });

  it("returns an empty list for an empty dictionary", () => {
    expect(uniqueLengthsInRange([], 1, 14)).toEqual([]);
  });
});

describe("wordsOfLength", () => {
  it("returns exactly the words with that length", () => {
    const dictionary: Dictionary = [
      { word: "cat", length: 3 },
      { word: "dog", length: 3 },
      { word: "lion", length: 4 },
    ];
    expect(wordsOfLength(dictionary, 3)).toEqual(["cat", "dog"]);
  });

  it("keeps dictionary order", () => {
    expect(wordsOfLength(dict("dog", "lion", "cat", "emu"), 3)).toEqual(["dog", "cat", "emu"]);
  });

  it("returns an empty list for a missing length", () => {
    expect(wordsOfLength(dict("cat"), 7)).toEqual([]);
  });

  it("trusts the stored length field", () => {
    const dictionary: Dictionary = [{ word: "odd", length: 9 }];
    expect(wordsOfLength(dictionary, 9)).toEqual(["odd"]);
    expect(wordsOfLength(dictionary, 3)).toEqual([]);
  });
});

describe("indexFor", () => {
  it("reuses the index for the same dictionary instance", () => {
    const dictionary = dict("cat", "lion");
    expect(indexFor(dictionary)).toBe(indexFor(dictionary));
  });

  it("builds separate indexes for separate dictionaries", () => {
    const a = dict("cat");
    const b = dict("cat");
    expect(indexFor(a)).not.toBe(indexFor(b));
    expect(indexFor(b).wordsOfLength(3)).toEqual(["cat"]);
  });
});

describe("FieldIndex", () => {
  const players = [
    { name: "ana", team: "red" },
    { name: "ben", team: "blue" },
    { name: "cy", team: "red" },
  ];

  it("groups records by key, preserving input order", () => {
    const index = new FieldIndex(players, (p) => p.team);
    expect(index.get("red").map((p) => p.name)).toEqual(["ana", "cy"]);
    expect(index.get("blue").map((p) => p.name)).toEqual(["ben"]);
  });

  it("lists keys in order of first appearance", () => {
    const index = new FieldIndex(players, (p) => p.team);
    expect(index.keys()).toEqual(["red", "blue"]);
  });

  it("answers has() and returns an empty group for unknown keys", () => {
    const index = new FieldIndex(players, (p) => p.team);
    expect(index.has("red")).toBe(true);
    expect(index.has("green")).toBe(false);
    expect(index.get("green")).toEqual([]);
  });
});
