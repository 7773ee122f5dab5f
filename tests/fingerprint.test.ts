import { describe, it, expect } from "vitest";
import {
  contentFingerprint,
  embeddingText,
  normalizeContent,
} from "../src/memory/fingerprint.js";

describe("normalizeContent", () => {
  it("trims, lowercases and collapses whitespace", () => {
    expect(normalizeContent("  Hello   WORLD \n\t x ")).toBe("hello world x");
  });
});

describe("contentFingerprint", () => {
  it("is the sha-256 hex of the normalized text", () => {
    expect(contentFingerprint("  ABC ")).toBe(
      "ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad",
    );
  });

  it("ignores case and whitespace differences", () => {
    expect(contentFingerprint("Went  hiking\ntogether")).toBe(
      contentFingerprint("went hiking together"),
    );
  });

  it("differs for different content", () => {
    expect(contentFingerprint("coffee")).not.toBe(contentFingerprint("tea"));
  });

  it("is null for empty or whitespace-only content", () => {
    expect(contentFingerprint("")).toBeNull();
    expect(contentFingerprint("   \n ")).toBeNull();
  });
});

describe("embeddingText", () => {
  it("appends facts with sorted keys after the content", () => {
    const text = embeddingText("  met at the cafe ", {
      topics: ["coffee"],
      keyEvent: "first date",
      redFlags: [],
    });
    expect(text).toBe(
      'met at the cafe\n{"keyEvent":"first date","redFlags":[],"topics":["coffee"]}',
    );
  });

  it("drops undefined fact values", () => {
    expect(embeddingText("x", { sentiment: undefined, topics: ["a"] })).toBe(
      'x\n{"topics":["a"]}',
    );
  });

  it("is just the content when there are no facts", () => {
    expect(embeddingText(" hello ", {})).toBe("hello");
  });

  it("is just the facts when the content is empty", () => {
    expect(embeddingText("", { topics: [] })).toBe('{"topics":[]}');
  });
});
