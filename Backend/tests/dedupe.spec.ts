// tests/dedupe.spec.ts
import { describe, it, expect } from "vitest";
import { dedupeByUrl, identityKey } from "../src/leadgen/dedupe";
import { post } from "./helpers/fixtures";

describe("identityKey", () => {
  it("drops everything from the first '?'", () => {
    expect(identityKey("https://a.test/p?x=1?y=2")).toBe("https://a.test/p");
    expect(identityKey("https://a.test/p")).toBe("https://a.test/p");
  });

  it("does not normalize case, fragments or trailing slashes", () => {
    expect(identityKey("https://A.test/p/#top")).toBe("https://A.test/p/#top");
    expect(identityKey("")).toBe("");
  });
});

describe("dedupeByUrl", () => {
  it("keeps the first record per key, in input order", () => {
    const a = post("reddit", "1");
    const b = post("linkedin", "2");
    const aTracked = { ...post("reddit", "1"), url: `${a.url}?utm_source=feed`, title: "later copy" };
    const out = dedupeByUrl([a, b, aTracked]);
    expect(out).toEqual([a, b]);
  });

  it("treats the tracked URL as the survivor when it comes first", () => {
    const plain = post("x", "9");
    const tracked = { ...plain, url: `${plain.url}?s=20` };
    expect(dedupeByUrl([tracked, plain])).toEqual([tracked]);
  });

  it("collapses records with empty URLs into one", () => {
    const out = dedupeByUrl([post("x", "1", { url: "" }), post("x", "2", { url: "" })]);
    expect(out).toHaveLength(1);
    expect(out[0].title).toBe("x post 1");
  });

  it("is idempotent", () => {
    const a = post("reddit", "1");
    const input = [
      a,
      { ...a, url: `${a.url}?utm=x` },
      post("linkedin", "2"),
      post("x", "3", { url: "" }),
      post("x", "4", { url: "" }),
      post("linkedin", "2"),
    ];
    const once = dedupeByUrl(input);
    expect(dedupeByUrl(once)).toEqual(once);
    expect(once.map((p) => p.title)).toEqual(["reddit post 1", "linkedin post 2", "x post 3"]);
  });

  it("returns [] for []", () => {
    expect(dedupeByUrl([])).toEqual([]);
  });
});
