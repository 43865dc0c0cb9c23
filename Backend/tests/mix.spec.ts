// tests/mix.spec.ts
import { describe, it, expect } from "vitest";
import { mixRoundRobin } from "../src/leadgen/mix";
import { post } from "./helpers/fixtures";

describe("mixRoundRobin", () => {
  it("interleaves reddit, linkedin, x by index", () => {
    const r = [post("reddit", "r0"), post("reddit", "r1"), post("reddit", "r2")];
    const l = [post("linkedin", "l0")];
    const x = [post("x", "x0"), post("x", "x1")];

    const ids = mixRoundRobin({ x, linkedin: l, reddit: r }).map((p) => p.title);
    expect(ids).toEqual([
      "reddit post r0", "linkedin post l0", "x post x0",
      "reddit post r1", "x post x1",
      "reddit post r2",
    ]);
  });

  it("skips an empty x list", () => {
    const [r1, r2, r3] = [post("reddit", "1"), post("reddit", "2"), post("reddit", "3")];
    const l1 = post("linkedin", "1");
    expect(mixRoundRobin({ reddit: [r1, r2, r3], linkedin: [l1], x: [] })).toEqual([r1, l1, r2, r3]);
  });

  it("treats missing sources as empty", () => {
    const out = mixRoundRobin({ x: [post("x", "1")] });
    expect(out.map((p) => p.url)).toEqual(["https://x.com/someone/status/1"]);
  });

  it("keeps duplicates (dedupe is a separate step)", () => {
    const dup = post("reddit", "same");
    expect(mixRoundRobin({ reddit: [dup], linkedin: [dup] })).toEqual([dup, dup]);
  });

  it("returns [] when every source is empty", () => {
    expect(mixRoundRobin({ reddit: [], linkedin: [], x: [] })).toEqual([]);
  });
});
