import { describe, expect, it } from "vitest";
import { extractWeight, formatEdgeLine, isEdgeLine, parseEdgeLine } from "./annotation.js";

describe("extractWeight", () => {
  it("reads the number after 'edge weight'", () => {
    expect(extractWeight("edge weight 3.5")).toEqual({ weight: 3.5, fallback: null });
  });

  it("falls back to 'cost' when there is no weight token", () => {
    expect(extractWeight("cost 12")).toEqual({ weight: 12, fallback: null });
  });

  it("prefers the weight token over cost", () => {
    expect(extractWeight("demand 2 weight 7")).toEqual({ weight: 7, fallback: null });
  });

  it("uses 1.0 and flags a missing token", () => {
    expect(extractWeight("demand 4")).toEqual({ weight: 1, fallback: "missing" });
    expect(extractWeight("")).toEqual({ weight: 1, fallback: "missing" });
  });

  it("uses 1.0 quietly when the value does not parse", () => {
    expect(extractWeight("edge weight abc")).toEqual({ weight: 1, fallback: "unparseable" });
    // Trailing text after the number is not accepted
    expect(extractWeight("edge weight 3.0 cost 5")).toEqual({ weight: 1, fallback: "unparseable" });
  });

  it("rejects negative weights", () => {
    expect(extractWeight("edge weight -2")).toEqual({ weight: 1, fallback: "unparseable" });
  });

  it("accepts integers and exponents", () => {
    expect(extractWeight("edge weight 4").weight).toBe(4);
    expect(extractWeight("edge weight 1e2").weight).toBe(100);
  });
});

describe("parseEdgeLine", () => {
  it("splits the endpoints from the annotation", () => {
    expect(parseEdgeLine("(1,2) edge weight 3.0")).toEqual({ u: 1, v: 2, annotation: "edge weight 3.0" });
  });

  it("tolerates spaces inside the marker", () => {
    expect(parseEdgeLine("  ( 10 , 4 )  cost 2 ")).toEqual({ u: 10, v: 4, annotation: "cost 2" });
  });

  it("returns null for a malformed marker", () => {
    expect(parseEdgeLine("(1;2) edge weight 3")).toBeNull();
    expect(parseEdgeLine("(a,b) edge weight 3")).toBeNull();
  });
});

describe("edge line helpers", () => {
  it("recognises edge lines by their opening parenthesis", () => {
    expect(isEdgeLine("   (3,4) cost 1")).toBe(true);
    expect(isEdgeLine("DEPOT: 1")).toBe(false);
  });

  it("formats edges the way the parser reads them", () => {
    expect(formatEdgeLine(3, 4, 2.5)).toBe("(3,4) edge weight 2.5");
    expect(extractWeight("edge weight 2.5").weight).toBe(2.5);
  });
});
