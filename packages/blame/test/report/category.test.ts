import { describe, test, expect } from "vitest";

import { categoryPhrase } from "../../src/report/category.js";
import { CONSTRAINT_CATEGORIES, compareCategories, isInterestingCategory } from "../../src/model/constraint.js";

describe("category phrases", () => {
  test("each phrase ends in exactly one space, or is empty", () => {
    for (const category of CONSTRAINT_CATEGORIES) {
      const phrase = categoryPhrase(category);
      if (phrase === "") continue;
      expect(phrase.endsWith(" "), category).toBe(true);
      expect(phrase.endsWith("  "), category).toBe(false);
    }
  });

  test("uninteresting categories say nothing", () => {
    expect(categoryPhrase("Boring")).toBe("");
    expect(categoryPhrase("BoringNoLocation")).toBe("");
    expect(categoryPhrase("Internal")).toBe("");
    expect(categoryPhrase("OpaqueType")).toBe("opaque type ");
  });

  test("phrases for the common categories", () => {
    expect(categoryPhrase("Assignment")).toBe("assignment ");
    expect(categoryPhrase("Return")).toBe("returning this value ");
    expect(categoryPhrase("CallArgument")).toBe("argument ");
    expect(categoryPhrase("SizedBound")).toBe("proving this value is `Sized` ");
  });
});

describe("category order", () => {
  test("Return ranks first and Internal last", () => {
    const sorted = [...CONSTRAINT_CATEGORIES].reverse().sort(compareCategories);
    expect(sorted).toEqual([...CONSTRAINT_CATEGORIES]);
    expect(sorted[0]).toBe("Return");
    expect(compareCategories("CallArgument", "Assignment")).toBeLessThan(0);
  });

  test("only bookkeeping categories are uninteresting", () => {
    const uninteresting = CONSTRAINT_CATEGORIES.filter((c) => !isInterestingCategory(c));
    expect(uninteresting).toEqual(["OpaqueType", "Boring", "BoringNoLocation", "Internal"]);
  });
});
