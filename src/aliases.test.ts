import { describe, expect, it } from "vitest";
import { AND, CT, EQ, GT, GTE, LT, LTE, NE, NOT, OR, Q } from "./aliases.js";
import { and, contains, gt, gte, is, isNot, lt, lte, not, or, query } from "./filter/ast.js";

describe("short builder names", () => {
  it("build the same trees as the long names", () => {
    expect(Q(AND(EQ("a", 1), NOT(GT("b", 2)), OR(NE("c", "x"), CT("Tags", "go")))))
        .toEqual(query(and(is("a", 1), not(gt("b", 2)), or(isNot("c", "x"), contains("Tags", "go")))));
    expect(Q(OR(GTE("n", 1), LT("n", 5), LTE("m", 0.5)))).toEqual(query(or(gte("n", 1), lt("n", 5), lte("m", 0.5))));
  });
});
