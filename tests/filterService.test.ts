import { buildSearchClause, matchesSearch } from "../src/services/filterService";

describe("filterService", () => {
  it("builds an OR clause across search fields", () => {
    expect(buildSearchClause(["title", "owner_email"], "Ada")).toEqual({
      logic: "OR",
      rules: [
        { fieldKey: "title", operator: "contains", value: "Ada" },
        { fieldKey: "owner_email", operator: "contains", value: "Ada" }
      ]
    });
  });

  it("returns null for an empty query or no fields", () => {
    expect(buildSearchClause(["title"], "")).toBeNull();
    expect(buildSearchClause([], "Ada")).toBeNull();
  });

  it("matches case-insensitive substrings", () => {
    const clause = buildSearchClause(["title", "owner_email"], "ADA");
    expect(matchesSearch({ title: "Meet Ada", owner_email: null }, clause)).toBe(true);
    expect(matchesSearch({ title: "Lunch", owner_email: "ada@example.com" }, clause)).toBe(true);
    expect(matchesSearch({ title: "Lunch", owner_email: "ben@example.com" }, clause)).toBe(false);
  });

  it("honors AND logic and equality rules", () => {
    const clause = buildSearchClause(["title", "owner_email"], "ada", { logic: "AND", operator: "equals" });
    expect(matchesSearch({ title: "Ada", owner_email: "ADA" }, clause)).toBe(true);
    expect(matchesSearch({ title: "Ada", owner_email: "Ada Park" }, clause)).toBe(false);
  });

  it("matches everything without a clause", () => {
    expect(matchesSearch({ title: "Anything" }, null)).toBe(true);
  });
});
