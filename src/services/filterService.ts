import type { FilterLogic, FilterRule, SearchClause } from "../types/filters";
import type { FieldValue } from "../types/schema";

type SearchClauseOptions = {
  logic?: FilterLogic;
  operator?: FilterRule["operator"];
};

export const normalizeSearchTerm = (query: unknown) => (typeof query === "string" ? query : "");

export const buildSearchClause = (
  searchFields: string[],
  query: string,
  options: SearchClauseOptions = {}
): SearchClause | null => {
  const value = normalizeSearchTerm(query);
  if (!value) return null;

  const operator = options.operator ?? "contains";
  const rules: FilterRule[] = [];
  searchFields.forEach((fieldKey) => {
    const key = fieldKey.trim();
    if (!key) return;
    rules.push({ fieldKey: key, operator, value });
  });

  if (rules.length === 0) {
    return null;
  }

  return { logic: options.logic ?? "OR", rules };
};

const toSearchable = (value: FieldValue | undefined) => String(value ?? "").toLowerCase();

const matchesRule = (row: Record<string, FieldValue>, rule: FilterRule) => {
  const actual = toSearchable(row[rule.fieldKey]);
  const expected = rule.value.toLowerCase();
  if (rule.operator === "equals") {
    return actual === expected;
  }
  return actual.includes(expected);
};

export const matchesSearch = (row: Record<string, FieldValue>, clause: SearchClause | null) => {
  if (!clause) return true;
  if (clause.logic === "AND") {
    return clause.rules.every((rule) => matchesRule(row, rule));
  }
  return clause.rules.some((rule) => matchesRule(row, rule));
};
