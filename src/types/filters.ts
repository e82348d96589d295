export type FilterOperator = "equals" | "contains";

export type FilterRule = {
  fieldKey: string;
  operator: FilterOperator;
  value: string;
};

export type FilterLogic = "AND" | "OR";

export type SearchClause = {
  logic: FilterLogic;
  rules: FilterRule[];
};
