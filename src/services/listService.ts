import type { ListPage, ViewConfiguration } from "../types/crud";
import type { RecordRow } from "../types/schema";
import type { RecordStore } from "../stores/recordStore";
import { buildSearchClause, matchesSearch, normalizeSearchTerm } from "./filterService";

export type PageWindow = {
  page: number;
  pageCount: number;
  offset: number;
  limit: number;
};

type ListConfig = Pick<ViewConfiguration, "searchFields" | "perPage">;

export const parsePageNumber = (raw: unknown) => {
  if (typeof raw === "number") {
    return Number.isInteger(raw) && raw > 0 ? raw : 1;
  }
  if (typeof raw !== "string" || !/^\d+$/.test(raw.trim())) return 1;
  const parsed = parseInt(raw.trim(), 10);
  return parsed > 0 ? parsed : 1;
};

export const resolvePageWindow = (total: number, perPage: number, requested: unknown): PageWindow => {
  const pageCount = Math.max(1, Math.ceil(total / perPage));
  const page = Math.min(parsePageNumber(requested), pageCount);
  return { page, pageCount, offset: (page - 1) * perPage, limit: perPage };
};

const buildListPage = <Row>(
  rows: Row[],
  total: number,
  window: PageWindow,
  perPage: number,
  query: string
): ListPage<Row> => ({
  rows,
  total,
  page: window.page,
  pageCount: window.pageCount,
  perPage,
  startIndex: total === 0 ? 0 : window.offset + 1,
  endIndex: window.offset + rows.length,
  query
});

export const listRecords = (
  records: RecordRow[],
  config: ListConfig,
  query: unknown,
  page: unknown
): ListPage => {
  const term = normalizeSearchTerm(query);
  const clause = buildSearchClause(config.searchFields, term);
  const filtered = records.filter((record) => matchesSearch(record, clause));
  const window = resolvePageWindow(filtered.length, config.perPage, page);
  const rows = filtered.slice(window.offset, window.offset + window.limit);
  return buildListPage(rows, filtered.length, window, config.perPage, term);
};

export const loadListPage = async (
  store: RecordStore,
  config: ListConfig,
  query: unknown,
  page: unknown
): Promise<ListPage> => {
  const term = normalizeSearchTerm(query);
  const clause = buildSearchClause(config.searchFields, term);
  const total = await store.count(clause);
  const window = resolvePageWindow(total, config.perPage, page);
  const rows = total === 0 ? [] : await store.findMany({ search: clause, offset: window.offset, limit: window.limit });
  return buildListPage(rows, total, window, config.perPage, term);
};

export const pageLink = (baseUrl: string, page: number, query: string) => {
  const params = new URLSearchParams();
  params.set("page", String(page));
  if (query) params.set("search", query);
  return `${baseUrl}?${params.toString()}`;
};

export const pageNumbers = (listPage: Pick<ListPage, "pageCount">) =>
  Array.from({ length: listPage.pageCount }, (_, index) => index + 1);

export const searchPlaceholder = (searchFields: string[]) => {
  if (searchFields.length === 1) {
    return `Search ${searchFields[0]}...`;
  }
  if (searchFields.length <= 3) {
    return `Search ${searchFields.join(", ")}...`;
  }
  return `Search ${searchFields.slice(0, 2).join(", ")}, and ${searchFields.length - 2} more...`;
};
