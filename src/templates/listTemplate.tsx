import type { FrameworkRenderer, PaginationLink } from "../frameworks";
import type { CrudUrls } from "../lib/urls";
import { pageLink, pageNumbers, searchPlaceholder } from "../services/listService";
import type { Capabilities, ListPage } from "../types/crud";
import type { FieldDescriptor } from "../types/schema";
import { displayValue } from "./values";

export type ListViewProps = {
  title: string;
  fields: FieldDescriptor[];
  listPage: ListPage;
  searchFields: string[];
  capabilities: Capabilities;
  renderer: FrameworkRenderer;
  urls: CrudUrls;
  primaryKey: string;
};

type SearchFormProps = {
  renderer: FrameworkRenderer;
  searchFields: string[];
  query: string;
  action: string;
};

type RowActionsProps = {
  renderer: FrameworkRenderer;
  capabilities: Capabilities;
  urls: CrudUrls;
  pk: string;
};

export function SearchForm({ renderer, searchFields, query, action }: SearchFormProps) {
  if (searchFields.length === 0) return null;
  return (
    <form method="get" action={action} className={renderer.layoutClassFor("toolbar")}>
      <input
        type="text"
        name="search"
        className={renderer.classFor("input")}
        placeholder={searchPlaceholder(searchFields)}
        defaultValue={query}
      />
      {renderer.renderButton("Search", "primary")}
    </form>
  );
}

export const buildPaginationLinks = (listPage: ListPage, baseUrl: string): PaginationLink[] => {
  if (listPage.pageCount <= 1) return [];
  const links: PaginationLink[] = [];
  const hasPrevious = listPage.page > 1;
  const hasNext = listPage.page < listPage.pageCount;
  links.push(
    hasPrevious
      ? { label: "Previous", href: pageLink(baseUrl, listPage.page - 1, listPage.query) }
      : { label: "Previous", disabled: true }
  );
  pageNumbers(listPage).forEach((number) => {
    links.push(
      number === listPage.page
        ? { label: String(number), active: true }
        : { label: String(number), href: pageLink(baseUrl, number, listPage.query) }
    );
  });
  links.push(
    hasNext
      ? { label: "Next", href: pageLink(baseUrl, listPage.page + 1, listPage.query) }
      : { label: "Next", disabled: true }
  );
  return links;
};

function RowActions({ renderer, capabilities, urls, pk }: RowActionsProps) {
  if (!capabilities.canRead && !capabilities.canUpdate && !capabilities.canDelete) {
    return <span className={renderer.layoutClassFor("muted")}>No actions available</span>;
  }
  return (
    <div className={renderer.layoutClassFor("actions_group")} role="group">
      {capabilities.canRead ? renderer.renderButton("View", "info", { href: urls.view(pk), small: true }) : null}
      {capabilities.canUpdate ? renderer.renderButton("Edit", "warning", { href: urls.edit(pk), small: true }) : null}
      {capabilities.canDelete ? renderer.renderButton("Delete", "danger", { href: urls.delete(pk), small: true }) : null}
    </div>
  );
}

export default function ListView({
  title,
  fields,
  listPage,
  searchFields,
  capabilities,
  renderer,
  urls,
  primaryKey
}: ListViewProps) {
  const headers = [...fields.map((field) => field.label), "Actions"];
  const rows = listPage.rows.map((row) => {
    const pk = String(row[primaryKey] ?? "");
    return [
      ...fields.map((field) => displayValue(field, row[field.name], "-")),
      <RowActions key="actions" renderer={renderer} capabilities={capabilities} urls={urls} pk={pk} />
    ];
  });
  const links = buildPaginationLinks(listPage, urls.list);

  return (
    <div className="crud-list-view">
      <div className={renderer.layoutClassFor("header")}>
        <h2>{title}</h2>
        {capabilities.canCreate ? renderer.renderButton("Add New", "primary", { href: urls.create }) : null}
      </div>
      <SearchForm renderer={renderer} searchFields={searchFields} query={listPage.query} action={urls.list} />
      <div className={renderer.layoutClassFor("summary")}>
        <small className={renderer.layoutClassFor("muted")}>
          {`Showing ${listPage.startIndex}-${listPage.endIndex} of ${listPage.total} items`}
        </small>
      </div>
      <div className={renderer.tableClassFor("table_responsive")}>{renderer.renderTable(headers, rows)}</div>
      {listPage.rows.length === 0 ? <p className={renderer.layoutClassFor("muted")}>No items found.</p> : null}
      {links.length > 0 ? renderer.renderPagination(links) : null}
    </div>
  );
}
