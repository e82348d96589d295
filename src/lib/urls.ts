import type { ViewAction } from "../types/crud";

export type CrudRoute = {
  path: string;
  name: string;
  action: ViewAction;
};

export const normalizeBasePath = (basePath: string) => {
  const trimmed = basePath.trim();
  if (!trimmed || trimmed === "/") return "/";
  const withLeading = trimmed.startsWith("/") ? trimmed : `/${trimmed}`;
  return withLeading.endsWith("/") ? withLeading : `${withLeading}/`;
};

export const crudUrlPatterns = (urlPrefix: string, namePrefix?: string): CrudRoute[] => {
  const prefix = urlPrefix.replace(/^\/+|\/+$/g, "");
  const name = namePrefix ?? prefix.replace(/\//g, "_").replace(/^_+|_+$/g, "");
  const base = prefix ? `/${prefix}` : "";
  return [
    { path: `${base}/`, name, action: "list" },
    { path: `${base}/create/`, name: `${name}_create`, action: "create" },
    { path: `${base}/:pk/`, name: `${name}_detail`, action: "view" },
    { path: `${base}/:pk/edit/`, name: `${name}_edit`, action: "edit" },
    { path: `${base}/:pk/delete/`, name: `${name}_delete`, action: "delete" }
  ];
};

export const crudUrls = (basePath: string) => {
  const base = normalizeBasePath(basePath);
  const record = (pk: string) => `${base}${encodeURIComponent(pk)}/`;
  return {
    list: base,
    create: `${base}create/`,
    view: record,
    edit: (pk: string) => `${record(pk)}edit/`,
    delete: (pk: string) => `${record(pk)}delete/`
  };
};

export type CrudUrls = ReturnType<typeof crudUrls>;
