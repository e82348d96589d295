import type { FieldValue, RecordRow } from "./schema";

export type CrudAction = "create" | "read" | "update" | "delete";

export type ViewAction = "list" | "create" | "view" | "edit" | "delete";

export type PermissionMap = Partial<Record<CrudAction, string[]>>;

export type Actor = {
  id?: string;
  roles: string[];
  permissions?: string[];
  isSuperuser?: boolean;
};

export type ViewConfiguration = {
  framework: string;
  excludeFields: string[];
  formExcludeFields: string[];
  listFields: string[];
  readOnlyFields: string[];
  perPage: number;
  searchFields: string[];
  readOnlyMode: boolean;
  permissions: PermissionMap;
  permissionRequired: string | null;
};

export type ViewOptions = Partial<Omit<ViewConfiguration, "formExcludeFields">> & {
  searchField?: string;
};

export type Capabilities = {
  canCreate: boolean;
  canRead: boolean;
  canUpdate: boolean;
  canDelete: boolean;
};

export type FieldErrors = Record<string, string[]>;

export type SubmittedValues = Record<string, unknown>;

export type CrudRequest = {
  action: string;
  pk?: string;
  method: "GET" | "POST";
  actor: Actor;
  query?: Record<string, unknown>;
  body?: SubmittedValues;
  basePath: string;
};

export type CrudResult =
  | { kind: "page"; status: number; html: string }
  | { kind: "redirect"; status: 303; location: string; values?: RecordRow }
  | { kind: "denied"; status: 403; message: string }
  | { kind: "not_found"; status: 404; message: string };

export type ListPage<Row = RecordRow> = {
  rows: Row[];
  total: number;
  page: number;
  pageCount: number;
  perPage: number;
  startIndex: number;
  endIndex: number;
  query: string;
};

export type FormValues = Record<string, FieldValue>;
