import type { CrudAction, PermissionMap, ViewConfiguration, ViewOptions } from "../types/crud";
import type { ModelSchema } from "../types/schema";
import { settings } from "../lib/config";
import { fieldNames, primaryKeyOf, validateSchema } from "./fieldService";
import { ConfigurationError } from "./serviceError";

export const crudActions: readonly CrudAction[] = ["create", "read", "update", "delete"];

export const defaultExcludeFields = ["id", "created_at", "updated_at"];

const isCrudAction = (value: string): value is CrudAction =>
  crudActions.some((action) => action === value);

const assertKnownFields = (schema: ModelSchema, option: string, names: string[]) => {
  const known = new Set(fieldNames(schema));
  const unknown = names.filter((name) => !known.has(name));
  if (unknown.length > 0) {
    throw new ConfigurationError(
      `${option} references unknown field(s) on "${schema.name}": ${unknown.join(", ")}.`
    );
  }
};

const normalizePermissions = (input: PermissionMap | undefined): PermissionMap => {
  if (!input) return {};
  const permissions: PermissionMap = {};
  for (const [action, roles] of Object.entries(input)) {
    if (!isCrudAction(action)) {
      throw new ConfigurationError(`permissions has unknown action "${action}".`);
    }
    if (roles === undefined) continue;
    if (!Array.isArray(roles) || roles.some((role) => typeof role !== "string")) {
      throw new ConfigurationError(`permissions.${action} must be a list of role names.`);
    }
    permissions[action] = [...roles];
  }
  return permissions;
};

export const resolveViewConfig = (schema: ModelSchema, options: ViewOptions = {}): ViewConfiguration => {
  validateSchema(schema);
  const names = fieldNames(schema);
  const primaryKey = primaryKeyOf(schema);

  const excludeFields = options.excludeFields ? [...options.excludeFields] : [];
  assertKnownFields(schema, "excludeFields", excludeFields);
  const excluded = new Set(excludeFields);
  // Bookkeeping columns stay off forms only; lists and detail pages may show them.
  const formExcludeFields = options.excludeFields
    ? [...excludeFields]
    : defaultExcludeFields.filter((name) => names.includes(name));

  let listFields: string[];
  if (options.listFields) {
    assertKnownFields(schema, "listFields", options.listFields);
    const clashing = options.listFields.filter((name) => excluded.has(name));
    if (clashing.length > 0) {
      throw new ConfigurationError(`listFields includes excluded field(s): ${clashing.join(", ")}.`);
    }
    listFields = [...options.listFields];
  } else {
    listFields = names.filter((name) => name !== primaryKey && !excluded.has(name));
  }

  const readOnlyFields = options.readOnlyFields ? [...options.readOnlyFields] : [];
  assertKnownFields(schema, "readOnlyFields", readOnlyFields);

  const searchFields = options.searchFields
    ? [...options.searchFields]
    : options.searchField
      ? [options.searchField]
      : [];
  assertKnownFields(schema, "searchFields", searchFields);

  const perPage = options.perPage ?? settings.perPage;
  if (!Number.isInteger(perPage) || perPage < 1) {
    throw new ConfigurationError(`perPage must be a positive integer, got ${String(perPage)}.`);
  }

  return {
    framework: options.framework ?? settings.framework,
    excludeFields,
    formExcludeFields,
    listFields,
    readOnlyFields,
    perPage,
    searchFields,
    readOnlyMode: options.readOnlyMode ?? false,
    permissions: normalizePermissions(options.permissions),
    permissionRequired: options.permissionRequired ?? null
  };
};
