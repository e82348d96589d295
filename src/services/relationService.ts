import type { RecordStore } from "../stores/recordStore";
import type { Choice, FieldSchema, FieldValue, ModelSchema } from "../types/schema";
import { ConfigurationError } from "./serviceError";

export type RelationSource = {
  store: RecordStore;
  labelField: string;
  valueField?: string;
};

// Keyed by the related model name (`references`) or, failing that, the field name.
export type RelationSources = Record<string, RelationSource>;

export type RelationChoices = Record<string, Choice[]>;

const relationTypes = new Set(["foreign_key", "many_to_many"]);

const isBlank = (value: FieldValue | undefined) => value === null || value === undefined || value === "";

export const relationFields = (schema: ModelSchema) =>
  schema.fields.filter((field) => relationTypes.has(field.type));

const sourceKey = (field: FieldSchema) => field.references ?? field.name;

export const assertRelationSources = (schema: ModelSchema, sources: RelationSources) => {
  const known = new Set(relationFields(schema).flatMap((field) => [sourceKey(field), field.name]));
  const unknown = Object.keys(sources).filter((key) => !known.has(key));
  if (unknown.length > 0) {
    throw new ConfigurationError(
      `relations references unknown relation(s) on "${schema.name}": ${unknown.join(", ")}.`
    );
  }
};

export const loadChoices = async (source: RelationSource): Promise<Choice[]> => {
  const total = await source.store.count(null);
  if (total === 0) return [];
  const rows = await source.store.findMany({ search: null, offset: 0, limit: total });
  const valueField = source.valueField ?? "id";
  return rows
    .filter((row) => !isBlank(row[valueField]))
    .map((row) => {
      const value = String(row[valueField]);
      const label = row[source.labelField];
      return { value, label: isBlank(label) ? value : String(label) };
    });
};

export const loadRelationChoices = async (
  schema: ModelSchema,
  sources: RelationSources = {}
): Promise<RelationChoices> => {
  const choices: RelationChoices = {};
  for (const field of relationFields(schema)) {
    const source = sources[sourceKey(field)] ?? sources[field.name];
    if (!source) continue;
    choices[field.name] = await loadChoices(source);
  }
  return choices;
};
