import type {
  Choice,
  DeclaredFieldType,
  FieldDescriptor,
  FieldSchema,
  FieldWidget,
  ModelSchema,
  SemanticType
} from "../types/schema";
import { ConfigurationError } from "./serviceError";

type FieldClassification = {
  semanticType: SemanticType;
  widget: FieldWidget;
  inputType: string;
};

const fieldClassifications: Record<DeclaredFieldType, FieldClassification> = {
  auto: { semanticType: "number", widget: "input", inputType: "number" },
  char: { semanticType: "text", widget: "input", inputType: "text" },
  slug: { semanticType: "text", widget: "input", inputType: "text" },
  json: { semanticType: "text", widget: "textarea", inputType: "textarea" },
  email: { semanticType: "text", widget: "input", inputType: "email" },
  url: { semanticType: "text", widget: "input", inputType: "url" },
  text: { semanticType: "text", widget: "textarea", inputType: "textarea" },
  integer: { semanticType: "number", widget: "input", inputType: "number" },
  decimal: { semanticType: "number", widget: "input", inputType: "number" },
  float: { semanticType: "number", widget: "input", inputType: "number" },
  boolean: { semanticType: "boolean", widget: "checkbox", inputType: "checkbox" },
  date: { semanticType: "date", widget: "input", inputType: "date" },
  datetime: { semanticType: "date", widget: "input", inputType: "datetime-local" },
  time: { semanticType: "date", widget: "input", inputType: "time" },
  file: { semanticType: "file", widget: "input", inputType: "file" },
  image: { semanticType: "file", widget: "input", inputType: "file" },
  foreign_key: { semanticType: "relation", widget: "input", inputType: "text" },
  many_to_many: { semanticType: "relation", widget: "input", inputType: "text" }
};

export const booleanChoices: readonly Choice[] = Object.freeze([
  { value: "true", label: "Yes" },
  { value: "false", label: "No" }
]);

export const humanizeFieldName = (name: string) =>
  name
    .split("_")
    .filter((part) => part.length > 0)
    .map((part) => part.charAt(0).toUpperCase() + part.slice(1).toLowerCase())
    .join(" ");

export const primaryKeyOf = (schema: ModelSchema) => schema.primaryKey ?? "id";

export const fieldNames = (schema: ModelSchema) => schema.fields.map((field) => field.name);

export const validateSchema = (schema: ModelSchema) => {
  if (!schema.name || schema.name.trim() === "") {
    throw new ConfigurationError("Model schema requires a name.");
  }
  const seen = new Set<string>();
  for (const field of schema.fields) {
    if (!field.name || field.name.trim() === "") {
      throw new ConfigurationError(`Model "${schema.name}" declares a field without a name.`);
    }
    if (seen.has(field.name)) {
      throw new ConfigurationError(`Model "${schema.name}" declares "${field.name}" more than once.`);
    }
    if (!(field.type in fieldClassifications)) {
      throw new ConfigurationError(`Field "${field.name}" has unsupported type "${field.type}".`);
    }
    seen.add(field.name);
  }
};

const isAlwaysReadOnly = (field: FieldSchema) => field.type === "auto" || field.editable === false;

const isRequiredByDefault = (field: FieldSchema) => {
  if (isAlwaysReadOnly(field)) return false;
  if (field.type === "boolean") return false;
  return true;
};

// Relations render as a select once choices are declared or loaded from a related store,
// and as a plain key input otherwise.
export const describeField = (
  field: FieldSchema,
  readOnly = false,
  loadedChoices?: readonly Choice[]
): FieldDescriptor => {
  const classification = fieldClassifications[field.type];
  const declaredChoices = loadedChoices ?? (field.choices && field.choices.length > 0 ? field.choices : undefined);
  let { semanticType, widget, inputType } = classification;
  let choices: readonly Choice[] | undefined = declaredChoices;

  if (field.type === "boolean") {
    choices = declaredChoices ?? booleanChoices;
    if (declaredChoices) {
      widget = "select";
      inputType = "select";
    }
  } else if (declaredChoices) {
    if (semanticType !== "relation") semanticType = "choice";
    widget = "select";
    inputType = "select";
  }

  const alwaysReadOnly = isAlwaysReadOnly(field);
  const descriptor: FieldDescriptor = {
    name: field.name,
    declaredType: field.type,
    semanticType,
    widget,
    inputType,
    label: field.label ?? humanizeFieldName(field.name),
    required: alwaysReadOnly ? false : field.required ?? isRequiredByDefault(field),
    readOnly: alwaysReadOnly || readOnly,
    ...(choices ? { choices: Object.freeze(choices.map((choice) => ({ ...choice }))) } : {}),
    ...(field.helpText ? { helpText: field.helpText } : {}),
    ...(field.type === "many_to_many" ? { multiple: true } : {})
  };
  return Object.freeze(descriptor);
};

export const describeFields = (
  schema: ModelSchema,
  options: { only?: string[]; readOnlyFields?: string[]; choices?: Record<string, readonly Choice[]> } = {}
): FieldDescriptor[] => {
  const readOnly = new Set(options.readOnlyFields ?? []);
  const choices = options.choices ?? {};
  if (!options.only) {
    return schema.fields.map((field) => describeField(field, readOnly.has(field.name), choices[field.name]));
  }

  const fieldMap = new Map(schema.fields.map((field) => [field.name, field]));
  return options.only.map((name) => {
    const field = fieldMap.get(name);
    if (!field) {
      throw new ConfigurationError(`Model "${schema.name}" has no field "${name}".`);
    }
    return describeField(field, readOnly.has(name), choices[name]);
  });
};

export const verboseName = (schema: ModelSchema) => schema.verboseName ?? humanizeFieldName(schema.name);

export const verboseNamePlural = (schema: ModelSchema) =>
  schema.verboseNamePlural ?? `${verboseName(schema)}s`;
