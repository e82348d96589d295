export type DeclaredFieldType =
  | "auto"
  | "char"
  | "text"
  | "email"
  | "url"
  | "slug"
  | "integer"
  | "decimal"
  | "float"
  | "boolean"
  | "date"
  | "datetime"
  | "time"
  | "file"
  | "image"
  | "foreign_key"
  | "many_to_many"
  | "json";

export type FieldValue = string | number | boolean | null;

export type Choice = {
  value: string;
  label: string;
};

export type FieldSchema = {
  name: string;
  type: DeclaredFieldType;
  label?: string;
  required?: boolean;
  editable?: boolean;
  choices?: Choice[];
  helpText?: string;
  /** Related model name, used to find the relation's choice source. Defaults to the field name. */
  references?: string;
};

export type ModelSchema = {
  name: string;
  verboseName?: string;
  verboseNamePlural?: string;
  primaryKey?: string;
  fields: FieldSchema[];
};

export type SemanticType = "text" | "number" | "date" | "boolean" | "choice" | "relation" | "file";

export type FieldWidget = "input" | "textarea" | "select" | "checkbox";

export type FieldDescriptor = {
  readonly name: string;
  readonly declaredType: DeclaredFieldType;
  readonly semanticType: SemanticType;
  readonly widget: FieldWidget;
  readonly inputType: string;
  readonly label: string;
  readonly required: boolean;
  readonly readOnly: boolean;
  readonly choices?: readonly Choice[];
  readonly helpText?: string;
  readonly multiple?: boolean;
};

export type RecordRow = Record<string, FieldValue>;
