import type { FieldErrors, SubmittedValues, ViewConfiguration } from "../types/crud";
import type { FieldDescriptor, ModelSchema, RecordRow } from "../types/schema";
import type { RecordStore } from "../stores/recordStore";
import { StoreConstraintError } from "../stores/recordStore";
import { describeFields, primaryKeyOf } from "./fieldService";
import type { RelationChoices } from "./relationService";
import { nonFieldErrorsKey, validateSubmission } from "./validationService";
import type { ValidationMode } from "./validationService";

type FormConfig = Pick<ViewConfiguration, "formExcludeFields" | "readOnlyFields">;

export type FormSubmission =
  | { status: "saved"; record: RecordRow }
  | { status: "invalid"; errors: FieldErrors }
  | { status: "missing" };

export const buildFormFields = (
  schema: ModelSchema,
  config: FormConfig,
  choices: RelationChoices = {}
): FieldDescriptor[] => {
  const excluded = new Set(config.formExcludeFields);
  const primaryKey = primaryKeyOf(schema);
  return describeFields(schema, { readOnlyFields: config.readOnlyFields, choices }).filter(
    (field) => field.name !== primaryKey && !excluded.has(field.name)
  );
};

export const submitForm = async ({
  store,
  fields,
  input,
  mode,
  pk
}: {
  store: RecordStore;
  fields: FieldDescriptor[];
  input: SubmittedValues;
  mode: ValidationMode;
  pk?: string;
}): Promise<FormSubmission> => {
  const result = validateSubmission({ fields, input, mode });
  if (!result.ok) {
    return { status: "invalid", errors: result.errors };
  }

  try {
    if (mode === "update") {
      if (!pk) return { status: "missing" };
      const record = await store.update(pk, result.values);
      return record ? { status: "saved", record } : { status: "missing" };
    }
    const record = await store.create(result.values);
    return { status: "saved", record };
  } catch (error) {
    if (error instanceof StoreConstraintError) {
      const known = error.field && fields.some((field) => field.name === error.field && !field.readOnly);
      const key = known && error.field ? error.field : nonFieldErrorsKey;
      return { status: "invalid", errors: { [key]: [error.message] } };
    }
    throw error;
  }
};
