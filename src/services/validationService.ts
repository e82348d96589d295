import type { FieldErrors, FormValues, SubmittedValues } from "../types/crud";
import type { FieldDescriptor, FieldValue } from "../types/schema";
import { ValidationError } from "./serviceError";

export type ValidationMode = "create" | "update";

export type SubmissionResult = { ok: true; values: FormValues } | { ok: false; errors: FieldErrors };

type Coercion = { value: FieldValue } | { error: string };

const truthyValues = new Set(["true", "on", "1", "yes"]);
const falsyValues = new Set(["false", "off", "0", "no"]);
const integerTypes = new Set(["integer", "auto"]);
const numericTypes = new Set(["integer", "decimal", "float", "auto"]);
const emailPattern = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;
const datePattern = /^\d{4}-\d{2}-\d{2}$/;
const timePattern = /^([01]\d|2[0-3]):[0-5]\d(:[0-5]\d)?$/;
const integerPattern = /^[+-]?\d+$/;
const decimalPattern = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

export const nonFieldErrorsKey = "__all__";

const toRawString = (value: unknown) => {
  if (Array.isArray(value)) return value.map((entry) => String(entry)).join(",");
  if (value === null || value === undefined) return "";
  return String(value).trim();
};

const isValueProvided = (value: unknown) => toRawString(value) !== "";

const coerceNumber = (field: FieldDescriptor, raw: string): Coercion => {
  if (integerTypes.has(field.declaredType)) {
    if (!integerPattern.test(raw)) {
      return { error: "Enter a whole number." };
    }
    const parsed = Number(raw);
    if (parsed > Number.MAX_SAFE_INTEGER) {
      return { error: `Ensure this value is less than or equal to ${Number.MAX_SAFE_INTEGER}.` };
    }
    if (parsed < Number.MIN_SAFE_INTEGER) {
      return { error: `Ensure this value is greater than or equal to ${Number.MIN_SAFE_INTEGER}.` };
    }
    return { value: parsed };
  }
  // Number() also reads hex, binary and "Infinity"; only plain decimal notation is accepted.
  const parsed = decimalPattern.test(raw) ? Number(raw) : Number.NaN;
  if (!Number.isFinite(parsed)) {
    return { error: "Enter a number." };
  }
  return { value: parsed };
};

const coerceBoolean = (raw: string): Coercion => {
  const normalized = raw.toLowerCase();
  if (truthyValues.has(normalized)) return { value: true };
  if (falsyValues.has(normalized)) return { value: false };
  return { error: "Select a valid choice." };
};

const coerceDate = (field: FieldDescriptor, raw: string): Coercion => {
  if (field.declaredType === "time") {
    return timePattern.test(raw) ? { value: raw } : { error: "Enter a valid time." };
  }
  if (field.declaredType === "date") {
    const valid = datePattern.test(raw) && !Number.isNaN(Date.parse(`${raw}T00:00:00Z`));
    return valid ? { value: raw } : { error: "Enter a valid date." };
  }
  return Number.isNaN(Date.parse(raw)) ? { error: "Enter a valid date/time." } : { value: raw };
};

const coerceText = (field: FieldDescriptor, raw: string): Coercion => {
  if (field.declaredType === "email" && !emailPattern.test(raw)) {
    return { error: "Enter a valid email address." };
  }
  if (field.declaredType === "url") {
    try {
      new URL(raw);
    } catch {
      return { error: "Enter a valid URL." };
    }
  }
  return { value: raw };
};

const coerceChoice = (field: FieldDescriptor, raw: string): Coercion => {
  const allowed = new Set((field.choices ?? []).map((choice) => choice.value));
  if (!allowed.has(raw)) {
    return { error: `Select a valid choice. ${raw} is not one of the available choices.` };
  }
  if (numericTypes.has(field.declaredType)) {
    return coerceNumber(field, raw);
  }
  return { value: raw };
};

const coerceChoiceList = (field: FieldDescriptor, raw: string): Coercion => {
  const picked = raw
    .split(",")
    .map((value) => value.trim())
    .filter((value) => value !== "");
  for (const value of picked) {
    const checked = coerceChoice(field, value);
    if ("error" in checked) return checked;
  }
  return { value: picked.join(",") };
};

const coerceChoiceBoolean = (field: FieldDescriptor, raw: string): Coercion => {
  const checked = coerceChoice(field, raw);
  return "error" in checked ? checked : coerceBoolean(raw);
};

export const coerceFieldValue = (field: FieldDescriptor, raw: string): Coercion => {
  switch (field.semanticType) {
    case "number":
      return coerceNumber(field, raw);
    case "boolean":
      return field.widget === "select" ? coerceChoiceBoolean(field, raw) : coerceBoolean(raw);
    case "date":
      return coerceDate(field, raw);
    case "choice":
      return coerceChoice(field, raw);
    case "relation":
      if (!field.choices) return { value: raw };
      return field.multiple ? coerceChoiceList(field, raw) : coerceChoice(field, raw);
    default:
      return coerceText(field, raw);
  }
};

const addError = (errors: FieldErrors, key: string, message: string) => {
  errors[key] = [...(errors[key] ?? []), message];
};

export const validateSubmission = ({
  fields,
  input,
  mode
}: {
  fields: FieldDescriptor[];
  input: SubmittedValues;
  mode: ValidationMode;
}): SubmissionResult => {
  const errors: FieldErrors = {};
  const values: FormValues = {};
  const fieldMap = new Map(fields.map((field) => [field.name, field]));

  for (const key of Object.keys(input)) {
    if (!fieldMap.has(key)) {
      addError(errors, key, `Unknown field "${key}".`);
    }
  }

  for (const field of fields) {
    if (field.readOnly) continue;
    const rawValue = input[field.name];

    if (field.widget === "checkbox") {
      const coerced = isValueProvided(rawValue) ? coerceBoolean(toRawString(rawValue)) : { value: false };
      if ("error" in coerced) {
        addError(errors, field.name, coerced.error);
      } else if (field.required && coerced.value === false) {
        addError(errors, field.name, "This field is required.");
      } else {
        values[field.name] = coerced.value;
      }
      continue;
    }

    if (!isValueProvided(rawValue)) {
      if (field.required) {
        addError(errors, field.name, "This field is required.");
      } else if (mode === "create" || field.name in input) {
        values[field.name] = null;
      }
      continue;
    }

    const coerced = coerceFieldValue(field, toRawString(rawValue));
    if ("error" in coerced) {
      addError(errors, field.name, coerced.error);
    } else {
      values[field.name] = coerced.value;
    }
  }

  if (Object.keys(errors).length > 0) {
    return { ok: false, errors };
  }
  return { ok: true, values };
};

export const assertValid = (result: SubmissionResult): FormValues => {
  if (!result.ok) {
    throw new ValidationError(result.errors);
  }
  return result.values;
};
