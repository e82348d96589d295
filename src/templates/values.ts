import type { FieldDescriptor, FieldValue } from "../types/schema";

const pad = (value: number) => String(value).padStart(2, "0");

const formatDateTime = (value: string) => {
  const parsed = new Date(value);
  if (Number.isNaN(parsed.getTime())) return value;
  return `${parsed.getUTCFullYear()}-${pad(parsed.getUTCMonth() + 1)}-${pad(parsed.getUTCDate())} ${pad(
    parsed.getUTCHours()
  )}:${pad(parsed.getUTCMinutes())}`;
};

const choiceLabel = (descriptor: FieldDescriptor, value: string) =>
  descriptor.choices?.find((choice) => choice.value === value)?.label;

export const displayValue = (descriptor: FieldDescriptor, value: FieldValue | undefined, emptyText: string) => {
  if (value === null || value === undefined || value === "") return emptyText;
  if (typeof value === "boolean") return value ? "Yes" : "No";
  if (descriptor.semanticType === "boolean") {
    return value === "true" || value === 1 ? "Yes" : "No";
  }
  const text = String(value);
  if (descriptor.declaredType === "datetime") return formatDateTime(text);
  if (descriptor.multiple) {
    return text
      .split(",")
      .map((entry) => choiceLabel(descriptor, entry) ?? entry)
      .join(", ");
  }
  return choiceLabel(descriptor, text) ?? text;
};

export const inputValue = (descriptor: FieldDescriptor, value: FieldValue | undefined) => {
  if (value === null || value === undefined) return "";
  const text = String(value);
  if (descriptor.declaredType === "datetime" && /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}/.test(text)) {
    return formatDateTime(text).replace(" ", "T");
  }
  return text;
};
