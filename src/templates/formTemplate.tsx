import { Fragment } from "react";
import type { FrameworkRenderer } from "../frameworks";
import { joinClasses } from "../frameworks/base";
import { nonFieldErrorsKey } from "../services/validationService";
import type { FieldErrors } from "../types/crud";
import type { FieldDescriptor } from "../types/schema";

export type FormViewProps = {
  title: string;
  fields: FieldDescriptor[];
  values: Record<string, string>;
  errors: FieldErrors;
  renderer: FrameworkRenderer;
  action: string;
  cancelUrl: string;
  submitLabel: string;
};

// Errors keyed by something other than a rendered field are shown above the form.
export const collectNonFieldErrors = (fields: FieldDescriptor[], errors: FieldErrors) => {
  const names = new Set(fields.map((field) => field.name));
  return Object.entries(errors)
    .filter(([key]) => key === nonFieldErrorsKey || !names.has(key))
    .flatMap(([, messages]) => messages);
};

export default function FormView({
  title,
  fields,
  values,
  errors,
  renderer,
  action,
  cancelUrl,
  submitLabel
}: FormViewProps) {
  const nonFieldErrors = collectNonFieldErrors(fields, errors);

  return (
    <div className="crud-form-view">
      <h2>{title}</h2>
      {nonFieldErrors.length > 0 ? (
        <div className={renderer.layoutClassFor("alert")} role="alert">
          {nonFieldErrors.map((message, index) => (
            <div key={index}>{message}</div>
          ))}
        </div>
      ) : null}
      <form method="post" action={action} className={joinClasses(renderer.classFor("form"))} noValidate>
        {fields.map((descriptor) => (
          <Fragment key={descriptor.name}>
            {renderer.renderField({
              descriptor,
              value: values[descriptor.name] ?? "",
              errors: errors[descriptor.name] ?? []
            })}
          </Fragment>
        ))}
        <div className={renderer.layoutClassFor("toolbar")}>
          {renderer.renderButton(submitLabel, "primary")}
          {renderer.renderButton("Cancel", "secondary", { href: cancelUrl })}
        </div>
      </form>
    </div>
  );
}
