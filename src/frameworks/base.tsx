import type { ReactElement, ReactNode } from "react";
import type { FieldDescriptor } from "../types/schema";

export type WidgetKind =
  | "form"
  | "field"
  | "label"
  | "input"
  | "textarea"
  | "select"
  | "checkbox"
  | "submit"
  | "error"
  | "help_text";

export type TablePart = "table" | "table_responsive" | "thead" | "tbody" | "tr" | "th" | "td" | "actions";

export type ButtonVariant = "primary" | "secondary" | "success" | "danger" | "warning" | "info" | "light" | "dark";

export type LayoutPart =
  | "header"
  | "toolbar"
  | "summary"
  | "muted"
  | "actions_group"
  | "small_button"
  | "alert"
  | "invalid";

export type RenderableField = {
  descriptor: FieldDescriptor;
  value: string;
  errors: string[];
};

export type PaginationLink = {
  label: string;
  href?: string;
  active?: boolean;
  disabled?: boolean;
};

export type ButtonOptions = {
  href?: string;
  small?: boolean;
};

export interface FrameworkRenderer {
  readonly name: string;
  classFor(kind: WidgetKind): string;
  tableClassFor(part: TablePart): string;
  buttonClassFor(variant: ButtonVariant): string;
  layoutClassFor(part: LayoutPart): string;
  renderField(field: RenderableField): ReactElement;
  renderTable(headers: string[], rows: ReactNode[][]): ReactElement;
  renderButton(text: string, variant: ButtonVariant, options?: ButtonOptions): ReactElement;
  renderPagination(links: PaginationLink[]): ReactElement;
}

// Empty class lists come back undefined so React leaves the attribute out.
export const joinClasses = (...classes: Array<string | false | undefined>) =>
  classes.filter((value): value is string => Boolean(value)).join(" ") || undefined;

const selectedValues = (value: string) => value.split(",").filter((entry) => entry !== "");

export abstract class BaseFramework implements FrameworkRenderer {
  abstract readonly name: string;
  protected abstract readonly formClasses: Record<WidgetKind, string>;
  protected abstract readonly tableClasses: Record<TablePart, string>;
  protected abstract readonly buttonClasses: Record<ButtonVariant, string>;
  protected abstract readonly layoutClasses: Record<LayoutPart, string>;

  classFor(kind: WidgetKind) {
    return this.formClasses[kind];
  }

  tableClassFor(part: TablePart) {
    return this.tableClasses[part];
  }

  buttonClassFor(variant: ButtonVariant) {
    return this.buttonClasses[variant];
  }

  layoutClassFor(part: LayoutPart) {
    return this.layoutClasses[part];
  }

  abstract renderField(field: RenderableField): ReactElement;

  renderTable(headers: string[], rows: ReactNode[][]) {
    const cell = (part: TablePart) => joinClasses(this.tableClassFor(part));
    return (
      <table className={cell("table")}>
        <thead className={cell("thead")}>
          <tr className={cell("tr")}>
            {headers.map((header, index) => (
              <th key={index} className={cell("th")}>
                {header}
              </th>
            ))}
          </tr>
        </thead>
        <tbody className={cell("tbody")}>
          {rows.map((row, rowIndex) => (
            <tr key={rowIndex} className={cell("tr")}>
              {row.map((content, index) => (
                <td key={index} className={cell("td")}>
                  {content}
                </td>
              ))}
            </tr>
          ))}
        </tbody>
      </table>
    );
  }

  renderButton(text: string, variant: ButtonVariant, options: ButtonOptions = {}) {
    const className = joinClasses(this.buttonClassFor(variant), options.small && this.layoutClassFor("small_button"));
    if (options.href) {
      return (
        <a href={options.href} className={className}>
          {text}
        </a>
      );
    }
    return (
      <button type="submit" className={className}>
        {text}
      </button>
    );
  }

  abstract renderPagination(links: PaginationLink[]): ReactElement;

  protected fieldId(field: RenderableField) {
    return `id_${field.descriptor.name}`;
  }

  protected renderControl(field: RenderableField, className: string | undefined) {
    const { descriptor, value } = field;
    const id = this.fieldId(field);
    const required = descriptor.required && !descriptor.readOnly;

    if (descriptor.widget === "textarea") {
      return (
        <textarea
          className={className}
          name={descriptor.name}
          id={id}
          required={required}
          readOnly={descriptor.readOnly}
          defaultValue={value}
        />
      );
    }

    if (descriptor.widget === "select") {
      const choices = (descriptor.choices ?? []).map((choice) => (
        <option key={choice.value} value={choice.value}>
          {choice.label}
        </option>
      ));
      if (descriptor.multiple) {
        return (
          <select
            className={className}
            name={descriptor.name}
            id={id}
            required={required}
            disabled={descriptor.readOnly}
            multiple
            defaultValue={selectedValues(value)}
          >
            {choices}
          </select>
        );
      }
      return (
        <select
          className={className}
          name={descriptor.name}
          id={id}
          required={required}
          disabled={descriptor.readOnly}
          defaultValue={value || undefined}
        >
          <option value="">Choose...</option>
          {choices}
        </select>
      );
    }

    if (descriptor.widget === "checkbox") {
      return (
        <input
          className={className}
          type="checkbox"
          name={descriptor.name}
          id={id}
          value="true"
          defaultChecked={value === "true"}
          disabled={descriptor.readOnly}
        />
      );
    }

    return (
      <input
        type={descriptor.inputType}
        className={className}
        name={descriptor.name}
        id={id}
        required={required}
        readOnly={descriptor.readOnly}
        defaultValue={descriptor.inputType === "file" ? undefined : value}
      />
    );
  }
}
