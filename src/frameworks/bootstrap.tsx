import type { ButtonVariant, LayoutPart, PaginationLink, RenderableField, TablePart, WidgetKind } from "./base";
import { BaseFramework, joinClasses } from "./base";

export class BootstrapFramework extends BaseFramework {
  readonly name = "bootstrap5";

  protected readonly formClasses: Record<WidgetKind, string> = {
    form: "needs-validation",
    field: "mb-3",
    label: "form-label",
    input: "form-control",
    textarea: "form-control",
    select: "form-select",
    checkbox: "form-check-input",
    submit: "btn btn-primary",
    error: "invalid-feedback",
    help_text: "form-text text-muted"
  };

  protected readonly tableClasses: Record<TablePart, string> = {
    table: "table table-striped table-hover",
    table_responsive: "table-responsive",
    thead: "",
    tbody: "",
    tr: "",
    th: "",
    td: "",
    actions: "text-end"
  };

  protected readonly buttonClasses: Record<ButtonVariant, string> = {
    primary: "btn btn-primary",
    secondary: "btn btn-secondary",
    success: "btn btn-success",
    danger: "btn btn-danger",
    warning: "btn btn-warning",
    info: "btn btn-info",
    light: "btn btn-light",
    dark: "btn btn-dark"
  };

  protected readonly layoutClasses: Record<LayoutPart, string> = {
    header: "d-flex justify-content-between align-items-center mb-3",
    toolbar: "d-flex mb-3",
    summary: "mb-3",
    muted: "text-muted",
    actions_group: "btn-group btn-group-sm",
    small_button: "btn-sm",
    alert: "alert alert-danger",
    invalid: "is-invalid"
  };

  renderField(field: RenderableField) {
    const { descriptor, errors } = field;
    const invalid = errors.length > 0 && this.layoutClassFor("invalid");
    const id = this.fieldId(field);
    const help = descriptor.helpText ? (
      <div className={joinClasses(this.classFor("help_text"))}>{descriptor.helpText}</div>
    ) : null;
    const errorList = errors.map((error, index) => (
      <div key={index} className={joinClasses(this.classFor("error"))}>
        {error}
      </div>
    ));

    if (descriptor.widget === "checkbox") {
      return (
        <div className={joinClasses(this.classFor("field"))}>
          <div className="form-check">
            {this.renderControl(field, joinClasses(this.classFor("checkbox"), invalid))}
            <label className="form-check-label" htmlFor={id}>
              {descriptor.label}
            </label>
          </div>
          {help}
          {errorList}
        </div>
      );
    }

    return (
      <div className={joinClasses(this.classFor("field"))}>
        <label htmlFor={id} className={joinClasses(this.classFor("label"))}>
          {descriptor.label}
        </label>
        {this.renderControl(field, joinClasses(this.classFor(descriptor.widget), invalid))}
        {help}
        {errorList}
      </div>
    );
  }

  renderPagination(links: PaginationLink[]) {
    return (
      <nav aria-label="Page navigation">
        <ul className="pagination justify-content-center">
          {links.map((link, index) => (
            <li key={index} className={joinClasses("page-item", link.active && "active", link.disabled && "disabled")}>
              {link.href && !link.active && !link.disabled ? (
                <a className="page-link" href={link.href}>
                  {link.label}
                </a>
              ) : (
                <span className="page-link">{link.label}</span>
              )}
            </li>
          ))}
        </ul>
      </nav>
    );
  }
}
