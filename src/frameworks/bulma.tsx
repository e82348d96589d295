import type { ButtonVariant, LayoutPart, PaginationLink, RenderableField, TablePart, WidgetKind } from "./base";
import { BaseFramework, joinClasses } from "./base";

export class BulmaFramework extends BaseFramework {
  readonly name = "bulma";

  protected readonly formClasses: Record<WidgetKind, string> = {
    form: "",
    field: "field",
    label: "label",
    input: "input",
    textarea: "textarea",
    select: "select",
    checkbox: "checkbox",
    submit: "button is-primary",
    error: "help is-danger",
    help_text: "help"
  };

  protected readonly tableClasses: Record<TablePart, string> = {
    table: "table is-striped is-hoverable is-fullwidth",
    table_responsive: "table-container",
    thead: "",
    tbody: "",
    tr: "",
    th: "",
    td: "",
    actions: "has-text-right"
  };

  protected readonly buttonClasses: Record<ButtonVariant, string> = {
    primary: "button is-primary",
    secondary: "button",
    success: "button is-success",
    danger: "button is-danger",
    warning: "button is-warning",
    info: "button is-info",
    light: "button is-light",
    dark: "button is-dark"
  };

  protected readonly layoutClasses: Record<LayoutPart, string> = {
    header: "level mb-3",
    toolbar: "field has-addons mb-3",
    summary: "mb-3",
    muted: "has-text-grey",
    actions_group: "buttons are-small",
    small_button: "is-small",
    alert: "notification is-danger",
    invalid: "is-danger"
  };

  renderField(field: RenderableField) {
    const { descriptor, errors } = field;
    const invalid = errors.length > 0 && this.layoutClassFor("invalid");
    const help = descriptor.helpText ? (
      <p className={joinClasses(this.classFor("help_text"))}>{descriptor.helpText}</p>
    ) : null;
    const errorList = errors.map((error, index) => (
      <p key={index} className={joinClasses(this.classFor("error"))}>
        {error}
      </p>
    ));

    if (descriptor.widget === "checkbox") {
      return (
        <div className={joinClasses(this.classFor("field"))}>
          <div className="control">
            <label className={joinClasses(this.classFor("checkbox"))}>
              {this.renderControl(field, undefined)} {descriptor.label}
            </label>
          </div>
          {help}
          {errorList}
        </div>
      );
    }

    const kind: WidgetKind = descriptor.widget === "textarea" ? "textarea" : "input";
    const control =
      descriptor.widget === "select" ? (
        <div className={joinClasses(this.classFor("select"), descriptor.multiple ? "is-multiple" : "is-fullwidth", invalid)}>
          {this.renderControl(field, undefined)}
        </div>
      ) : (
        this.renderControl(field, joinClasses(this.classFor(kind), invalid))
      );

    return (
      <div className={joinClasses(this.classFor("field"))}>
        <label className={joinClasses(this.classFor("label"))} htmlFor={this.fieldId(field)}>
          {descriptor.label}
        </label>
        <div className="control">{control}</div>
        {help}
        {errorList}
      </div>
    );
  }

  renderPagination(links: PaginationLink[]) {
    return (
      <nav className="pagination is-centered" role="navigation" aria-label="pagination">
        <ul className="pagination-list">
          {links.map((link, index) => {
            const className = joinClasses("pagination-link", link.active && "is-current");
            return (
              <li key={index}>
                {link.href && !link.active && !link.disabled ? (
                  <a className={className} href={link.href}>
                    {link.label}
                  </a>
                ) : (
                  <span className={className} aria-disabled={link.disabled || undefined}>
                    {link.label}
                  </span>
                )}
              </li>
            );
          })}
        </ul>
      </nav>
    );
  }
}
