import { renderToStaticMarkup } from "react-dom/server";
import {
  BulmaFramework,
  frameworkNames,
  getFramework,
  isFrameworkRegistrySealed,
  registerFramework,
  sealFrameworks
} from "../src/frameworks";
import { describeField } from "../src/services/fieldService";
import { ConfigurationError, UnknownFrameworkError } from "../src/services/serviceError";
import type { FieldDescriptor } from "../src/types/schema";

const nameField = describeField({ name: "name", type: "char" });
const doneField = describeField({ name: "done", type: "boolean" });

const bootstrapField = (descriptor: FieldDescriptor, value: string, errors: string[] = []) =>
  renderToStaticMarkup(getFramework("bootstrap").renderField({ descriptor, value, errors }));

const bulmaField = (descriptor: FieldDescriptor, value: string, errors: string[] = []) =>
  renderToStaticMarkup(getFramework("bulma").renderField({ descriptor, value, errors }));

describe("frameworks", () => {
  it("resolves bootstrap5 to the bootstrap renderer", () => {
    expect(getFramework("bootstrap5")).toBe(getFramework("bootstrap"));
    expect(getFramework("BULMA").name).toBe("bulma");
  });

  it("throws for unknown frameworks", () => {
    expect(() => getFramework("tailwind")).toThrow(UnknownFrameworkError);
    expect(() => getFramework("tailwind")).toThrow('Unknown CSS framework "tailwind".');
  });

  it("maps widget kinds to class tokens", () => {
    const bootstrap = getFramework("bootstrap");
    const bulma = getFramework("bulma");
    expect(bootstrap.classFor("input")).toBe("form-control");
    expect(bootstrap.classFor("select")).toBe("form-select");
    expect(bootstrap.classFor("error")).toBe("invalid-feedback");
    expect(bulma.classFor("input")).toBe("input");
    expect(bulma.classFor("error")).toBe("help is-danger");
    expect(bulma.tableClassFor("table")).toBe("table is-striped is-hoverable is-fullwidth");
  });

  it("renders a bootstrap text field", () => {
    expect(bootstrapField(nameField, "Ada")).toBe(
      '<div class="mb-3"><label for="id_name" class="form-label">Name</label>' +
        '<input type="text" class="form-control" name="name" id="id_name" required="" value="Ada"/></div>'
    );
  });

  it("flags invalid bootstrap fields", () => {
    expect(bootstrapField(nameField, "", ["Too short."])).toBe(
      '<div class="mb-3"><label for="id_name" class="form-label">Name</label>' +
        '<input type="text" class="form-control is-invalid" name="name" id="id_name" required="" value=""/>' +
        '<div class="invalid-feedback">Too short.</div></div>'
    );
  });

  it("renders a bulma text field", () => {
    expect(bulmaField(nameField, "Ada")).toBe(
      '<div class="field"><label class="label" for="id_name">Name</label>' +
        '<div class="control"><input type="text" class="input" name="name" id="id_name" required="" value="Ada"/></div></div>'
    );
  });

  it("escapes labels, help text and values", () => {
    const field = describeField({ name: "motto", type: "char", label: "Tom's motto", helpText: 'Say "hi" & <wave>' });
    expect(bootstrapField(field, "a<b")).toBe(
      '<div class="mb-3"><label for="id_motto" class="form-label">Tom&#x27;s motto</label>' +
        '<input type="text" class="form-control" name="motto" id="id_motto" required="" value="a&lt;b"/>' +
        '<div class="form-text text-muted">Say &quot;hi&quot; &amp; &lt;wave&gt;</div></div>'
    );
  });

  it("marks the selected choice", () => {
    const field = describeField({
      name: "status",
      type: "char",
      choices: [
        { value: "lead", label: "Lead" },
        { value: "customer", label: "Customer" }
      ]
    });
    expect(bootstrapField(field, "customer")).toBe(
      '<div class="mb-3"><label for="id_status" class="form-label">Status</label>' +
        '<select class="form-select" name="status" id="id_status" required="">' +
        '<option value="">Choose...</option><option value="lead">Lead</option>' +
        '<option value="customer" selected="">Customer</option></select></div>'
    );
  });

  it("renders checkboxes for each framework", () => {
    expect(bootstrapField(doneField, "true")).toBe(
      '<div class="mb-3"><div class="form-check">' +
        '<input class="form-check-input" type="checkbox" name="done" id="id_done" checked="" value="true"/>' +
        '<label class="form-check-label" for="id_done">Done</label></div></div>'
    );
    expect(bulmaField(doneField, "")).toBe(
      '<div class="field"><div class="control"><label class="checkbox">' +
        '<input type="checkbox" name="done" id="id_done" value="true"/> Done</label></div></div>'
    );
  });

  it("renders a relation without choices as a key input", () => {
    const company = describeField({ name: "company", type: "foreign_key", required: false });
    expect(bootstrapField(company, "7")).toBe(
      '<div class="mb-3"><label for="id_company" class="form-label">Company</label>' +
        '<input type="text" class="form-control" name="company" id="id_company" value="7"/></div>'
    );
  });

  it("renders a many-to-many relation as a multiple select", () => {
    const tags = describeField({ name: "tags", type: "many_to_many", required: false }, false, [
      { value: "1", label: "Red" },
      { value: "2", label: "Blue" },
      { value: "3", label: "Green" }
    ]);
    expect(bulmaField(tags, "1,3")).toBe(
      '<div class="field"><label class="label" for="id_tags">Tags</label><div class="control">' +
        '<div class="select is-multiple"><select name="tags" id="id_tags" multiple="">' +
        '<option value="1" selected="">Red</option><option value="2">Blue</option>' +
        '<option value="3" selected="">Green</option></select></div></div></div>'
    );
  });

  it("renders tables without empty class attributes", () => {
    const table = getFramework("bootstrap").renderTable(["Name"], [["Ada"]]);
    expect(renderToStaticMarkup(table)).toBe(
      '<table class="table table-striped table-hover"><thead><tr><th>Name</th></tr></thead>' +
        "<tbody><tr><td>Ada</td></tr></tbody></table>"
    );
  });

  it("renders bootstrap pagination", () => {
    const nav = getFramework("bootstrap").renderPagination([
      { label: "Previous", disabled: true },
      { label: "1", active: true },
      { label: "2", href: "/c/?page=2" },
      { label: "Next", href: "/c/?page=2" }
    ]);
    expect(renderToStaticMarkup(nav)).toBe(
      '<nav aria-label="Page navigation"><ul class="pagination justify-content-center">' +
        '<li class="page-item disabled"><span class="page-link">Previous</span></li>' +
        '<li class="page-item active"><span class="page-link">1</span></li>' +
        '<li class="page-item"><a class="page-link" href="/c/?page=2">2</a></li>' +
        '<li class="page-item"><a class="page-link" href="/c/?page=2">Next</a></li></ul></nav>'
    );
  });

  it("renders bulma pagination", () => {
    const nav = getFramework("bulma").renderPagination([
      { label: "Previous", disabled: true },
      { label: "1", active: true },
      { label: "2", href: "/c/?page=2" }
    ]);
    expect(renderToStaticMarkup(nav)).toBe(
      '<nav class="pagination is-centered" role="navigation" aria-label="pagination"><ul class="pagination-list">' +
        '<li><span class="pagination-link" aria-disabled="true">Previous</span></li>' +
        '<li><span class="pagination-link is-current">1</span></li>' +
        '<li><a class="pagination-link" href="/c/?page=2">2</a></li></ul></nav>'
    );
  });

  it("renders buttons and links", () => {
    const bootstrap = getFramework("bootstrap");
    expect(renderToStaticMarkup(bootstrap.renderButton("Save", "primary"))).toBe(
      '<button type="submit" class="btn btn-primary">Save</button>'
    );
    expect(renderToStaticMarkup(bootstrap.renderButton("Edit", "warning", { href: "/c/1/edit/", small: true }))).toBe(
      '<a href="/c/1/edit/" class="btn btn-warning btn-sm">Edit</a>'
    );
  });

  it("accepts registrations until sealed", () => {
    registerFramework("Custom", new BulmaFramework());
    expect(frameworkNames()).toEqual(["bootstrap", "bootstrap5", "bulma", "custom"]);
    expect(isFrameworkRegistrySealed()).toBe(false);
    sealFrameworks();
    expect(isFrameworkRegistrySealed()).toBe(true);
    expect(() => registerFramework("late", new BulmaFramework())).toThrow(ConfigurationError);
    expect(getFramework("custom").name).toBe("bulma");
  });
});
