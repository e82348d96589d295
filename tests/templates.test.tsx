import { renderToStaticMarkup } from "react-dom/server";
import { getFramework } from "../src/frameworks";
import { crudUrls } from "../src/lib/urls";
import { describeField, describeFields } from "../src/services/fieldService";
import { listRecords } from "../src/services/listService";
import DeleteView from "../src/templates/deleteTemplate";
import DetailView from "../src/templates/detailTemplate";
import FormView, { collectNonFieldErrors } from "../src/templates/formTemplate";
import { defaultLayout, renderDocument } from "../src/templates/layout";
import ListView, { buildPaginationLinks } from "../src/templates/listTemplate";
import type { ListViewProps } from "../src/templates/listTemplate";
import { displayValue, inputValue } from "../src/templates/values";
import type { Capabilities } from "../src/types/crud";
import type { ModelSchema } from "../src/types/schema";
import { numberedRows, taskSchema } from "./fixtures";

const bootstrap = getFramework("bootstrap");
const allowAll: Capabilities = { canCreate: true, canRead: true, canUpdate: true, canDelete: true };
const allowNone: Capabilities = { canCreate: false, canRead: false, canUpdate: false, canDelete: false };

const noteSchema: ModelSchema = {
  name: "note",
  fields: [
    { name: "id", type: "auto" },
    { name: "title", type: "char" },
    { name: "body", type: "text", required: false }
  ]
};
const noteFields = describeFields(noteSchema, { only: ["title", "body"] });
const noteUrls = crudUrls("/notes/");

describe("values", () => {
  it("formats values for display", () => {
    expect(displayValue(describeField({ name: "due_at", type: "datetime" }), "2024-03-05T14:07:00Z", "-")).toBe(
      "2024-03-05 14:07"
    );
    expect(displayValue(describeField(taskSchema.fields[4]), "high", "-")).toBe("High");
    expect(displayValue(describeField({ name: "done", type: "boolean" }), "false", "-")).toBe("No");
    expect(displayValue(describeField({ name: "done", type: "boolean" }), true, "-")).toBe("Yes");
    expect(displayValue(describeField({ name: "title", type: "char" }), null, "Not set")).toBe("Not set");
  });

  it("lists the labels of many-to-many values", () => {
    const tags = describeField({ name: "tags", type: "many_to_many" }, false, [
      { value: "1", label: "Red" },
      { value: "2", label: "Blue" }
    ]);
    expect(displayValue(tags, "2,1,9", "-")).toBe("Blue, Red, 9");
  });

  it("formats datetimes for inputs", () => {
    expect(inputValue(describeField({ name: "due_at", type: "datetime" }), "2024-03-05T14:07:00.000Z")).toBe(
      "2024-03-05T14:07"
    );
    expect(inputValue(describeField({ name: "estimate", type: "integer" }), 3)).toBe("3");
    expect(inputValue(describeField({ name: "title", type: "char" }), null)).toBe("");
  });
});

describe("listTemplate", () => {
  const fields = describeFields(taskSchema, { only: ["title", "done"] });
  const rows = [
    { id: 1, title: "Ada & co", done: true },
    { id: 2, title: "Ben", done: false }
  ];
  const renderList = (props: Omit<ListViewProps, "title" | "fields" | "renderer" | "urls" | "primaryKey">) =>
    renderToStaticMarkup(
      <ListView title="Tasks" fields={fields} renderer={bootstrap} urls={crudUrls("/tasks")} primaryKey="id" {...props} />
    );

  it("renders the header, search form, summary and rows", () => {
    const html = renderList({
      listPage: listRecords(rows, { searchFields: ["title"], perPage: 10 }, "", 1),
      searchFields: ["title"],
      capabilities: allowAll
    });

    expect(html).toContain('<h2>Tasks</h2><a href="/tasks/create/" class="btn btn-primary">Add New</a>');
    expect(html).toContain(
      '<form method="get" action="/tasks/" class="d-flex mb-3">' +
        '<input type="text" name="search" class="form-control" placeholder="Search title..." value=""/>' +
        '<button type="submit" class="btn btn-primary">Search</button></form>'
    );
    expect(html).toContain('<small class="text-muted">Showing 1-2 of 2 items</small>');
    expect(html).toContain("<th>Title</th><th>Done</th><th>Actions</th>");
    expect(html).toContain("<td>Ada &amp; co</td><td>Yes</td>");
    expect(html).toContain('<a href="/tasks/1/edit/" class="btn btn-warning btn-sm">Edit</a>');
    expect(html).not.toContain("pagination");
  });

  it("hides actions the actor cannot take", () => {
    const html = renderList({
      listPage: listRecords(rows, { searchFields: [], perPage: 10 }, "", 1),
      searchFields: [],
      capabilities: allowNone
    });

    expect(html).toContain('<span class="text-muted">No actions available</span>');
    expect(html).not.toContain("Add New");
    expect(html).not.toContain('name="search"');
  });

  it("shows an empty state", () => {
    const html = renderList({
      listPage: listRecords([], { searchFields: ["title"], perPage: 10 }, "", 1),
      searchFields: ["title"],
      capabilities: allowAll
    });

    expect(html).toContain('<p class="text-muted">No items found.</p>');
    expect(html).toContain("Showing 0-0 of 0 items");
  });

  it("builds pagination links that keep the search term", () => {
    const listPage = listRecords(numberedRows(15), { searchFields: ["title"], perPage: 10 }, "item", 1);
    expect(buildPaginationLinks(listPage, "/tasks/")).toEqual([
      { label: "Previous", disabled: true },
      { label: "1", active: true },
      { label: "2", href: "/tasks/?page=2&search=item" },
      { label: "Next", href: "/tasks/?page=2&search=item" }
    ]);
  });
});

describe("formTemplate", () => {
  it("renders fields, non-field errors and buttons", () => {
    const html = renderToStaticMarkup(
      <FormView
        title="Create Note"
        fields={noteFields.slice(0, 1)}
        values={{ title: "Hi" }}
        errors={{ __all__: ["Duplicate."] }}
        renderer={bootstrap}
        action="/notes/create/"
        cancelUrl="/notes/"
        submitLabel="Create"
      />
    );

    expect(html).toBe(
      '<div class="crud-form-view"><h2>Create Note</h2>' +
        '<div class="alert alert-danger" role="alert"><div>Duplicate.</div></div>' +
        '<form method="post" action="/notes/create/" class="needs-validation" novalidate="">' +
        '<div class="mb-3"><label for="id_title" class="form-label">Title</label>' +
        '<input type="text" class="form-control" name="title" id="id_title" required="" value="Hi"/></div>' +
        '<div class="d-flex mb-3"><button type="submit" class="btn btn-primary">Create</button>' +
        '<a href="/notes/" class="btn btn-secondary">Cancel</a></div></form></div>'
    );
  });

  it("leaves out an empty form class", () => {
    const html = renderToStaticMarkup(
      <FormView
        title="Edit Note"
        fields={[]}
        values={{}}
        errors={{}}
        renderer={getFramework("bulma")}
        action="/notes/1/edit/"
        cancelUrl="/notes/"
        submitLabel="Update"
      />
    );
    expect(html).toContain('<form method="post" action="/notes/1/edit/" novalidate="">');
  });

  it("collects errors for keys that are not rendered fields", () => {
    expect(
      collectNonFieldErrors(noteFields, { title: ["Required."], bogus: ['Unknown field "bogus".'], __all__: ["Nope."] })
    ).toEqual(['Unknown field "bogus".', "Nope."]);
  });
});

describe("detail and delete templates", () => {
  const record = { id: 1, title: "Hi", body: null };

  it("renders a detail view with gated buttons", () => {
    const html = renderToStaticMarkup(
      <DetailView
        title="Note"
        fields={noteFields}
        record={record}
        pk="1"
        capabilities={{ ...allowNone, canRead: true, canDelete: true }}
        renderer={bootstrap}
        urls={noteUrls}
      />
    );

    expect(html).toBe(
      '<div class="crud-detail-view"><h2>Note</h2>' +
        '<dl class="crud-fields"><dt>Title</dt><dd>Hi</dd><dt>Body</dt><dd>Not set</dd></dl>' +
        '<div class="d-flex mb-3"><a href="/notes/1/delete/" class="btn btn-danger">Delete</a>' +
        '<a href="/notes/" class="btn btn-secondary">Back to list</a></div></div>'
    );
  });

  it("asks for confirmation before deleting", () => {
    const html = renderToStaticMarkup(
      <DeleteView
        title="Delete Note"
        itemName="note"
        fields={noteFields}
        record={record}
        pk="1"
        renderer={bootstrap}
        urls={noteUrls}
      />
    );

    expect(html).toContain("<p>Are you sure you want to delete this note?</p>");
    expect(html).toContain(
      '<form method="post" action="/notes/1/delete/" class="d-flex mb-3">' +
        '<button type="submit" class="btn btn-danger">Delete</button>' +
        '<a href="/notes/1/" class="btn btn-secondary">Cancel</a></form>'
    );
  });
});

describe("layout", () => {
  it("wraps the content in a document", () => {
    const html = renderDocument(defaultLayout({ title: "A & B", framework: "bootstrap5", children: <p>x</p> }));
    expect(html).toBe(
      '<!DOCTYPE html><html lang="en"><head><meta charset="utf-8"/><title>A &amp; B</title></head>' +
        '<body><main class="container"><p>x</p></main></body></html>'
    );
  });
});
