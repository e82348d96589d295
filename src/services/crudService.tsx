import type { ReactElement } from "react";
import { renderToStaticMarkup } from "react-dom/server";
import { getFramework } from "../frameworks";
import type { FrameworkRenderer } from "../frameworks";
import { crudUrls } from "../lib/urls";
import type { CrudUrls } from "../lib/urls";
import type { RecordStore } from "../stores/recordStore";
import DeleteView from "../templates/deleteTemplate";
import DetailView from "../templates/detailTemplate";
import FormView from "../templates/formTemplate";
import { defaultLayout, renderDocument } from "../templates/layout";
import type { PageLayout } from "../templates/layout";
import ListView from "../templates/listTemplate";
import { inputValue } from "../templates/values";
import type {
  Actor,
  CrudRequest,
  CrudResult,
  FieldErrors,
  ListPage,
  SubmittedValues,
  ViewAction,
  ViewConfiguration,
  ViewOptions
} from "../types/crud";
import type { FieldDescriptor, ModelSchema, RecordRow } from "../types/schema";
import { resolveViewConfig } from "./configService";
import { describeFields, primaryKeyOf, verboseName, verboseNamePlural } from "./fieldService";
import { buildFormFields, submitForm } from "./formService";
import { loadListPage } from "./listService";
import { authorize, crudActionFor, describeCapabilities } from "./permissionService";
import { assertRelationSources, loadRelationChoices } from "./relationService";
import type { RelationChoices, RelationSources } from "./relationService";

export type CrudResource = {
  schema: ModelSchema;
  store: RecordStore;
  layout?: PageLayout;
  relations?: RelationSources;
};

export type CrudHandler = ((request: CrudRequest) => Promise<CrudResult>) & {
  readonly config: ViewConfiguration;
  readonly renderer: FrameworkRenderer;
};

const viewActions: readonly ViewAction[] = ["list", "create", "view", "edit", "delete"];
const recordActions = new Set<ViewAction>(["view", "edit", "delete"]);
const checkedValues = new Set(["true", "on", "1", "yes"]);

const isViewAction = (value: string): value is ViewAction => viewActions.some((action) => action === value);

export const resolveViewAction = (action: string, pk?: string): ViewAction => {
  if (!isViewAction(action)) return "list";
  if (recordActions.has(action) && !pk) return "list";
  return action;
};

const recordNotFound = (): CrudResult => ({ kind: "not_found", status: 404, message: "Record not found." });

const rawString = (value: unknown) => {
  if (Array.isArray(value)) return value.map((entry) => String(entry)).join(",");
  if (value === null || value === undefined) return "";
  return String(value);
};

export const recordFormValues = (fields: FieldDescriptor[], record: RecordRow) =>
  Object.fromEntries(fields.map((field) => [field.name, inputValue(field, record[field.name])]));

export const submittedFormValues = (fields: FieldDescriptor[], input: SubmittedValues) =>
  Object.fromEntries(
    fields.map((field) => {
      const raw = rawString(input[field.name]);
      if (field.widget === "checkbox") {
        return [field.name, checkedValues.has(raw.trim().toLowerCase()) ? "true" : ""];
      }
      return [field.name, raw];
    })
  );

type CrudListOptions = {
  schema: ModelSchema;
  config: ViewConfiguration;
  listPage: ListPage;
  actor: Actor;
  basePath: string;
  renderer?: FrameworkRenderer;
  choices?: RelationChoices;
};

type CrudFormOptions = {
  schema: ModelSchema;
  config: ViewConfiguration;
  mode: "create" | "update";
  action: string;
  cancelUrl: string;
  values?: Record<string, string>;
  errors?: FieldErrors;
  renderer?: FrameworkRenderer;
  choices?: RelationChoices;
};

const formTitle = (schema: ModelSchema, mode: "create" | "update") =>
  `${mode === "create" ? "Create" : "Edit"} ${verboseName(schema)}`;

const crudListElement = ({
  schema,
  config,
  listPage,
  actor,
  basePath,
  renderer = getFramework(config.framework),
  choices = {}
}: CrudListOptions) => (
  <ListView
    title={verboseNamePlural(schema)}
    fields={describeFields(schema, { only: config.listFields, choices })}
    listPage={listPage}
    searchFields={config.searchFields}
    capabilities={describeCapabilities(actor, config)}
    renderer={renderer}
    urls={crudUrls(basePath)}
    primaryKey={primaryKeyOf(schema)}
  />
);

const crudFormElement = ({
  schema,
  config,
  mode,
  action,
  cancelUrl,
  values = {},
  errors = {},
  renderer = getFramework(config.framework),
  choices = {}
}: CrudFormOptions) => (
  <FormView
    title={formTitle(schema, mode)}
    fields={buildFormFields(schema, config, choices)}
    values={values}
    errors={errors}
    renderer={renderer}
    action={action}
    cancelUrl={cancelUrl}
    submitLabel={mode === "create" ? "Create" : "Update"}
  />
);

export const renderCrudList = (options: CrudListOptions) => renderToStaticMarkup(crudListElement(options));

export const renderCrudForm = (options: CrudFormOptions) => renderToStaticMarkup(crudFormElement(options));

export const crudView = (resource: CrudResource, options: ViewOptions = {}): CrudHandler => {
  const { schema, store } = resource;
  const config = resolveViewConfig(schema, options);
  const renderer = getFramework(config.framework);
  const layout = resource.layout ?? defaultLayout;
  const relations = resource.relations ?? {};
  assertRelationSources(schema, relations);
  const primaryKey = primaryKeyOf(schema);
  const excluded = new Set(config.excludeFields);

  const detailFields = (choices: RelationChoices) =>
    describeFields(schema, { choices }).filter((field) => field.name !== primaryKey && !excluded.has(field.name));

  const page = (title: string, content: ReactElement, status = 200): CrudResult => ({
    kind: "page",
    status,
    html: renderDocument(layout({ title, framework: renderer.name, children: content }))
  });

  const renderForm = (
    mode: "create" | "update",
    urls: CrudUrls,
    action: string,
    values: Record<string, string>,
    errors: FieldErrors,
    choices: RelationChoices,
    status = 200
  ) => {
    const content = crudFormElement({
      schema,
      config,
      mode,
      action,
      cancelUrl: urls.list,
      values,
      errors,
      renderer,
      choices
    });
    return page(formTitle(schema, mode), content, status);
  };

  const handleList = async (request: CrudRequest, urls: CrudUrls) => {
    const query = request.query ?? {};
    const choices = await loadRelationChoices(schema, relations);
    const listPage = await loadListPage(store, config, query.search, query.page);
    const content = crudListElement({
      schema,
      config,
      listPage,
      actor: request.actor,
      basePath: urls.list,
      renderer,
      choices
    });
    return page(verboseNamePlural(schema), content);
  };

  const handleCreate = async (request: CrudRequest, urls: CrudUrls): Promise<CrudResult> => {
    const choices = await loadRelationChoices(schema, relations);
    if (request.method === "GET") {
      return renderForm("create", urls, urls.create, {}, {}, choices);
    }
    const formFields = buildFormFields(schema, config, choices);
    const input = request.body ?? {};
    const outcome = await submitForm({ store, fields: formFields, input, mode: "create" });
    if (outcome.status === "saved") {
      console.log(`Created ${schema.name} ${String(outcome.record[primaryKey])}`);
      return { kind: "redirect", status: 303, location: urls.list, values: outcome.record };
    }
    if (outcome.status === "missing") return recordNotFound();
    const values = submittedFormValues(formFields, input);
    return renderForm("create", urls, urls.create, values, outcome.errors, choices, 400);
  };

  const handleEdit = async (request: CrudRequest, urls: CrudUrls, pk: string): Promise<CrudResult> => {
    const record = await store.findById(pk);
    if (!record) return recordNotFound();
    const choices = await loadRelationChoices(schema, relations);
    const formFields = buildFormFields(schema, config, choices);
    if (request.method === "GET") {
      return renderForm("update", urls, urls.edit(pk), recordFormValues(formFields, record), {}, choices);
    }
    const input = request.body ?? {};
    const outcome = await submitForm({ store, fields: formFields, input, mode: "update", pk });
    if (outcome.status === "saved") {
      console.log(`Updated ${schema.name} ${pk}`);
      return { kind: "redirect", status: 303, location: urls.list, values: outcome.record };
    }
    if (outcome.status === "missing") return recordNotFound();
    const values = { ...recordFormValues(formFields, record), ...submittedFormValues(formFields, input) };
    return renderForm("update", urls, urls.edit(pk), values, outcome.errors, choices, 400);
  };

  const handleView = async (request: CrudRequest, urls: CrudUrls, pk: string): Promise<CrudResult> => {
    const record = await store.findById(pk);
    if (!record) return recordNotFound();
    const choices = await loadRelationChoices(schema, relations);
    const content = (
      <DetailView
        title={verboseName(schema)}
        fields={detailFields(choices)}
        record={record}
        pk={pk}
        capabilities={describeCapabilities(request.actor, config)}
        renderer={renderer}
        urls={urls}
      />
    );
    return page(verboseName(schema), content);
  };

  const handleDelete = async (request: CrudRequest, urls: CrudUrls, pk: string): Promise<CrudResult> => {
    if (request.method === "POST") {
      const deleted = await store.delete(pk);
      if (!deleted) return recordNotFound();
      console.log(`Deleted ${schema.name} ${pk}`);
      return { kind: "redirect", status: 303, location: urls.list };
    }
    const record = await store.findById(pk);
    if (!record) return recordNotFound();
    const choices = await loadRelationChoices(schema, relations);
    const title = `Delete ${verboseName(schema)}`;
    const content = (
      <DeleteView
        title={title}
        itemName={verboseName(schema).toLowerCase()}
        fields={detailFields(choices)}
        record={record}
        pk={pk}
        renderer={renderer}
        urls={urls}
      />
    );
    return page(title, content);
  };

  const handler = async (request: CrudRequest): Promise<CrudResult> => {
    const action = resolveViewAction(request.action, request.pk);
    const decision = authorize(crudActionFor(action), request.actor, config);
    if (!decision.allowed) {
      return { kind: "denied", status: 403, message: decision.reason };
    }

    const urls = crudUrls(request.basePath);
    const pk = request.pk ?? "";
    switch (action) {
      case "create":
        return handleCreate(request, urls);
      case "edit":
        return handleEdit(request, urls, pk);
      case "view":
        return handleView(request, urls, pk);
      case "delete":
        return handleDelete(request, urls, pk);
      default:
        return handleList(request, urls);
    }
  };

  return Object.assign(handler, { config, renderer });
};
