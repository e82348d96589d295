export { crudView, renderCrudForm, renderCrudList, resolveViewAction } from "./services/crudService";
export type { CrudHandler, CrudResource } from "./services/crudService";
export { resolveViewConfig, defaultExcludeFields } from "./services/configService";
export {
  describeField,
  describeFields,
  humanizeFieldName,
  primaryKeyOf,
  validateSchema,
  verboseName,
  verboseNamePlural
} from "./services/fieldService";
export { buildFormFields, submitForm } from "./services/formService";
export type { FormSubmission } from "./services/formService";
export { assertValid, coerceFieldValue, nonFieldErrorsKey, validateSubmission } from "./services/validationService";
export type { SubmissionResult, ValidationMode } from "./services/validationService";
export { listRecords, loadListPage, pageLink, parsePageNumber, resolvePageWindow } from "./services/listService";
export { buildSearchClause, matchesSearch } from "./services/filterService";
export { assertRelationSources, loadChoices, loadRelationChoices } from "./services/relationService";
export type { RelationChoices, RelationSource, RelationSources } from "./services/relationService";
export { authorize, can, crudActionFor, describeCapabilities } from "./services/permissionService";
export {
  ConfigurationError,
  NotFoundError,
  PermissionDeniedError,
  ServiceError,
  UnknownFrameworkError,
  ValidationError
} from "./services/serviceError";
export {
  BaseFramework,
  BootstrapFramework,
  BulmaFramework,
  frameworkNames,
  getFramework,
  registerFramework,
  sealFrameworks
} from "./frameworks";
export type { ButtonOptions, FrameworkRenderer, PaginationLink, RenderableField, WidgetKind } from "./frameworks";
export { MemoryRecordStore } from "./stores/memoryStore";
export { PgRecordStore } from "./stores/pgStore";
export type { Queryable } from "./stores/pgStore";
export { StoreConstraintError } from "./stores/recordStore";
export type { FindManyOptions, RecordStore } from "./stores/recordStore";
export { crudUrlPatterns, crudUrls } from "./lib/urls";
export type { CrudRoute } from "./lib/urls";
export { registerCrudRoutes } from "./routes/crud";
export { attachActor, headerActorResolver } from "./middlewares/actor";
export type { ActorResolver } from "./middlewares/actor";
export { defaultLayout, renderDocument } from "./templates/layout";
export type { PageLayout, PageLayoutProps } from "./templates/layout";
export type * from "./types/crud";
export type * from "./types/schema";
export type * from "./types/filters";
