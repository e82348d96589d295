import express from "express";
import { Pool } from "pg";
import { settings } from "./lib/config";
import { normalizeBasePath } from "./lib/urls";
import { attachActor } from "./middlewares/actor";
import type { ActorResolver } from "./middlewares/actor";
import { registerCrudRoutes } from "./routes/crud";
import { crudView } from "./services/crudService";
import { MemoryRecordStore } from "./stores/memoryStore";
import { PgRecordStore } from "./stores/pgStore";
import type { RecordStore } from "./stores/recordStore";
import { companySchema, companySeed, contactSchema, contactSeed, contactViewOptions } from "./demo/contacts";
import type { ViewOptions } from "./types/crud";

type AppOptions = {
  store?: RecordStore;
  companies?: RecordStore;
  view?: ViewOptions;
  prefix?: string;
  resolveActor?: ActorResolver;
};

type DemoStores = {
  contacts: RecordStore;
  companies: RecordStore;
};

const createStores = (): DemoStores => {
  if (settings.databaseUrl) {
    const pool = new Pool({ connectionString: settings.databaseUrl });
    return {
      contacts: new PgRecordStore(pool, contactSchema, { tableName: "contacts", logQueries: true }),
      companies: new PgRecordStore(pool, companySchema, { tableName: "companies", logQueries: true })
    };
  }
  return {
    contacts: new MemoryRecordStore(contactSchema, contactSeed(), { uniqueFields: ["email"] }),
    companies: new MemoryRecordStore(companySchema, companySeed())
  };
};

const resolveStores = (options: AppOptions): DemoStores => {
  if (!options.store) return createStores();
  return {
    contacts: options.store,
    companies: options.companies ?? new MemoryRecordStore(companySchema, companySeed())
  };
};

export const createApp = (options: AppOptions = {}) => {
  const app = express();
  const prefix = normalizeBasePath(options.prefix ?? "/contacts");
  const stores = resolveStores(options);
  const handler = crudView(
    {
      schema: contactSchema,
      store: stores.contacts,
      relations: { company: { store: stores.companies, labelField: "name" } }
    },
    { ...contactViewOptions, ...options.view }
  );

  app.use(attachActor(options.resolveActor));

  app.get("/api/health", (_req, res) => {
    res.json({ ok: true, framework: handler.renderer.name });
  });

  app.get("/", (_req, res) => {
    res.redirect(prefix);
  });

  registerCrudRoutes(app, prefix, handler);

  return app;
};
