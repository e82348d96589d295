import type { ModelSchema, RecordRow } from "../types/schema";
import type { ViewOptions } from "../types/crud";
import companies from "./companies.json";
import seed from "./contacts.json";

export const contactSchema: ModelSchema = {
  name: "contact",
  fields: [
    { name: "id", type: "auto" },
    { name: "name", type: "char" },
    { name: "email", type: "email", helpText: "Used for login reminders." },
    { name: "phone", type: "char", required: false },
    {
      name: "status",
      type: "char",
      choices: [
        { value: "lead", label: "Lead" },
        { value: "customer", label: "Customer" }
      ]
    },
    { name: "company", type: "foreign_key", references: "company", required: false },
    { name: "is_active", type: "boolean", label: "Active" },
    { name: "notes", type: "text", required: false },
    { name: "created_at", type: "datetime", editable: false }
  ]
};

export const companySchema: ModelSchema = {
  name: "company",
  verboseNamePlural: "Companies",
  fields: [
    { name: "id", type: "auto" },
    { name: "name", type: "char" }
  ]
};

export const contactViewOptions: ViewOptions = {
  listFields: ["name", "email", "status", "is_active"],
  searchFields: ["name", "email"],
  permissions: {
    create: ["editor", "admin"],
    update: ["editor", "admin"],
    delete: ["admin"]
  }
};

export const contactSeed = (): RecordRow[] => seed.map((row) => ({ ...row }));

export const companySeed = (): RecordRow[] => companies.map((row) => ({ ...row }));
