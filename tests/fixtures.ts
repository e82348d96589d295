import type { Actor } from "../src/types/crud";
import type { ModelSchema, RecordRow } from "../src/types/schema";

export const taskSchema: ModelSchema = {
  name: "task",
  fields: [
    { name: "id", type: "auto" },
    { name: "title", type: "char" },
    { name: "owner_email", type: "email", required: false },
    { name: "estimate", type: "integer", required: false },
    {
      name: "priority",
      type: "char",
      choices: [
        { value: "low", label: "Low" },
        { value: "high", label: "High" }
      ]
    },
    { name: "done", type: "boolean" },
    { name: "due_at", type: "datetime", required: false },
    { name: "created_at", type: "datetime", editable: false },
    { name: "updated_at", type: "datetime", editable: false }
  ]
};

export const numberedRows = (count: number): RecordRow[] =>
  Array.from({ length: count }, (_, index) => ({ id: index + 1, title: `Item ${index + 1}` }));

export const anonymous: Actor = { roles: [] };
export const editor: Actor = { id: "user-2", roles: ["editor"] };
export const admin: Actor = { id: "user-1", roles: ["admin"] };
export const superuser: Actor = { id: "root", roles: [], isSuperuser: true };
