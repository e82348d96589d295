import type { QueryResultRow } from "pg";
import { crudView } from "../src/services/crudService";
import { buildSearchClause } from "../src/services/filterService";
import { PgRecordStore } from "../src/stores/pgStore";
import type { Queryable } from "../src/stores/pgStore";
import { StoreConstraintError } from "../src/stores/recordStore";
import type { ModelSchema } from "../src/types/schema";

type QueryResponse = { rows: QueryResultRow[]; rowCount: number | null };

const schema: ModelSchema = {
  name: "contact",
  fields: [
    { name: "id", type: "auto" },
    { name: "name", type: "char" },
    { name: "email", type: "email" }
  ]
};

const createFakeDb = (responses: Array<QueryResponse | Error> = []) => {
  const calls: Array<{ text: string; params: unknown[] }> = [];
  const db: Queryable = {
    query: async (text, params = []) => {
      calls.push({ text, params });
      const next = responses.shift() ?? { rows: [], rowCount: 0 };
      if (next instanceof Error) throw next;
      return next;
    }
  };
  return { db, calls };
};

const pgError = (code: string, detail?: string) => Object.assign(new Error("constraint"), { code, detail });

const malformedKey = () =>
  Object.assign(new Error('invalid input syntax for type integer: "abc"'), { code: "22P02" });

describe("PgRecordStore", () => {
  beforeEach(() => {
    jest.restoreAllMocks();
  });

  it("counts with an escaped ILIKE search", async () => {
    const { db, calls } = createFakeDb([{ rows: [{ count: "2" }], rowCount: 1 }]);
    const store = new PgRecordStore(db, schema, { tableName: "contacts" });

    expect(await store.count(buildSearchClause(["name", "email"], "ad%"))).toBe(2);
    expect(calls).toEqual([
      {
        text: 'SELECT COUNT(*) AS count FROM "contacts" WHERE (CAST("name" AS TEXT) ILIKE $1 OR CAST("email" AS TEXT) ILIKE $2)',
        params: ["%ad\\%%", "%ad\\%%"]
      }
    ]);
  });

  it("pages in primary key order", async () => {
    const { db, calls } = createFakeDb([{ rows: [{ id: 11, name: "Ada", email: null }], rowCount: 1 }]);
    const store = new PgRecordStore(db, schema);

    expect(await store.findMany({ search: null, offset: 10, limit: 5 })).toEqual([{ id: 11, name: "Ada", email: null }]);
    expect(calls[0]).toEqual({ text: 'SELECT * FROM "contact" ORDER BY "id" ASC LIMIT $1 OFFSET $2', params: [5, 10] });
  });

  it("inserts only schema columns and normalizes returned values", async () => {
    const { db, calls } = createFakeDb([
      {
        rows: [{ id: 1, name: "Ada", email: "ada@example.com", created_at: new Date("2024-01-02T03:04:05.000Z") }],
        rowCount: 1
      }
    ]);
    const store = new PgRecordStore(db, schema, { tableName: "contacts" });

    const created = await store.create({ name: "Ada", email: "ada@example.com", bogus: 1 });
    expect(created).toEqual({ id: 1, name: "Ada", email: "ada@example.com", created_at: "2024-01-02T03:04:05.000Z" });
    expect(calls[0]).toEqual({
      text: 'INSERT INTO "contacts" ("name", "email") VALUES ($1, $2) RETURNING *',
      params: ["Ada", "ada@example.com"]
    });
  });

  it("updates by primary key", async () => {
    const { db, calls } = createFakeDb([{ rows: [], rowCount: 0 }]);
    const store = new PgRecordStore(db, schema, { tableName: "contacts" });

    expect(await store.update("4", { id: 9, name: "Ben" })).toBeNull();
    expect(calls[0]).toEqual({
      text: 'UPDATE "contacts" SET "name" = $1 WHERE "id" = $2 RETURNING *',
      params: ["Ben", "4"]
    });
  });

  it("reports whether a delete removed a row", async () => {
    const { db } = createFakeDb([
      { rows: [{ id: 4 }], rowCount: 1 },
      { rows: [], rowCount: 0 }
    ]);
    const store = new PgRecordStore(db, schema);

    expect(await store.delete("4")).toBe(true);
    expect(await store.delete("4")).toBe(false);
  });

  it("maps unique violations to the offending column", async () => {
    const { db } = createFakeDb([pgError("23505", "Key (email)=(ada@example.com) already exists.")]);
    const store = new PgRecordStore(db, schema);

    const failure = store.create({ name: "Ada", email: "ada@example.com" });
    await expect(failure).rejects.toBeInstanceOf(StoreConstraintError);
    await expect(failure).rejects.toMatchObject({ field: "email", message: "This value is already in use." });
  });

  it("treats a key the column cannot hold as a missing row", async () => {
    const errorSpy = jest.spyOn(console, "error").mockImplementation(() => undefined);
    const { db } = createFakeDb([malformedKey(), malformedKey(), malformedKey()]);
    const store = new PgRecordStore(db, schema);

    expect(await store.findById("abc")).toBeNull();
    expect(await store.update("abc", { name: "Ben" })).toBeNull();
    expect(await store.delete("abc")).toBe(false);
    expect(errorSpy).not.toHaveBeenCalled();
  });

  it("still raises a cast failure outside key lookups", async () => {
    jest.spyOn(console, "error").mockImplementation(() => undefined);
    const { db } = createFakeDb([malformedKey()]);
    const store = new PgRecordStore(db, schema);

    await expect(store.count(null)).rejects.toMatchObject({ code: "22P02" });
  });

  it("answers not found for a malformed key through the dispatcher", async () => {
    jest.spyOn(console, "log").mockImplementation(() => undefined);
    const { db } = createFakeDb([malformedKey(), malformedKey(), malformedKey()]);
    const handler = crudView({ schema, store: new PgRecordStore(db, schema) });
    const request = { actor: { roles: [] }, basePath: "/contacts/", pk: "abc" };
    const notFound = { kind: "not_found", status: 404, message: "Record not found." };

    expect(await handler({ ...request, action: "view", method: "GET" })).toEqual(notFound);
    expect(await handler({ ...request, action: "edit", method: "POST", body: { name: "Ben" } })).toEqual(notFound);
    expect(await handler({ ...request, action: "delete", method: "POST" })).toEqual(notFound);
  });

  it("logs and rethrows other database errors", async () => {
    const errorSpy = jest.spyOn(console, "error").mockImplementation(() => undefined);
    const { db } = createFakeDb([new Error("connection reset")]);
    const store = new PgRecordStore(db, schema);

    await expect(store.findById("1")).rejects.toThrow("connection reset");
    expect(errorSpy).toHaveBeenCalledTimes(1);
  });
});
