import type { QueryResultRow } from "pg";
import type { FormValues } from "../types/crud";
import type { FilterRule, SearchClause } from "../types/filters";
import type { FieldValue, ModelSchema, RecordRow } from "../types/schema";
import { fieldNames, primaryKeyOf } from "../services/fieldService";
import type { FindManyOptions, RecordStore } from "./recordStore";
import { StoreConstraintError } from "./recordStore";

type QueryResponse = { rows: QueryResultRow[]; rowCount: number | null };

export type Queryable = {
  query(text: string, params?: unknown[]): Promise<QueryResponse>;
};

type PgStoreOptions = {
  tableName?: string;
  logQueries?: boolean;
};

type PgErrorShape = {
  code: string;
  column?: string;
  detail?: string;
};

const constraintCodes = new Set(["23502", "23503", "23505", "23514"]);

// invalid_text_representation: a key that cannot be cast to the key column's type
const malformedKeyCode = "22P02";


const isPgError = (error: unknown): error is PgErrorShape =>
  typeof error === "object" &&
  error !== null &&
  "code" in error &&
  typeof error.code === "string";

const quoteIdentifier = (name: string) => `"${name.replace(/"/g, '""')}"`;

const escapeLike = (value: string) => value.replace(/[\\%_]/g, (match) => `\\${match}`);

const toFieldValue = (value: unknown): FieldValue => {
  if (value === null || value === undefined) return null;
  if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
    return value;
  }
  if (value instanceof Date) return value.toISOString();
  if (typeof value === "bigint") return value.toString();
  return JSON.stringify(value);
};

const toRecordRow = (row: QueryResultRow): RecordRow => {
  const record: RecordRow = {};
  for (const [key, value] of Object.entries(row)) {
    record[key] = toFieldValue(value);
  }
  return record;
};

const constraintField = (error: PgErrorShape) => {
  if (error.column) return error.column;
  const match = error.detail ? /Key \(([^)]+)\)=/.exec(error.detail) : null;
  return match ? match[1] : undefined;
};

const constraintMessage = (error: PgErrorShape) => {
  switch (error.code) {
    case "23505":
      return "This value is already in use.";
    case "23502":
      return "This field is required.";
    case "23503":
      return "The referenced record does not exist.";
    default:
      return "This value violates a database constraint.";
  }
};

export class PgRecordStore implements RecordStore {
  private readonly table: string;
  private readonly primaryKey: string;
  private readonly columns: Set<string>;
  private readonly logQueries: boolean;

  constructor(private readonly db: Queryable, schema: ModelSchema, options: PgStoreOptions = {}) {
    this.table = quoteIdentifier(options.tableName ?? schema.name);
    this.primaryKey = primaryKeyOf(schema);
    this.columns = new Set([this.primaryKey, ...fieldNames(schema)]);
    this.logQueries = options.logQueries ?? false;
  }

  async count(search: SearchClause | null) {
    const params: unknown[] = [];
    const where = this.buildWhere(search, params);
    const result = await this.run(`SELECT COUNT(*) AS count FROM ${this.table} ${where}`.trim(), params);
    const count: unknown = result.rows[0]?.count;
    return count === undefined || count === null ? 0 : parseInt(String(count), 10);
  }

  async findMany({ search, offset, limit }: FindManyOptions) {
    const params: unknown[] = [];
    const where = this.buildWhere(search, params);
    params.push(limit, offset);
    const result = await this.run(
      [
        `SELECT * FROM ${this.table}`,
        where,
        `ORDER BY ${quoteIdentifier(this.primaryKey)} ASC`,
        `LIMIT $${params.length - 1} OFFSET $${params.length}`
      ]
        .filter(Boolean)
        .join(" "),
      params
    );
    return result.rows.map(toRecordRow);
  }

  async findById(pk: string) {
    const result = await this.run(
      `SELECT * FROM ${this.table} WHERE ${quoteIdentifier(this.primaryKey)} = $1 LIMIT 1`,
      [pk],
      true
    );
    const row = result.rows[0];
    return row ? toRecordRow(row) : null;
  }

  async create(values: FormValues) {
    const entries = this.writableEntries(values);
    const sql =
      entries.length === 0
        ? `INSERT INTO ${this.table} DEFAULT VALUES RETURNING *`
        : `INSERT INTO ${this.table} (${entries.map(([key]) => quoteIdentifier(key)).join(", ")}) VALUES (${entries
            .map((_, index) => `$${index + 1}`)
            .join(", ")}) RETURNING *`;
    const result = await this.run(sql, entries.map(([, value]) => value));
    const row = result.rows[0];
    if (!row) {
      throw new Error(`Insert into ${this.table} returned no row.`);
    }
    return toRecordRow(row);
  }

  async update(pk: string, values: FormValues) {
    const entries = this.writableEntries(values).filter(([key]) => key !== this.primaryKey);
    if (entries.length === 0) {
      return this.findById(pk);
    }
    const assignments = entries.map(([key], index) => `${quoteIdentifier(key)} = $${index + 1}`).join(", ");
    const params: unknown[] = [...entries.map(([, value]) => value), pk];
    const result = await this.run(
      `UPDATE ${this.table} SET ${assignments} WHERE ${quoteIdentifier(this.primaryKey)} = $${params.length} RETURNING *`,
      params,
      true
    );
    const row = result.rows[0];
    return row ? toRecordRow(row) : null;
  }

  async delete(pk: string) {
    const result = await this.run(
      `DELETE FROM ${this.table} WHERE ${quoteIdentifier(this.primaryKey)} = $1 RETURNING ${quoteIdentifier(this.primaryKey)}`,
      [pk],
      true
    );
    return (result.rowCount ?? 0) > 0;
  }

  private writableEntries(values: FormValues) {
    return Object.entries(values).filter(([key]) => this.columns.has(key));
  }

  private buildRule(rule: FilterRule, params: unknown[]) {
    const column = `CAST(${quoteIdentifier(rule.fieldKey)} AS TEXT)`;
    if (rule.operator === "equals") {
      params.push(rule.value);
      return `LOWER(${column}) = LOWER($${params.length})`;
    }
    params.push(`%${escapeLike(rule.value)}%`);
    return `${column} ILIKE $${params.length}`;
  }

  private buildWhere(search: SearchClause | null, params: unknown[]) {
    if (!search) return "";
    const conditions = search.rules
      .filter((rule) => this.columns.has(rule.fieldKey))
      .map((rule) => this.buildRule(rule, params));
    if (conditions.length === 0) return "";
    return `WHERE (${conditions.join(` ${search.logic} `)})`;
  }

  // With byKey set, a key the column type cannot hold matches no row.
  private async run(text: string, params: unknown[], byKey = false): Promise<QueryResponse> {
    const start = Date.now();
    try {
      const result = await this.db.query(text, params);
      if (this.logQueries) {
        console.log("Executed query", { text, duration: Date.now() - start, rows: result.rowCount });
      }
      return result;
    } catch (error) {
      if (byKey && isPgError(error) && error.code === malformedKeyCode) {
        return { rows: [], rowCount: 0 };
      }
      if (isPgError(error) && constraintCodes.has(error.code)) {
        throw new StoreConstraintError(constraintMessage(error), constraintField(error));
      }
      console.error("Error executing query", { text, error });
      throw error;
    }
  }
}
