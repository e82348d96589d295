import type { FormValues } from "../types/crud";
import type { SearchClause } from "../types/filters";
import type { ModelSchema, RecordRow } from "../types/schema";
import { primaryKeyOf } from "../services/fieldService";
import { matchesSearch } from "../services/filterService";
import type { FindManyOptions, RecordStore } from "./recordStore";
import { StoreConstraintError } from "./recordStore";

type MemoryStoreOptions = {
  uniqueFields?: string[];
};

export class MemoryRecordStore implements RecordStore {
  private readonly rows: RecordRow[] = [];
  private readonly primaryKey: string;
  private readonly uniqueFields: string[];
  private nextId = 1;

  constructor(schema: ModelSchema, seed: RecordRow[] = [], options: MemoryStoreOptions = {}) {
    this.primaryKey = primaryKeyOf(schema);
    this.uniqueFields = options.uniqueFields ?? [];
    seed.forEach((row) => {
      this.insert({ ...row });
    });
  }

  async count(search: SearchClause | null) {
    return this.rows.filter((row) => matchesSearch(row, search)).length;
  }

  async findMany({ search, offset, limit }: FindManyOptions) {
    return this.rows
      .filter((row) => matchesSearch(row, search))
      .slice(offset, offset + limit)
      .map((row) => ({ ...row }));
  }

  async findById(pk: string) {
    const row = this.findRow(pk);
    return row ? { ...row } : null;
  }

  async create(values: FormValues) {
    return { ...this.insert({ ...values }) };
  }

  async update(pk: string, values: FormValues) {
    const row = this.findRow(pk);
    if (!row) return null;
    const next: RecordRow = { ...row, ...values, [this.primaryKey]: row[this.primaryKey] };
    this.assertUnique(next, row);
    Object.assign(row, next);
    return { ...row };
  }

  async delete(pk: string) {
    const index = this.rows.findIndex((row) => String(row[this.primaryKey]) === pk);
    if (index === -1) return false;
    this.rows.splice(index, 1);
    return true;
  }

  private findRow(pk: string) {
    return this.rows.find((row) => String(row[this.primaryKey]) === pk);
  }

  private insert(values: RecordRow) {
    const provided = values[this.primaryKey];
    if (provided === undefined || provided === null || provided === "") {
      values[this.primaryKey] = this.nextId;
    }
    const id = values[this.primaryKey];
    if (this.findRow(String(id))) {
      throw new StoreConstraintError(`A record with ${this.primaryKey} ${String(id)} already exists.`, this.primaryKey);
    }
    this.assertUnique(values);
    if (typeof id === "number" && id >= this.nextId) {
      this.nextId = id + 1;
    }
    this.rows.push(values);
    return values;
  }

  private assertUnique(candidate: RecordRow, current?: RecordRow) {
    for (const field of this.uniqueFields) {
      const value = candidate[field];
      if (value === undefined || value === null || value === "") continue;
      const clash = this.rows.some((row) => row !== current && row[field] === value);
      if (clash) {
        throw new StoreConstraintError("This value is already in use.", field);
      }
    }
  }
}
