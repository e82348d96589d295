import type { FormValues } from "../types/crud";
import type { SearchClause } from "../types/filters";
import type { RecordRow } from "../types/schema";

export type FindManyOptions = {
  search: SearchClause | null;
  offset: number;
  limit: number;
};

export interface RecordStore {
  count(search: SearchClause | null): Promise<number>;
  findMany(options: FindManyOptions): Promise<RecordRow[]>;
  findById(pk: string): Promise<RecordRow | null>;
  create(values: FormValues): Promise<RecordRow>;
  update(pk: string, values: FormValues): Promise<RecordRow | null>;
  delete(pk: string): Promise<boolean>;
}

export class StoreConstraintError extends Error {
  constructor(message: string, public readonly field?: string) {
    super(message);
    this.name = "StoreConstraintError";
    Object.setPrototypeOf(this, StoreConstraintError.prototype);
  }
}
