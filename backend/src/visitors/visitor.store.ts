import { DuplicateField } from '../common/errors/parking.errors';
import { NewVisitorRecord, VisitorRecord, VisitorStatus } from './visitor.types';

/**
 * Equality filter over visitor fields. `nameContains` is a case-insensitive
 * substring match; every other key is an exact match. Keys are AND-ed.
 */
export interface VisitorFilter {
  identityNumber?: string;
  licensePlate?: string;
  unitNumber?: string;
  status?: VisitorStatus;
  nameContains?: string;
}

/** Matches a record when any of the filters matches. */
export interface AnyOfFilter {
  anyOf: VisitorFilter[];
}

export type VisitorQuery = VisitorFilter | AnyOfFilter;

export interface FindOptions {
  limit?: number;
  newestFirst?: boolean;
}

export interface UpdateResult {
  matchedCount: number;
  modifiedCount: number;
}

/**
 * Raised by a store when an insert collides with a unique index.
 * `field` is undefined when the store cannot tell which index fired.
 */
export class UniqueViolationError extends Error {
  constructor(readonly field?: DuplicateField) {
    super(`Unique index violation${field ? ` on ${field}` : ''}`);
    this.name = UniqueViolationError.name;
  }
}

/**
 * Record store for visitor documents. Identifiers that do not resolve
 * (including malformed ones) behave like missing records: `null` from
 * `findById`, zero counts from `updateStatus` and `deleteById`.
 */
export abstract class VisitorStore {
  abstract findById(id: string): Promise<VisitorRecord | null>;

  abstract findOne(query: VisitorQuery): Promise<VisitorRecord | null>;

  abstract find(query: VisitorQuery, options?: FindOptions): Promise<VisitorRecord[]>;

  /** @throws UniqueViolationError when a unique index rejects the record */
  abstract insert(record: NewVisitorRecord): Promise<VisitorRecord>;

  /**
   * `modifiedCount` is 0 when the record already had `status`;
   * `lastUpdated` is written either way.
   */
  abstract updateStatus(id: string, status: VisitorStatus, at: Date): Promise<UpdateResult>;

  abstract deleteById(id: string): Promise<number>;

  abstract count(query: VisitorQuery): Promise<number>;
}

export function isAnyOfFilter(query: VisitorQuery): query is AnyOfFilter {
  return 'anyOf' in query;
}
