import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { isUUID } from 'class-validator';

import { DuplicateField } from '../common/errors/parking.errors';
import { DatabaseService } from '../database/database.service';
import {
  FindOptions,
  isAnyOfFilter,
  UniqueViolationError,
  UpdateResult,
  VisitorFilter,
  VisitorQuery,
  VisitorStore,
} from './visitor.store';
import { isVisitorStatus, NewVisitorRecord, VisitorRecord, VisitorStatus } from './visitor.types';

interface VisitorRow {
  id: string;
  name: string;
  identity_number: string;
  license_plate: string;
  unit_number: string;
  status: string;
  created_at: Date;
  last_updated: Date | null;
}

interface CountRow {
  count: string;
}

interface ModifiedRow {
  modified: boolean;
}

const VISITOR_COLUMNS =
  'id, name, identity_number, license_plate, unit_number, status, created_at, last_updated';

export const VISITORS_SCHEMA = `
  create table if not exists public.visitors (
    id uuid primary key default gen_random_uuid(),
    name text not null,
    identity_number text not null,
    license_plate text not null,
    unit_number text not null,
    status text not null default 'active' check (status in ('active', 'left')),
    created_at timestamptz not null default now(),
    last_updated timestamptz,
    constraint visitors_identity_number_key unique (identity_number),
    constraint visitors_license_plate_key unique (license_plate)
  );
  create index if not exists visitors_unit_number_idx on public.visitors (unit_number);
`;

const CONSTRAINT_FIELDS: Record<string, DuplicateField> = {
  visitors_identity_number_key: 'identity_number',
  visitors_license_plate_key: 'license_plate',
};

const FILTER_COLUMNS = [
  ['identityNumber', 'identity_number'],
  ['licensePlate', 'license_plate'],
  ['unitNumber', 'unit_number'],
  ['status', 'status'],
] as const;

function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, '\\$&');
}

/**
 * Appends the filter's values to `params` and returns the matching SQL
 * predicate. An empty filter matches every row.
 */
export function buildPredicate(query: VisitorQuery, params: unknown[]): string {
  if (isAnyOfFilter(query)) {
    if (query.anyOf.length === 0) {
      return 'false';
    }
    return query.anyOf.map((filter) => `(${buildPredicate(filter, params)})`).join(' or ');
  }

  const clauses: string[] = [];
  for (const [key, column] of FILTER_COLUMNS) {
    const value = query[key];
    if (value !== undefined) {
      params.push(value);
      clauses.push(`${column} = $${params.length}`);
    }
  }

  if (query.nameContains !== undefined) {
    params.push(`%${escapeLike(query.nameContains)}%`);
    clauses.push(`name ilike $${params.length}`);
  }

  return clauses.length > 0 ? clauses.join(' and ') : 'true';
}

function uniqueViolationOf(error: unknown): UniqueViolationError | null {
  if (!(error instanceof Error) || !('code' in error) || error.code !== '23505') {
    return null;
  }

  const constraint = 'constraint' in error ? error.constraint : undefined;
  return new UniqueViolationError(
    typeof constraint === 'string' ? CONSTRAINT_FIELDS[constraint] : undefined,
  );
}

@Injectable()
export class PgVisitorStore extends VisitorStore implements OnModuleInit {
  private readonly logger = new Logger(PgVisitorStore.name);

  constructor(private readonly databaseService: DatabaseService) {
    super();
  }

  async onModuleInit(): Promise<void> {
    await this.databaseService.runQuery(VISITORS_SCHEMA);
    this.logger.log('Visitors table and indexes are in place');
  }

  async findById(id: string): Promise<VisitorRecord | null> {
    if (!isUUID(id)) {
      return null;
    }

    const result = await this.databaseService.runQuery<VisitorRow>(
      `select ${VISITOR_COLUMNS} from public.visitors where id = $1`,
      [id],
    );
    return result.rows.length > 0 ? this.mapRow(result.rows[0]) : null;
  }

  async findOne(query: VisitorQuery): Promise<VisitorRecord | null> {
    const [first] = await this.find(query, { limit: 1 });
    return first ?? null;
  }

  async find(query: VisitorQuery, options: FindOptions = {}): Promise<VisitorRecord[]> {
    const params: unknown[] = [];
    let sql = `select ${VISITOR_COLUMNS} from public.visitors where ${buildPredicate(
      query,
      params,
    )}`;

    // id breaks created_at ties so equal timestamps still page deterministically
    sql += options.newestFirst
      ? ' order by created_at desc, id desc'
      : ' order by created_at asc, id asc';

    if (options.limit !== undefined) {
      params.push(options.limit);
      sql += ` limit $${params.length}`;
    }

    const result = await this.databaseService.runQuery<VisitorRow>(sql, params);
    return result.rows.map((row) => this.mapRow(row));
  }

  async insert(record: NewVisitorRecord): Promise<VisitorRecord> {
    try {
      const result = await this.databaseService.runQuery<VisitorRow>(
        `insert into public.visitors (name, identity_number, license_plate, unit_number, status, created_at)
         values ($1, $2, $3, $4, $5, $6)
         returning ${VISITOR_COLUMNS}`,
        [
          record.name,
          record.identityNumber,
          record.licensePlate,
          record.unitNumber,
          record.status,
          record.createdAt,
        ],
      );
      return this.mapRow(result.rows[0]);
    } catch (error) {
      throw uniqueViolationOf(error) ?? error;
    }
  }

  async updateStatus(id: string, status: VisitorStatus, at: Date): Promise<UpdateResult> {
    if (!isUUID(id)) {
      return { matchedCount: 0, modifiedCount: 0 };
    }

    const result = await this.databaseService.runQuery<ModifiedRow>(
      `with prior as (
         select id, status from public.visitors where id = $1 for update
       )
       update public.visitors v
          set status = $2, last_updated = $3
         from prior
        where v.id = prior.id
       returning (prior.status <> $2) as modified`,
      [id, status, at],
    );

    return {
      matchedCount: result.rows.length,
      modifiedCount: result.rows.filter((row) => row.modified).length,
    };
  }

  async deleteById(id: string): Promise<number> {
    if (!isUUID(id)) {
      return 0;
    }

    const result = await this.databaseService.runQuery('delete from public.visitors where id = $1', [
      id,
    ]);
    return result.rowCount ?? 0;
  }

  async count(query: VisitorQuery): Promise<number> {
    const params: unknown[] = [];
    const result = await this.databaseService.runQuery<CountRow>(
      `select count(*) as count from public.visitors where ${buildPredicate(query, params)}`,
      params,
    );
    return parseInt(result.rows[0]?.count ?? '0', 10);
  }

  private mapRow(row: VisitorRow): VisitorRecord {
    const status = row.status.toLowerCase();
    if (!isVisitorStatus(status)) {
      throw new Error(`Visitor ${row.id} has unexpected status "${row.status}"`);
    }

    return {
      id: row.id,
      name: row.name,
      identityNumber: row.identity_number,
      licensePlate: row.license_plate,
      unitNumber: row.unit_number,
      status,
      createdAt: row.created_at,
      lastUpdated: row.last_updated,
    };
  }
}
