import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import {
  BackendUnavailableError,
  DuplicateError,
  DuplicateField,
  NotFoundError,
  ParkingError,
  ValidationError,
} from '../common/errors/parking.errors';
import { LoggingService } from '../logging/logging.service';
import { UniqueViolationError, VisitorStore } from './visitor.store';
import {
  isVisitorStatus,
  OccupancyStats,
  RegisterVisitorInput,
  VisitorRecord,
  VisitorStatus,
} from './visitor.types';

export const DEFAULT_PARKING_CAPACITY = 105;

export interface StatusChange {
  changed: boolean;
}

/**
 * Lifecycle of visitor records: register, list, status updates and removal.
 *
 * Identity numbers and license plates are upper-cased before they are
 * compared or stored. The pre-insert lookup only exists to report which
 * field collided; the store's unique indexes decide, and a collision they
 * report after the lookup passed is surfaced as the same DuplicateError.
 */
@Injectable()
export class VisitorsService {
  private readonly logger = new Logger(VisitorsService.name);
  private readonly capacity: number;

  constructor(
    private readonly store: VisitorStore,
    private readonly loggingService: LoggingService,
    configService: ConfigService,
  ) {
    this.capacity = this.parseCapacity(configService.get<unknown>('PARKING_CAPACITY'));
  }

  async register(input: RegisterVisitorInput): Promise<VisitorRecord> {
    const name = this.requireText(input.name, 'Name');
    const identityNumber = this.requireText(input.identityNumber, 'IC number').toUpperCase();
    const licensePlate = this.requireText(input.licensePlate, 'License plate').toUpperCase();
    const unitNumber = this.requireText(input.unitNumber, 'Unit number');

    const collision = await this.findCollision(identityNumber, licensePlate);
    if (collision) {
      throw new DuplicateError(collision);
    }

    let record: VisitorRecord;
    try {
      record = await this.store.insert({
        name,
        identityNumber,
        licensePlate,
        unitNumber,
        status: 'active',
        createdAt: new Date(),
      });
    } catch (error) {
      if (error instanceof UniqueViolationError) {
        this.logger.warn(`Lost a registration race for IC ${identityNumber} / plate ${licensePlate}`);
        throw new DuplicateError(
          error.field ?? (await this.lookUpLostRace(identityNumber, licensePlate)),
        );
      }
      throw this.unavailable('register', error);
    }

    this.loggingService.logVisitorEvent('registered', record.id, {
      licensePlate,
      unitNumber,
    });
    return record;
  }

  async listAll(): Promise<VisitorRecord[]> {
    return this.guard('list', () => this.store.find({}, { newestFirst: true }));
  }

  async listRecent(limit: number): Promise<VisitorRecord[]> {
    return this.guard('list recent', () => this.store.find({}, { newestFirst: true, limit }));
  }

  async updateStatus(id: string, newStatus: string): Promise<StatusChange> {
    const status = this.parseStatus(newStatus);

    const result = await this.guard('update status', () =>
      this.store.updateStatus(id, status, new Date()),
    );
    if (result.matchedCount === 0) {
      throw new NotFoundError('Visitor not found.');
    }

    const changed = result.modifiedCount > 0;
    this.loggingService.logVisitorEvent('status_updated', id, { status, changed });
    return { changed };
  }

  async delete(id: string): Promise<void> {
    const deleted = await this.guard('delete', () => this.store.deleteById(id));
    if (deleted === 0) {
      throw new NotFoundError('Visitor not found.');
    }

    this.loggingService.logVisitorEvent('deleted', id);
  }

  async getOccupancy(): Promise<OccupancyStats> {
    const [active, left, total] = await this.guard('occupancy', () =>
      Promise.all([
        this.store.count({ status: 'active' }),
        this.store.count({ status: 'left' }),
        this.store.count({}),
      ]),
    );

    return { active, left, total, capacity: this.capacity, available: this.capacity - active };
  }

  async searchByName(name: string): Promise<VisitorRecord | null> {
    return this.guard('search', () => this.store.findOne({ nameContains: name }));
  }

  async listByUnit(unitNumber: string): Promise<VisitorRecord[]> {
    return this.guard('unit lookup', () => this.store.find({ unitNumber }));
  }

  /** Identity number wins when both fields collide, possibly on different records. */
  private async findCollision(
    identityNumber: string,
    licensePlate: string,
  ): Promise<DuplicateField | null> {
    const existing = await this.guard('duplicate check', () =>
      this.store.find({ anyOf: [{ identityNumber }, { licensePlate }] }, { limit: 2 }),
    );

    if (existing.some((visitor) => visitor.identityNumber === identityNumber)) {
      return 'identity_number';
    }
    return existing.length > 0 ? 'license_plate' : null;
  }

  // The insert was already rejected as a duplicate; a failed follow-up lookup
  // must not turn that into a backend error.
  private async lookUpLostRace(
    identityNumber: string,
    licensePlate: string,
  ): Promise<DuplicateField> {
    try {
      return (await this.findCollision(identityNumber, licensePlate)) ?? 'identity_number';
    } catch (error) {
      this.logger.warn(
        `Could not tell which field collided for IC ${identityNumber}: ${
          error instanceof Error ? error.message : String(error)
        }`,
      );
      return 'identity_number';
    }
  }

  private parseStatus(value: string): VisitorStatus {
    const normalized = typeof value === 'string' ? value.trim().toLowerCase() : '';
    if (!isVisitorStatus(normalized)) {
      throw new ValidationError(`Invalid status "${value}". Must be 'active' or 'left'.`);
    }
    return normalized;
  }

  private requireText(value: string | undefined, label: string): string {
    const trimmed = typeof value === 'string' ? value.trim() : '';
    if (!trimmed) {
      throw new ValidationError(`${label} is required`);
    }
    return trimmed;
  }

  private parseCapacity(raw: unknown): number {
    if (raw === undefined || raw === null || raw === '') {
      return DEFAULT_PARKING_CAPACITY;
    }

    const capacity = Number(raw);
    if (!Number.isInteger(capacity) || capacity <= 0) {
      this.logger.warn(
        `PARKING_CAPACITY "${String(raw)}" is not a positive integer; using ${DEFAULT_PARKING_CAPACITY}`,
      );
      return DEFAULT_PARKING_CAPACITY;
    }
    return capacity;
  }

  private async guard<T>(operation: string, call: () => Promise<T>): Promise<T> {
    try {
      return await call();
    } catch (error) {
      if (error instanceof ParkingError) {
        throw error;
      }
      throw this.unavailable(operation, error);
    }
  }

  private unavailable(operation: string, error: unknown): BackendUnavailableError {
    const message = error instanceof Error ? error.message : String(error);
    this.logger.error(
      `Visitor store failed during ${operation}: ${message}`,
      error instanceof Error ? error.stack : undefined,
    );
    return new BackendUnavailableError('Visitor store is unavailable. Please try again.', error);
  }
}
