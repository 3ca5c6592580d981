export type DuplicateField = 'identity_number' | 'license_plate';

export abstract class ParkingError extends Error {
  abstract readonly kind: 'validation' | 'duplicate' | 'not_found' | 'backend_unavailable';

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidationError extends ParkingError {
  readonly kind = 'validation';
}

export class DuplicateError extends ParkingError {
  readonly kind = 'duplicate';

  constructor(readonly field: DuplicateField) {
    super(
      `Visitor with this ${field === 'identity_number' ? 'IC number' : 'license plate'} already exists`,
    );
  }
}

export class NotFoundError extends ParkingError {
  readonly kind = 'not_found';
}

/**
 * The record store or the generative backend could not be reached.
 * `origin` carries the underlying driver/SDK error for logging only.
 */
export class BackendUnavailableError extends ParkingError {
  readonly kind = 'backend_unavailable';

  constructor(
    message: string,
    readonly origin?: unknown,
  ) {
    super(message);
  }
}
