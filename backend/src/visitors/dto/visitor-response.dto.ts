import { VisitorRecord, VisitorStatus } from '../visitor.types';

export interface VisitorResponseDto {
  id: string;
  name: string;
  ic_number: string;
  license_plate: string;
  unit_number: string;
  status: VisitorStatus;
  registered_at: string;
  last_updated: string | null;
}

export function toVisitorResponse(record: VisitorRecord): VisitorResponseDto {
  return {
    id: record.id,
    name: record.name,
    ic_number: record.identityNumber,
    license_plate: record.licensePlate,
    unit_number: record.unitNumber,
    status: record.status,
    registered_at: record.createdAt.toISOString(),
    last_updated: record.lastUpdated ? record.lastUpdated.toISOString() : null,
  };
}
