export const VISITOR_STATUSES = ['active', 'left'] as const;

export type VisitorStatus = (typeof VISITOR_STATUSES)[number];

export interface VisitorRecord {
  id: string;
  name: string;
  identityNumber: string;
  licensePlate: string;
  unitNumber: string;
  status: VisitorStatus;
  createdAt: Date;
  lastUpdated: Date | null;
}

export type NewVisitorRecord = Omit<VisitorRecord, 'id' | 'lastUpdated'>;

export interface RegisterVisitorInput {
  name: string;
  identityNumber: string;
  licensePlate: string;
  unitNumber: string;
}

export interface OccupancyStats {
  active: number;
  left: number;
  total: number;
  capacity: number;
  available: number;
}

export function isVisitorStatus(value: string): value is VisitorStatus {
  return VISITOR_STATUSES.some((status) => status === value);
}
