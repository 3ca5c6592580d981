import { Injectable, Logger } from '@nestjs/common';
import { format } from 'date-fns';

import { OccupancyStats, VisitorRecord } from '../visitors/visitor.types';
import { VisitorsService } from '../visitors/visitors.service';

export const LIST_LIMIT = 20;
export const LOW_AVAILABILITY_THRESHOLD = 20;

export type OccupancyVerdict = 'FULL' | 'LOW' | 'AVAILABLE';

export type ToolCall =
  | { tool: 'stats' }
  | { tool: 'summary' }
  | { tool: 'list' }
  | { tool: 'search'; name: string }
  | { tool: 'unit'; unitNumber: string };

export type ToolResult =
  | { tool: 'stats'; stats: OccupancyStats; text: string }
  | { tool: 'summary'; verdict: OccupancyVerdict; stats: OccupancyStats; text: string }
  | { tool: 'list'; visitors: VisitorRecord[]; text: string }
  | { tool: 'search'; name: string; visitor: VisitorRecord | null; text: string }
  | { tool: 'unit'; unitNumber: string; visitors: VisitorRecord[]; text: string };

const VERDICT_LABELS: Record<OccupancyVerdict, string> = {
  FULL: 'PARKING FULL',
  LOW: 'LOW AVAILABILITY',
  AVAILABLE: 'PARKING AVAILABLE',
};

export function occupancyVerdict(available: number): OccupancyVerdict {
  if (available <= 0) {
    return 'FULL';
  }
  return available < LOW_AVAILABILITY_THRESHOLD ? 'LOW' : 'AVAILABLE';
}

function registeredAt(visitor: VisitorRecord): string {
  return format(visitor.createdAt, 'yyyy-MM-dd HH:mm');
}

function displayStatus(visitor: VisitorRecord): string {
  return visitor.status.charAt(0).toUpperCase() + visitor.status.slice(1);
}

/**
 * Runs the single read-only query behind a chat intent and renders it as
 * plain text. The text does not depend on the generative model and is
 * what the composer hands to it as context.
 */
@Injectable()
export class DataRetrieverService {
  private readonly logger = new Logger(DataRetrieverService.name);

  constructor(private readonly visitorsService: VisitorsService) {}

  async dispatch(call: ToolCall): Promise<ToolResult> {
    this.logger.debug(`Dispatching ${call.tool} tool`);

    switch (call.tool) {
      case 'stats':
        return this.stats();
      case 'summary':
        return this.summary();
      case 'list':
        return this.list();
      case 'search':
        return this.search(call.name);
      case 'unit':
        return this.unit(call.unitNumber);
    }
  }

  private async stats(): Promise<ToolResult> {
    const stats = await this.visitorsService.getOccupancy();
    const text = [
      `Active visitors: ${stats.active}`,
      `Left visitors: ${stats.left}`,
      `Total registered: ${stats.total}`,
      `Available spots: ${stats.available}/${stats.capacity}`,
    ].join('\n');

    return { tool: 'stats', stats, text };
  }

  private async summary(): Promise<ToolResult> {
    const stats = await this.visitorsService.getOccupancy();
    const verdict = occupancyVerdict(stats.available);
    const text = `${VERDICT_LABELS[verdict]}\n${stats.active} cars parked, ${stats.available} spots available`;

    return { tool: 'summary', verdict, stats, text };
  }

  private async list(): Promise<ToolResult> {
    const visitors = await this.visitorsService.listRecent(LIST_LIMIT);
    if (visitors.length === 0) {
      return { tool: 'list', visitors, text: 'No visitors found in the database.' };
    }

    const entries = visitors.map((visitor, index) =>
      [
        `${index + 1}. ${visitor.name}`,
        `   - IC: ${visitor.identityNumber}`,
        `   - Plate: ${visitor.licensePlate}`,
        `   - Unit: ${visitor.unitNumber}`,
        `   - Status: ${displayStatus(visitor)}`,
        `   - Registered: ${registeredAt(visitor)}`,
      ].join('\n'),
    );

    return {
      tool: 'list',
      visitors,
      text: `Total Visitors Found: ${visitors.length}\n\n${entries.join('\n\n')}`,
    };
  }

  private async search(name: string): Promise<ToolResult> {
    const visitor = await this.visitorsService.searchByName(name);
    if (!visitor) {
      return { tool: 'search', name, visitor, text: `No visitor found with name '${name}'.` };
    }

    const text = [
      'Found visitor:',
      `Name: ${visitor.name}`,
      `IC: ${visitor.identityNumber}`,
      `Plate: ${visitor.licensePlate}`,
      `Unit: ${visitor.unitNumber}`,
      `Status: ${displayStatus(visitor)}`,
      `Registered: ${registeredAt(visitor)}`,
    ].join('\n');

    return { tool: 'search', name, visitor, text };
  }

  private async unit(unitNumber: string): Promise<ToolResult> {
    const visitors = await this.visitorsService.listByUnit(unitNumber);
    if (visitors.length === 0) {
      return { tool: 'unit', unitNumber, visitors, text: `No visitors found for unit ${unitNumber}.` };
    }

    const lines = visitors.map(
      (visitor, index) =>
        `${index + 1}. ${visitor.name} - ${visitor.licensePlate} (${visitor.status})`,
    );

    return {
      tool: 'unit',
      unitNumber,
      visitors,
      text: `Found ${visitors.length} visitors for unit ${unitNumber}:\n${lines.join('\n')}`,
    };
  }
}
