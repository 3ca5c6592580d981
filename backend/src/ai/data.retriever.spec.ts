import { ConfigService } from '@nestjs/config';

import { BackendUnavailableError } from '../common/errors/parking.errors';
import { LoggingService } from '../logging/logging.service';
import { InMemoryVisitorStore } from '../visitors/testing/in-memory-visitor.store';
import { VisitorStatus } from '../visitors/visitor.types';
import { VisitorsService } from '../visitors/visitors.service';
import { DataRetrieverService, LIST_LIMIT, occupancyVerdict } from './data.retriever';

function createRetriever(config: Record<string, unknown> = {}) {
  const store = new InMemoryVisitorStore();
  const configService = new ConfigService(config);
  const visitorsService = new VisitorsService(
    store,
    new LoggingService(configService),
    configService,
  );
  return { store, retriever: new DataRetrieverService(visitorsService) };
}

async function seed(
  store: InMemoryVisitorStore,
  index: number,
  overrides: { name?: string; unitNumber?: string; status?: VisitorStatus } = {},
) {
  return store.insert({
    name: overrides.name ?? `Visitor${index}`,
    identityNumber: `IC${index}`,
    licensePlate: `PLT${index}`,
    unitNumber: overrides.unitNumber ?? 'A-1-01',
    status: overrides.status ?? 'active',
    createdAt: new Date(2026, 2, 1, 9, index),
  });
}

describe('occupancyVerdict', () => {
  it.each([
    [-3, 'FULL'],
    [0, 'FULL'],
    [1, 'LOW'],
    [19, 'LOW'],
    [20, 'AVAILABLE'],
    [102, 'AVAILABLE'],
  ])('maps %p available spots to %p', (available, verdict) => {
    expect(occupancyVerdict(available)).toBe(verdict);
  });
});

describe('DataRetrieverService', () => {
  describe('stats', () => {
    it('reports counts against the default capacity', async () => {
      const { store, retriever } = createRetriever();
      for (let index = 1; index <= 5; index++) {
        await seed(store, index, { status: index > 3 ? 'left' : 'active' });
      }

      const result = await retriever.dispatch({ tool: 'stats' });

      expect(result).toEqual({
        tool: 'stats',
        stats: { active: 3, left: 2, total: 5, capacity: 105, available: 102 },
        text: 'Active visitors: 3\nLeft visitors: 2\nTotal registered: 5\nAvailable spots: 102/105',
      });
    });
  });

  describe('summary', () => {
    it('flags a full car park', async () => {
      const { store, retriever } = createRetriever({ PARKING_CAPACITY: '2' });
      await seed(store, 1);
      await seed(store, 2);

      const result = await retriever.dispatch({ tool: 'summary' });

      expect(result.text).toBe('PARKING FULL\n2 cars parked, 0 spots available');
    });

    it('flags low availability', async () => {
      const { store, retriever } = createRetriever({ PARKING_CAPACITY: '20' });
      await seed(store, 1);

      const result = await retriever.dispatch({ tool: 'summary' });

      expect(result.text).toBe('LOW AVAILABILITY\n1 cars parked, 19 spots available');
    });

    it('reports plenty of space', async () => {
      const { retriever } = createRetriever();

      const result = await retriever.dispatch({ tool: 'summary' });

      expect(result).toMatchObject({
        tool: 'summary',
        verdict: 'AVAILABLE',
        text: 'PARKING AVAILABLE\n0 cars parked, 105 spots available',
      });
    });
  });

  describe('list', () => {
    it('says so when nothing is registered', async () => {
      const { retriever } = createRetriever();

      const result = await retriever.dispatch({ tool: 'list' });

      expect(result.text).toBe('No visitors found in the database.');
    });

    it('numbers the newest visitors first with every field', async () => {
      const { store, retriever } = createRetriever();
      await seed(store, 1, { name: 'Alice', unitNumber: 'B-1-01', status: 'left' });
      await seed(store, 2, { name: 'Bob', unitNumber: 'A-2-02' });

      const result = await retriever.dispatch({ tool: 'list' });

      expect(result.text).toBe(
        [
          'Total Visitors Found: 2',
          '',
          '1. Bob',
          '   - IC: IC2',
          '   - Plate: PLT2',
          '   - Unit: A-2-02',
          '   - Status: Active',
          '   - Registered: 2026-03-01 09:02',
          '',
          '2. Alice',
          '   - IC: IC1',
          '   - Plate: PLT1',
          '   - Unit: B-1-01',
          '   - Status: Left',
          '   - Registered: 2026-03-01 09:01',
        ].join('\n'),
      );
    });

    it('caps the listing', async () => {
      const { store, retriever } = createRetriever();
      for (let index = 1; index <= LIST_LIMIT + 5; index++) {
        await seed(store, index);
      }

      const result = await retriever.dispatch({ tool: 'list' });

      expect(result.tool === 'list' && result.visitors).toHaveLength(LIST_LIMIT);
      expect(result.text.startsWith(`Total Visitors Found: ${LIST_LIMIT}\n`)).toBe(true);
    });
  });

  describe('search', () => {
    it('describes the first visitor whose name matches', async () => {
      const { store, retriever } = createRetriever();
      await seed(store, 7, { name: 'John Lim', unitNumber: 'C-3-03' });

      const result = await retriever.dispatch({ tool: 'search', name: 'John' });

      expect(result.text).toBe(
        [
          'Found visitor:',
          'Name: John Lim',
          'IC: IC7',
          'Plate: PLT7',
          'Unit: C-3-03',
          'Status: Active',
          'Registered: 2026-03-01 09:07',
        ].join('\n'),
      );
    });

    it('says so when nobody matches', async () => {
      const { retriever } = createRetriever();

      const result = await retriever.dispatch({ tool: 'search', name: 'Zed' });

      expect(result).toEqual({
        tool: 'search',
        name: 'Zed',
        visitor: null,
        text: "No visitor found with name 'Zed'.",
      });
    });
  });

  describe('unit', () => {
    it('lists every visitor for the unit', async () => {
      const { store, retriever } = createRetriever();
      await seed(store, 1, { name: 'Alice', unitNumber: 'B-1-01' });
      await seed(store, 2, { name: 'Bob', unitNumber: 'B-1-01', status: 'left' });
      await seed(store, 3, { name: 'Carol', unitNumber: 'A-2-02' });

      const result = await retriever.dispatch({ tool: 'unit', unitNumber: 'B-1-01' });

      expect(result.text).toBe(
        'Found 2 visitors for unit B-1-01:\n1. Alice - PLT1 (active)\n2. Bob - PLT2 (left)',
      );
    });

    it('says so when the unit has no visitors', async () => {
      const { retriever } = createRetriever();

      const result = await retriever.dispatch({ tool: 'unit', unitNumber: 'Z-9' });

      expect(result.text).toBe('No visitors found for unit Z-9.');
    });
  });

  it('propagates store failures', async () => {
    const { store, retriever } = createRetriever();
    jest.spyOn(store, 'count').mockRejectedValue(new Error('connect ECONNREFUSED'));

    await expect(retriever.dispatch({ tool: 'stats' })).rejects.toBeInstanceOf(
      BackendUnavailableError,
    );
  });
});
