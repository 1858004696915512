import {
  ActionAggregateRow,
  collectPlateChunks,
  resolveVehicleGunnyCounts,
  toActionBreakdown,
} from './vehicle-gunny.resolver';

type GunnyEvent = { chunk_id: string; action: string | null; count: number | null; created_at: string };

/** Aggregates an in-memory gunny table the way the per-plate query does. */
function lookupOver(events: GunnyEvent[]) {
  return jest.fn(async (chunkIds: string[]): Promise<ActionAggregateRow[]> => {
    const groups = new Map<string, GunnyEvent[]>();
    for (const event of events.filter((e) => chunkIds.includes(e.chunk_id))) {
      const key = event.action ?? '';
      groups.set(key, [...(groups.get(key) ?? []), event]);
    }
    return [...groups.entries()]
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([, group]) => {
        const times = group.map((e) => e.created_at).sort();
        return {
          action: group[0].action,
          total_count: String(group.reduce((sum, e) => sum + (e.count ?? 0), 0)),
          entry_count: String(group.length),
          first_entry_time: times[0],
          last_entry_time: times[times.length - 1],
        };
      });
  });
}

describe('collectPlateChunks', () => {
  it('builds a sorted distinct chunk set per plate', () => {
    expect(
      collectPlateChunks([
        { number_plate: 'KA02CD5678', chunk_id: 'c3' },
        { number_plate: 'KA01AB1234', chunk_id: 'c2' },
        { number_plate: 'KA01AB1234', chunk_id: 'c1' },
        { number_plate: 'KA01AB1234', chunk_id: 'c1' },
        { number_plate: null, chunk_id: 'c4' },
        { number_plate: 'KA03EF9012', chunk_id: null },
      ]),
    ).toEqual([
      { number_plate: 'KA01AB1234', chunk_ids: ['c1', 'c2'] },
      { number_plate: 'KA02CD5678', chunk_ids: ['c3'] },
    ]);
  });

  it('orders plates by code unit', () => {
    const plates = collectPlateChunks([
      { number_plate: 'ka01', chunk_id: 'c1' },
      { number_plate: 'KA01', chunk_id: 'c2' },
      { number_plate: 'KA001', chunk_id: 'c3' },
    ]);

    expect(plates.map((p) => p.number_plate)).toEqual(['KA001', 'KA01', 'ka01']);
  });
});

describe('toActionBreakdown', () => {
  it('converts aggregates and renders times of day', () => {
    expect(
      toActionBreakdown({
        action: 'loading',
        total_count: null,
        entry_count: '2',
        first_entry_time: '2025-09-22 10:01:00',
        last_entry_time: '2025-09-22 10:20:00',
      }),
    ).toEqual({
      action: 'loading',
      total_count: 0,
      number_of_entries: 2,
      first_entry_time: '10:01:00',
      last_entry_time: '10:20:00',
    });
  });
});

describe('resolveVehicleGunnyCounts', () => {
  it('sums the gunny events of every chunk the plate was seen in', async () => {
    const lookup = lookupOver([
      { chunk_id: 'c1', action: 'loading', count: 5, created_at: '2025-09-22 10:01:00' },
      { chunk_id: 'c2', action: 'unloading', count: 3, created_at: '2025-09-22 11:00:00' },
      { chunk_id: 'c7', action: 'loading', count: 40, created_at: '2025-09-22 12:00:00' },
    ]);

    const report = await resolveVehicleGunnyCounts(
      [
        { number_plate: 'KA01AB1234', chunk_ids: ['c1', 'c2'] },
        { number_plate: 'KA09ZZ0001', chunk_ids: ['c9'] },
      ],
      lookup,
    );

    expect(report).toEqual({
      total_vehicles: 2,
      grand_total_bags: 8,
      vehicles: [
        {
          number_plate: 'KA01AB1234',
          chunk_ids: ['c1', 'c2'],
          shared_chunk_ids: [],
          total_bags_all_actions: 8,
          action_breakdown: [
            {
              action: 'loading',
              total_count: 5,
              number_of_entries: 1,
              first_entry_time: '10:01:00',
              last_entry_time: '10:01:00',
            },
            {
              action: 'unloading',
              total_count: 3,
              number_of_entries: 1,
              first_entry_time: '11:00:00',
              last_entry_time: '11:00:00',
            },
          ],
        },
        {
          number_plate: 'KA09ZZ0001',
          chunk_ids: ['c9'],
          shared_chunk_ids: [],
          total_bags_all_actions: 0,
          action_breakdown: [],
        },
      ],
    });
  });

  it('looks plates up one at a time in plate order', async () => {
    const lookup = lookupOver([]);

    await resolveVehicleGunnyCounts(
      [
        { number_plate: 'A', chunk_ids: ['c1', 'c2'] },
        { number_plate: 'B', chunk_ids: ['c3'] },
      ],
      lookup,
    );

    expect(lookup.mock.calls).toEqual([[['c1', 'c2']], [['c3']]]);
  });

  it('attributes a shared chunk to every plate seen in it', async () => {
    const lookup = lookupOver([
      { chunk_id: 'c1', action: 'loading', count: 4, created_at: '2025-09-22 09:00:00' },
      { chunk_id: 'c2', action: 'unloading', count: 1, created_at: '2025-09-22 09:30:00' },
    ]);

    const report = await resolveVehicleGunnyCounts(
      [
        { number_plate: 'A', chunk_ids: ['c1'] },
        { number_plate: 'B', chunk_ids: ['c1', 'c2'] },
      ],
      lookup,
    );

    expect(report.vehicles.map((v) => [v.number_plate, v.total_bags_all_actions, v.shared_chunk_ids])).toEqual([
      ['A', 4, ['c1']],
      ['B', 5, ['c1']],
    ]);
    expect(report.grand_total_bags).toBe(9);
  });

  it('reports no vehicles for no plates', async () => {
    const lookup = lookupOver([]);

    expect(await resolveVehicleGunnyCounts([], lookup)).toEqual({ total_vehicles: 0, grand_total_bags: 0, vehicles: [] });
    expect(lookup).not.toHaveBeenCalled();
  });
});
