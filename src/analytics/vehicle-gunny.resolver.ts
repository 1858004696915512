import { formatTime, toCount } from '../../libs/common';
import type { SqlNumeric, SqlTemporal } from '../../libs/common';

export type PlateSightingRow = {
  number_plate: string | null;
  chunk_id: string | null;
};

export type PlateChunks = {
  number_plate: string;
  chunk_ids: string[];
};

export type ActionAggregateRow = {
  action: string | null;
  total_count: SqlNumeric;
  entry_count: SqlNumeric;
  first_entry_time: SqlTemporal;
  last_entry_time: SqlTemporal;
};

export type ActionBreakdown = {
  action: string | null;
  total_count: number;
  number_of_entries: number;
  first_entry_time: string | null;
  last_entry_time: string | null;
};

export type VehicleGunnyCount = {
  number_plate: string;
  chunk_ids: string[];
  /** Chunks this plate shares with at least one other plate; their bags are attributed to each of them. */
  shared_chunk_ids: string[];
  total_bags_all_actions: number;
  action_breakdown: ActionBreakdown[];
};

export type VehicleGunnyReport = {
  total_vehicles: number;
  grand_total_bags: number;
  vehicles: VehicleGunnyCount[];
};

/** Fetches per-action gunny aggregates for the given chunk ids within the current scope. */
export type GunnyLookup = (chunkIds: string[]) => Promise<ActionAggregateRow[]>;

const byCodeUnit = (a: string, b: string) => (a < b ? -1 : a > b ? 1 : 0);

/**
 * Groups vehicle sightings into one distinct chunk set per plate. Sightings
 * without a plate or chunk are ignored; plates and chunk ids come back sorted.
 */
export function collectPlateChunks(rows: PlateSightingRow[]): PlateChunks[] {
  const plates = new Map<string, Set<string>>();

  for (const { number_plate, chunk_id } of rows) {
    if (!number_plate || !chunk_id) continue;
    const chunks = plates.get(number_plate) ?? new Set<string>();
    chunks.add(chunk_id);
    plates.set(number_plate, chunks);
  }

  return [...plates.entries()]
    .sort(([a], [b]) => byCodeUnit(a, b))
    .map(([number_plate, chunks]) => ({
      number_plate,
      chunk_ids: [...chunks].sort(byCodeUnit),
    }));
}

export function toActionBreakdown(row: ActionAggregateRow): ActionBreakdown {
  return {
    action: row.action,
    total_count: toCount(row.total_count),
    number_of_entries: toCount(row.entry_count),
    first_entry_time: formatTime(row.first_entry_time),
    last_entry_time: formatTime(row.last_entry_time),
  };
}

function sharedChunks(plates: PlateChunks[]): Set<string> {
  const seen = new Map<string, number>();
  for (const { chunk_ids } of plates) {
    for (const chunkId of chunk_ids) {
      seen.set(chunkId, (seen.get(chunkId) ?? 0) + 1);
    }
  }
  return new Set([...seen].filter(([, plateCount]) => plateCount > 1).map(([chunkId]) => chunkId));
}

/**
 * Attributes gunny-bag events to vehicles through the chunks each plate was
 * seen in. Plates are resolved one at a time, in order, with one lookup per
 * plate. A plate with no matching events stays in the report with a zero
 * total. When two plates share a chunk, that chunk's events count toward
 * both plates and toward the grand total twice.
 */
export async function resolveVehicleGunnyCounts(
  plates: PlateChunks[],
  lookup: GunnyLookup,
): Promise<VehicleGunnyReport> {
  const shared = sharedChunks(plates);
  const vehicles: VehicleGunnyCount[] = [];
  let grandTotal = 0;

  for (const plate of plates) {
    const action_breakdown = (await lookup(plate.chunk_ids)).map(toActionBreakdown);
    const total = action_breakdown.reduce((sum, entry) => sum + entry.total_count, 0);

    vehicles.push({
      number_plate: plate.number_plate,
      chunk_ids: plate.chunk_ids,
      shared_chunk_ids: plate.chunk_ids.filter((chunkId) => shared.has(chunkId)),
      total_bags_all_actions: total,
      action_breakdown,
    });
    grandTotal += total;
  }

  return {
    total_vehicles: plates.length,
    grand_total_bags: grandTotal,
    vehicles,
  };
}
