import { formatDate, formatDateTime, formatTime, hourOf, toCount } from '../../libs/common';
import type {
  ActionTotals,
  EmployeeLogEntry,
  EmployeeLogRow,
  EmployeeLogSummary,
  GunnyLogEntry,
  GunnyLogRow,
  GunnyLogSummary,
  HourlyRange,
  Identifier,
  VehicleLogEntry,
  VehicleLogRow,
  VehicleLogSummary,
} from './logs.types';

const pad = (n: number) => String(n).padStart(2, '0');

// null and empty identifiers never count as a distinct employee or vehicle
function distinctCount(values: Array<Identifier | null>): number {
  const seen = new Set<Identifier>();
  for (const value of values) {
    if (value !== null && value !== '') seen.add(value);
  }
  return seen.size;
}

// A TIME column carries no date of its own; it borrows the row's date when there is one.
function employeeLogTime(row: EmployeeLogRow): string | null {
  const time = formatTime(row.time);
  if (time === null) return null;
  const stamp = formatDateTime(row.time);
  if (stamp) return stamp;
  const date = formatDate(row.date);
  return date ? `${date} ${time}` : time;
}

export function toEmployeeLogEntry(row: EmployeeLogRow): EmployeeLogEntry {
  return {
    log_id: row.id,
    warehouse_id: row.warehouse_id,
    emp_id: row.emp_id,
    emp_name: row.emp_name,
    emp_number: row.emp_number,
    role_name: row.role_name,
    date: formatDate(row.date),
    time: employeeLogTime(row),
    cam_id: row.cam_id,
    crop_blob_url: row.crop_blob_url,
    chunk_id: row.chunk_id,
    emp_access: row.emp_access,
  };
}

export function toGunnyLogEntry(row: GunnyLogRow): GunnyLogEntry {
  return {
    log_id: row.id,
    warehouse_id: row.warehouse_id,
    cam_id: row.cam_id,
    count: toCount(row.count),
    date: formatDate(row.date),
    chunk_id: row.chunk_id,
    created_at: formatTime(row.created_at),
    action: row.action,
  };
}

export function toVehicleLogEntry(row: VehicleLogRow): VehicleLogEntry {
  return {
    log_id: row.id,
    warehouse_id: row.warehouse_id,
    cam_id: row.cam_id,
    date: formatDate(row.date),
    chunk_id: row.chunk_id,
    number_plate: row.number_plate,
    vehicle_access: row.vehicle_access,
    created_at: formatTime(row.created_at),
  };
}

/**
 * Buckets employee logs by hour of day. Only non-empty hours are emitted,
 * in ascending order. Rows without a time land in no bucket, but
 * `total_logs` and `unique_employees` still cover every row.
 */
export function summarizeEmployeeLogs(rows: EmployeeLogRow[]): EmployeeLogSummary {
  const buckets = new Map<number, EmployeeLogEntry[]>();
  let withoutTime = 0;

  for (const row of rows) {
    const hour = hourOf(row.time);
    if (hour === null) {
      withoutTime++;
      continue;
    }
    const entry = toEmployeeLogEntry(row);
    const bucket = buckets.get(hour);
    if (bucket) {
      bucket.push(entry);
    } else {
      buckets.set(hour, [entry]);
    }
  }

  const hourly_ranges: HourlyRange[] = [...buckets.keys()]
    .sort((a, b) => a - b)
    .map((hour) => {
      const logs = buckets.get(hour) ?? [];
      return {
        hour_range: `${pad(hour)}:00 - ${pad(hour)}:59`,
        start_time: `${pad(hour)}:00`,
        end_time: `${pad(hour)}:59`,
        total_logs: logs.length,
        unique_employees: distinctCount(logs.map((log) => log.emp_id)),
        logs,
      };
    });

  return {
    total_logs: rows.length,
    unique_employees: distinctCount(rows.map((row) => row.emp_id)),
    logs_without_time: withoutTime,
    hourly_ranges,
  };
}

/** Summary key for gunny logs recorded without an action; no stored action is empty. */
export const UNSPECIFIED_ACTION = '';

/**
 * Totals gunny-bag logs. Actions keep their raw spelling and the order in
 * which they first appear, so the per-action totals add up to `total_bags`.
 */
export function summarizeGunnyLogs(rows: GunnyLogRow[]): GunnyLogSummary {
  const actions = new Map<string, ActionTotals>();
  const logs: GunnyLogEntry[] = [];
  let totalBags = 0;

  for (const row of rows) {
    const entry = toGunnyLogEntry(row);
    logs.push(entry);
    totalBags += entry.count;

    const action = entry.action ?? UNSPECIFIED_ACTION;
    const totals = actions.get(action) ?? { count: 0, total_bags: 0 };
    totals.count += 1;
    totals.total_bags += entry.count;
    actions.set(action, totals);
  }

  return {
    total_logs: logs.length,
    total_bags: totalBags,
    action_summary: Object.fromEntries(actions),
    logs,
  };
}

/** Counts vehicle logs per raw access flag and distinct non-null plates. */
export function summarizeVehicleLogs(rows: VehicleLogRow[]): VehicleLogSummary {
  const access = new Map<string, number>();
  const logs = rows.map(toVehicleLogEntry);

  for (const log of logs) {
    if (log.vehicle_access) {
      access.set(log.vehicle_access, (access.get(log.vehicle_access) ?? 0) + 1);
    }
  }

  return {
    total_logs: logs.length,
    unique_vehicles: distinctCount(logs.map((log) => log.number_plate)),
    access_summary: Object.fromEntries(access),
    logs,
  };
}
