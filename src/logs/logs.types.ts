import type { SqlNumeric, SqlTemporal } from '../../libs/common';

export type Identifier = string | number;

export type EmployeeLogRow = {
  id: Identifier;
  warehouse_id: string;
  emp_id: Identifier | null;
  emp_name: string | null;
  emp_number: string | null;
  role_name: string | null;
  date: SqlTemporal;
  time: SqlTemporal;
  cam_id: string;
  crop_blob_url: string | null;
  chunk_id: string | null;
  emp_access: string | null;
};

export type GunnyLogRow = {
  id: Identifier;
  warehouse_id: string;
  cam_id: string;
  count: SqlNumeric;
  date: SqlTemporal;
  chunk_id: string | null;
  created_at: SqlTemporal;
  action: string | null;
};

export type VehicleLogRow = {
  id: Identifier;
  warehouse_id: string;
  cam_id: string;
  date: SqlTemporal;
  chunk_id: string | null;
  number_plate: string | null;
  vehicle_access: string | null;
  created_at: SqlTemporal;
};

export type EmployeeLogEntry = {
  log_id: Identifier;
  warehouse_id: string;
  emp_id: Identifier | null;
  emp_name: string | null;
  emp_number: string | null;
  role_name: string | null;
  date: string | null;
  time: string | null;
  cam_id: string;
  crop_blob_url: string | null;
  chunk_id: string | null;
  emp_access: string | null;
};

export type GunnyLogEntry = {
  log_id: Identifier;
  warehouse_id: string;
  cam_id: string;
  count: number;
  date: string | null;
  chunk_id: string | null;
  created_at: string | null;
  action: string | null;
};

export type VehicleLogEntry = {
  log_id: Identifier;
  warehouse_id: string;
  cam_id: string;
  date: string | null;
  chunk_id: string | null;
  number_plate: string | null;
  vehicle_access: string | null;
  created_at: string | null;
};

export type HourlyRange = {
  hour_range: string;
  start_time: string;
  end_time: string;
  total_logs: number;
  unique_employees: number;
  logs: EmployeeLogEntry[];
};

export type EmployeeLogSummary = {
  total_logs: number;
  unique_employees: number;
  /** Rows without a time; counted in total_logs but in no hourly range. */
  logs_without_time: number;
  hourly_ranges: HourlyRange[];
};

export type ActionTotals = {
  count: number;
  total_bags: number;
};

export type GunnyLogSummary = {
  total_logs: number;
  total_bags: number;
  action_summary: Record<string, ActionTotals>;
  logs: GunnyLogEntry[];
};

export type VehicleLogSummary = {
  total_logs: number;
  unique_vehicles: number;
  access_summary: Record<string, number>;
  logs: VehicleLogEntry[];
};

export type LogScope = {
  warehouse_id: string;
  cam_id: string;
  date: string;
};

export type LogResponse<T> = { status: 'success'; message?: string } & LogScope & T;
