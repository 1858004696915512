import { HttpException, Injectable, InternalServerErrorException, Logger } from '@nestjs/common';
import type { QueryResultRow } from 'pg';
import { DatabaseService, errorMessage } from '../../libs/common';
import { summarizeEmployeeLogs, summarizeGunnyLogs, summarizeVehicleLogs } from './log-aggregator';
import type {
  EmployeeLogRow,
  EmployeeLogSummary,
  GunnyLogRow,
  GunnyLogSummary,
  LogResponse,
  LogScope,
  VehicleLogRow,
  VehicleLogSummary,
} from './logs.types';

const EMPLOYEE_LOGS_QUERY = `
  SELECT
    el.id,
    el.warehouse_id,
    el.emp_id,
    e.emp_name,
    e.emp_number,
    r.role_name,
    el.date,
    el.time,
    el.cam_id,
    el.crop_blob_url,
    el.chunk_id,
    el.emp_access
  FROM public.wh_emp_logs el
  LEFT JOIN public.wh_emp_data e ON el.emp_id = e.emp_id
  LEFT JOIN public.wh_emp_role r ON e.role_id = r.role_id
  WHERE el.warehouse_id = $1 AND el.cam_id = $2 AND el.date = $3
  ORDER BY el.time`;

const GUNNY_LOGS_QUERY = `
  SELECT id, warehouse_id, cam_id, count, date, chunk_id, created_at, action
  FROM public.wh_gunny_logs
  WHERE warehouse_id = $1 AND cam_id = $2 AND date = $3
  ORDER BY created_at`;

const VEHICLE_LOGS_QUERY = `
  SELECT id, warehouse_id, cam_id, date, chunk_id, number_plate, vehicle_access, created_at
  FROM public.wh_vehicle_logs
  WHERE warehouse_id = $1 AND cam_id = $2 AND date = $3
  ORDER BY created_at`;

@Injectable()
export class LogsService {
  private readonly logger = new Logger(LogsService.name);

  constructor(private readonly database: DatabaseService) {}

  async getEmployeeLogs(scope: LogScope): Promise<LogResponse<EmployeeLogSummary>> {
    const rows = await this.fetch<EmployeeLogRow>('employee logs', EMPLOYEE_LOGS_QUERY, scope);
    return this.envelope(scope, summarizeEmployeeLogs(rows), 'No employee logs found for the given criteria');
  }

  async getGunnyBagLogs(scope: LogScope): Promise<LogResponse<GunnyLogSummary>> {
    const rows = await this.fetch<GunnyLogRow>('gunny bag logs', GUNNY_LOGS_QUERY, scope);
    return this.envelope(scope, summarizeGunnyLogs(rows), 'No gunny bag logs found for the given criteria');
  }

  async getVehicleLogs(scope: LogScope): Promise<LogResponse<VehicleLogSummary>> {
    const rows = await this.fetch<VehicleLogRow>('vehicle logs', VEHICLE_LOGS_QUERY, scope);
    return this.envelope(scope, summarizeVehicleLogs(rows), 'No vehicle logs found for the given criteria');
  }

  private async fetch<R extends QueryResultRow>(
    label: string,
    query: string,
    { warehouse_id, cam_id, date }: LogScope,
  ): Promise<R[]> {
    try {
      return await this.database.withConnection((session) =>
        session.rows<R>(query, [warehouse_id, cam_id, date]),
      );
    } catch (error) {
      if (error instanceof HttpException) throw error;
      this.logger.error(`Error fetching ${label}: ${errorMessage(error)}`);
      throw new InternalServerErrorException(`Database error: ${errorMessage(error)}`);
    }
  }

  private envelope<T extends { total_logs: number }>(
    scope: LogScope,
    summary: T,
    emptyMessage: string,
  ): LogResponse<T> {
    return {
      status: 'success',
      ...(summary.total_logs === 0 ? { message: emptyMessage } : {}),
      ...scope,
      ...summary,
    };
  }
}
