import { HttpException, Injectable, InternalServerErrorException, Logger } from '@nestjs/common';
import { DatabaseService, errorMessage, toCount } from '../../libs/common';
import type { SqlNumeric } from '../../libs/common';

const BAGS_QUERY = `
  SELECT
    COALESCE(SUM(CASE WHEN LOWER(action) = 'loading' THEN count ELSE 0 END), 0) AS loaded_bags,
    COALESCE(SUM(CASE WHEN LOWER(action) = 'unloading' THEN count ELSE 0 END), 0) AS unloaded_bags
  FROM public.wh_gunny_logs
  WHERE warehouse_id = $1 AND date = $2`;

const VEHICLES_QUERY = `
  SELECT
    COUNT(DISTINCT CASE
      WHEN LOWER(vehicle_access) IN ('authorized', 'authorised') THEN number_plate
    END) AS authorised_vehicles,
    COUNT(DISTINCT CASE
      WHEN LOWER(vehicle_access) IN ('unauthorized', 'unauthorised') THEN number_plate
    END) AS unauthorised_vehicles
  FROM public.wh_vehicle_logs
  WHERE warehouse_id = $1 AND date = $2`;

const EMPLOYEES_QUERY = `
  SELECT
    COUNT(*) AS total_employee_logs,
    COUNT(DISTINCT emp_id) FILTER (WHERE emp_id IS NOT NULL) AS unique_authorised_employees,
    COUNT(*) FILTER (WHERE emp_id IS NULL) AS unauthorised_entries
  FROM public.wh_emp_logs
  WHERE warehouse_id = $1 AND date = $2`;

type BagsRow = { loaded_bags: SqlNumeric; unloaded_bags: SqlNumeric };
type VehiclesRow = { authorised_vehicles: SqlNumeric; unauthorised_vehicles: SqlNumeric };
type EmployeesRow = {
  total_employee_logs: SqlNumeric;
  unique_authorised_employees: SqlNumeric;
  unauthorised_entries: SqlNumeric;
};

export type DashboardResponse = {
  status: 'success';
  warehouse_id: string;
  date: string;
  total_loaded_bags: number;
  total_unloaded_bags: number;
  total_authorised_vehicles: number;
  total_unauthorised_vehicles: number;
  total_employee_logs: number;
  total_unique_authorised_employees: number;
  total_unauthorised_entries: number;
};

@Injectable()
export class DashboardService {
  private readonly logger = new Logger(DashboardService.name);

  constructor(private readonly database: DatabaseService) {}

  /**
   * Day totals for a warehouse across all of its cameras.
   */
  async getDashboard(warehouse_id: string, date: string): Promise<DashboardResponse> {
    try {
      const [bags, vehicles, employees] = await this.database.withConnection(async (session) => {
        const params = [warehouse_id, date];
        const bagRows = await session.rows<BagsRow>(BAGS_QUERY, params);
        const vehicleRows = await session.rows<VehiclesRow>(VEHICLES_QUERY, params);
        const employeeRows = await session.rows<EmployeesRow>(EMPLOYEES_QUERY, params);
        return [bagRows[0], vehicleRows[0], employeeRows[0]] as const;
      });

      return {
        status: 'success',
        warehouse_id,
        date,
        total_loaded_bags: toCount(bags?.loaded_bags),
        total_unloaded_bags: toCount(bags?.unloaded_bags),
        total_authorised_vehicles: toCount(vehicles?.authorised_vehicles),
        total_unauthorised_vehicles: toCount(vehicles?.unauthorised_vehicles),
        total_employee_logs: toCount(employees?.total_employee_logs),
        total_unique_authorised_employees: toCount(employees?.unique_authorised_employees),
        total_unauthorised_entries: toCount(employees?.unauthorised_entries),
      };
    } catch (error) {
      if (error instanceof HttpException) throw error;
      this.logger.error(`Error fetching dashboard data: ${errorMessage(error)}`);
      throw new InternalServerErrorException(`Database error: ${errorMessage(error)}`);
    }
  }
}
