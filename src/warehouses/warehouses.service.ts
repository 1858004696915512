import {
  HttpException,
  Injectable,
  InternalServerErrorException,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { DatabaseService, errorMessage } from '../../libs/common';
import { toCamera, toEmployee, toVehicle, toWarehouse } from './warehouse.mapper';
import type {
  CameraRow,
  Employee,
  EmployeeRow,
  VehicleRow,
  WarehouseDetailResponse,
  WarehouseListResponse,
  WarehouseRow,
} from './warehouses.types';

/** Roles shown in the warehouse list, in display rank order. */
export const ROSTER_ROLES = ['ROLE_SUP', 'ROLE_INC', 'ROLE_DEO'] as const;

const WAREHOUSE_COLUMNS = `
    warehouse_id,
    warehouse_name,
    warehouse_capacity,
    warehouse_longitude,
    warehouse_latitude,
    warehouse_location`;

const ALL_WAREHOUSES_QUERY = `
  SELECT ${WAREHOUSE_COLUMNS}
  FROM public.warehouse
  ORDER BY warehouse_id`;

const WAREHOUSE_BY_ID_QUERY = `
  SELECT ${WAREHOUSE_COLUMNS}
  FROM public.warehouse
  WHERE warehouse_id = $1`;

const ROSTER_QUERY = `
  SELECT
    e.emp_id,
    e.warehouse_id,
    e.emp_name,
    e.emp_number,
    e.role_id,
    e.emp_facecrop,
    r.role_name
  FROM public.wh_emp_data e
  LEFT JOIN public.wh_emp_role r ON e.role_id = r.role_id
  WHERE e.warehouse_id = ANY($1)
    AND e.role_id = ANY($2)
  ORDER BY
    e.warehouse_id,
    array_position($2::text[], e.role_id),
    e.emp_name`;

const CAMERAS_QUERY = `
  SELECT
    cam_id,
    cam_direction,
    camera_status,
    warehouse_id,
    stream_arn,
    hls_url,
    camera_longitude,
    camera_latitude,
    services
  FROM public.cameras
  WHERE warehouse_id = $1
  ORDER BY cam_id`;

const VEHICLES_QUERY = `
  SELECT
    v.id,
    v.warehouse_id,
    v.number_plate,
    v.bags_capacity,
    v.vehicle_access,
    v.driver_id,
    v.created_at,
    d.driver_name,
    d.driver_phone,
    d.driver_crop
  FROM public.wh_vehicles v
  LEFT JOIN public.wh_drivers d ON v.driver_id = d.driver_id
  WHERE v.warehouse_id = $1
  ORDER BY v.id`;

const EMPLOYEES_QUERY = `
  SELECT
    e.emp_id,
    e.warehouse_id,
    e.emp_name,
    e.emp_number,
    e.role_id,
    e.emp_facecrop,
    r.role_name
  FROM public.wh_emp_data e
  LEFT JOIN public.wh_emp_role r ON e.role_id = r.role_id
  WHERE e.warehouse_id = $1
  ORDER BY e.role_id, e.emp_name`;

@Injectable()
export class WarehousesService {
  private readonly logger = new Logger(WarehousesService.name);

  constructor(private readonly database: DatabaseService) {}

  /**
   * All warehouses, each with its supervisor / in-charge / data-entry roster.
   */
  async getAllWarehouses(): Promise<WarehouseListResponse> {
    try {
      return await this.database.withConnection<WarehouseListResponse>(async (session) => {
        const warehouseRows = await session.rows<WarehouseRow>(ALL_WAREHOUSES_QUERY);
        if (warehouseRows.length === 0) {
          return { status: 'success', total_warehouses: 0, warehouses: [] };
        }

        const ids = warehouseRows.map((row) => row.warehouse_id);
        const rosterRows = await session.rows<EmployeeRow>(ROSTER_QUERY, [ids, [...ROSTER_ROLES]]);

        const rosters = new Map<string, Employee[]>();
        for (const row of rosterRows) {
          const roster = rosters.get(row.warehouse_id) ?? [];
          roster.push(toEmployee(row));
          rosters.set(row.warehouse_id, roster);
        }

        const warehouses = warehouseRows.map((row) => {
          const employees = rosters.get(row.warehouse_id) ?? [];
          return { ...toWarehouse(row), employees, total_employees: employees.length };
        });

        return { status: 'success', total_warehouses: warehouses.length, warehouses };
      });
    } catch (error) {
      this.rethrow('Error fetching all warehouses', error);
    }
  }

  async getWarehouseById(warehouseId: string): Promise<WarehouseDetailResponse> {
    try {
      return await this.database.withConnection<WarehouseDetailResponse>(async (session) => {
        const [warehouseRow] = await session.rows<WarehouseRow>(WAREHOUSE_BY_ID_QUERY, [warehouseId]);
        if (!warehouseRow) {
          throw new NotFoundException(`Warehouse not found: ${warehouseId}`);
        }

        const cameras = (await session.rows<CameraRow>(CAMERAS_QUERY, [warehouseId])).map(toCamera);
        const vehicles = (await session.rows<VehicleRow>(VEHICLES_QUERY, [warehouseId])).map(toVehicle);
        const employees = (await session.rows<EmployeeRow>(EMPLOYEES_QUERY, [warehouseId])).map(toEmployee);

        return {
          status: 'success',
          warehouse: toWarehouse(warehouseRow),
          cameras: { total_cameras: cameras.length, data: cameras },
          vehicles: { total_vehicles: vehicles.length, data: vehicles },
          employees: { total_employees: employees.length, data: employees },
        };
      });
    } catch (error) {
      this.rethrow('Error fetching warehouse by ID', error);
    }
  }

  private rethrow(context: string, error: unknown): never {
    if (error instanceof HttpException) throw error;
    this.logger.error(`${context}: ${errorMessage(error)}`);
    throw new InternalServerErrorException(`Database error: ${errorMessage(error)}`);
  }
}
