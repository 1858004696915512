import { formatDateTime, toNullableNumber } from '../../libs/common';
import type { Camera, CameraRow, Employee, EmployeeRow, Vehicle, VehicleRow, Warehouse, WarehouseRow } from './warehouses.types';

export function toWarehouse(row: WarehouseRow): Warehouse {
  return {
    warehouse_id: row.warehouse_id,
    warehouse_name: row.warehouse_name,
    warehouse_capacity: toNullableNumber(row.warehouse_capacity),
    warehouse_longitude: toNullableNumber(row.warehouse_longitude),
    warehouse_latitude: toNullableNumber(row.warehouse_latitude),
    warehouse_location: row.warehouse_location,
  };
}

export function toEmployee(row: EmployeeRow): Employee {
  return {
    emp_id: row.emp_id,
    warehouse_id: row.warehouse_id,
    emp_name: row.emp_name,
    emp_number: row.emp_number,
    role_id: row.role_id,
    emp_facecrop: row.emp_facecrop,
    role_name: row.role_name,
  };
}

export function toCamera(row: CameraRow): Camera {
  return {
    cam_id: row.cam_id,
    cam_direction: row.cam_direction,
    camera_status: row.camera_status,
    warehouse_id: row.warehouse_id,
    stream_arn: row.stream_arn,
    hls_url: row.hls_url,
    camera_longitude: toNullableNumber(row.camera_longitude),
    camera_latitude: toNullableNumber(row.camera_latitude),
    services: row.services ?? null,
  };
}

export function toVehicle(row: VehicleRow): Vehicle {
  return {
    id: row.id,
    warehouse_id: row.warehouse_id,
    number_plate: row.number_plate,
    bags_capacity: toNullableNumber(row.bags_capacity),
    vehicle_access: row.vehicle_access,
    driver_id: row.driver_id,
    created_at: formatDateTime(row.created_at),
    driver_name: row.driver_name,
    driver_phone: row.driver_phone,
    driver_crop: row.driver_crop,
  };
}
