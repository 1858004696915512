import type { SqlNumeric, SqlTemporal } from '../../libs/common';

export type WarehouseRow = {
  warehouse_id: string;
  warehouse_name: string | null;
  warehouse_capacity: SqlNumeric;
  warehouse_longitude: SqlNumeric;
  warehouse_latitude: SqlNumeric;
  warehouse_location: string | null;
};

export type EmployeeRow = {
  emp_id: string;
  warehouse_id: string;
  emp_name: string | null;
  emp_number: string | null;
  role_id: string | null;
  emp_facecrop: string | null;
  role_name: string | null;
};

export type CameraRow = {
  cam_id: string;
  cam_direction: string | null;
  camera_status: string | null;
  warehouse_id: string;
  stream_arn: string | null;
  hls_url: string | null;
  camera_longitude: SqlNumeric;
  camera_latitude: SqlNumeric;
  services: unknown;
};

export type VehicleRow = {
  id: string | number;
  warehouse_id: string;
  number_plate: string | null;
  bags_capacity: SqlNumeric;
  vehicle_access: string | null;
  driver_id: string | null;
  created_at: SqlTemporal;
  driver_name: string | null;
  driver_phone: string | null;
  driver_crop: string | null;
};

export type Warehouse = {
  warehouse_id: string;
  warehouse_name: string | null;
  warehouse_capacity: number | null;
  warehouse_longitude: number | null;
  warehouse_latitude: number | null;
  warehouse_location: string | null;
};

export type Employee = EmployeeRow;

export type Camera = {
  cam_id: string;
  cam_direction: string | null;
  camera_status: string | null;
  warehouse_id: string;
  stream_arn: string | null;
  hls_url: string | null;
  camera_longitude: number | null;
  camera_latitude: number | null;
  services: unknown;
};

export type Vehicle = {
  id: string | number;
  warehouse_id: string;
  number_plate: string | null;
  bags_capacity: number | null;
  vehicle_access: string | null;
  driver_id: string | null;
  created_at: string | null;
  driver_name: string | null;
  driver_phone: string | null;
  driver_crop: string | null;
};

export type WarehouseWithStaff = Warehouse & {
  employees: Employee[];
  total_employees: number;
};

export type WarehouseListResponse = {
  status: 'success';
  total_warehouses: number;
  warehouses: WarehouseWithStaff[];
};

export type WarehouseDetailResponse = {
  status: 'success';
  warehouse: Warehouse;
  cameras: { total_cameras: number; data: Camera[] };
  vehicles: { total_vehicles: number; data: Vehicle[] };
  employees: { total_employees: number; data: Employee[] };
};
