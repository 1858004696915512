import { Controller, Get, Param } from '@nestjs/common';
import { WarehousesService } from './warehouses.service';

@Controller('warehouses')
export class WarehousesController {
  constructor(private readonly warehousesService: WarehousesService) {}

  @Get()
  async getAll() {
    return this.warehousesService.getAllWarehouses();
  }

  @Get(':warehouse_id')
  async getById(@Param('warehouse_id') warehouseId: string) {
    return this.warehousesService.getWarehouseById(warehouseId);
  }
}
