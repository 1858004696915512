import { Controller, Get, Param, Query } from '@nestjs/common';
import { ParseDatePipe } from '../../libs/common';
import { DashboardService } from './dashboard.service';

@Controller('warehouses/:warehouse_id/dashboard')
export class DashboardController {
  constructor(private readonly dashboardService: DashboardService) {}

  @Get()
  async getDashboard(
    @Param('warehouse_id') warehouse_id: string,
    @Query('date', ParseDatePipe) date: string,
  ) {
    return this.dashboardService.getDashboard(warehouse_id, date);
  }
}
