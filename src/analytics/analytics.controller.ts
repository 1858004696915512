import { Controller, Get, Param, Query } from '@nestjs/common';
import { ParseDatePipe } from '../../libs/common';
import { AnalyticsService } from './analytics.service';

@Controller('warehouses/:warehouse_id/cameras/:cam_id/analytics')
export class AnalyticsController {
  constructor(private readonly analyticsService: AnalyticsService) {}

  @Get('vehicle-gunny-count')
  async getVehicleGunnyCount(
    @Param('warehouse_id') warehouse_id: string,
    @Param('cam_id') cam_id: string,
    @Query('date', ParseDatePipe) date: string,
  ) {
    return this.analyticsService.getVehicleGunnyCount({ warehouse_id, cam_id, date });
  }
}
