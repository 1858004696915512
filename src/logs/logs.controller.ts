import { Controller, Get, Param, Query } from '@nestjs/common';
import { ParseDatePipe } from '../../libs/common';
import { LogsService } from './logs.service';

@Controller('warehouses/:warehouse_id/cameras/:cam_id/logs')
export class LogsController {
  constructor(private readonly logsService: LogsService) {}

  @Get('employees')
  async getEmployeeLogs(
    @Param('warehouse_id') warehouse_id: string,
    @Param('cam_id') cam_id: string,
    @Query('date', ParseDatePipe) date: string,
  ) {
    return this.logsService.getEmployeeLogs({ warehouse_id, cam_id, date });
  }

  @Get('gunny-bags')
  async getGunnyBagLogs(
    @Param('warehouse_id') warehouse_id: string,
    @Param('cam_id') cam_id: string,
    @Query('date', ParseDatePipe) date: string,
  ) {
    return this.logsService.getGunnyBagLogs({ warehouse_id, cam_id, date });
  }

  @Get('vehicles')
  async getVehicleLogs(
    @Param('warehouse_id') warehouse_id: string,
    @Param('cam_id') cam_id: string,
    @Query('date', ParseDatePipe) date: string,
  ) {
    return this.logsService.getVehicleLogs({ warehouse_id, cam_id, date });
  }
}
