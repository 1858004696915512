import { Controller, Get, Query, Res } from '@nestjs/common';
import type { Response } from 'express';
import { disconnectSignal, RequiredParamPipe } from '../../libs/common';
import { CamerasService } from './cameras.service';

@Controller('cameras')
export class CamerasController {
  constructor(private readonly camerasService: CamerasService) {}

  @Get('stream-url')
  async getStreamUrl(
    @Query('warehouse_id', RequiredParamPipe) warehouseId: string,
    @Query('cam_id', RequiredParamPipe) camId: string,
    @Res({ passthrough: true }) response: Response,
  ) {
    return this.camerasService.getStreamUrl(warehouseId, camId, disconnectSignal(response));
  }
}
