import { Controller, Get, Param, Query } from '@nestjs/common';
import { ParseDatePipe } from '../../libs/common';
import { ChunksService } from './chunks.service';

@Controller('warehouses/:warehouse_id/cameras/:cam_id/chunks')
export class ChunksController {
  constructor(private readonly chunksService: ChunksService) {}

  @Get()
  async getChunks(
    @Param('warehouse_id') warehouse_id: string,
    @Param('cam_id') cam_id: string,
    @Query('date', ParseDatePipe) date: string,
  ) {
    return this.chunksService.getChunks({ warehouse_id, cam_id, date });
  }
}
