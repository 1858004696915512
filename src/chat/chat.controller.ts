import { Body, Controller, HttpCode, HttpStatus, Param, Post, Res } from '@nestjs/common';
import type { Response } from 'express';
import { disconnectSignal } from '../../libs/common';
import { ChatService } from './chat.service';
import { ChatRequestDto } from './dto/chat-request.dto';

@Controller('warehouses/:warehouse_id/cameras/:cam_id/chunks')
export class ChatController {
  constructor(private readonly chatService: ChatService) {}

  @Post(':chunk_id/chat')
  @HttpCode(HttpStatus.OK)
  async chat(
    @Param('warehouse_id') warehouseId: string,
    @Param('cam_id') camId: string,
    @Param('chunk_id') chunkId: string,
    @Body() request: ChatRequestDto,
    @Res({ passthrough: true }) response: Response,
  ) {
    return this.chatService.chat({ warehouseId, camId, chunkId }, request, disconnectSignal(response));
  }
}
