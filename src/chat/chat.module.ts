import { Module } from '@nestjs/common';
import { InferenceModule, StorageModule } from '../../libs/common';
import { ChatController } from './chat.controller';
import { ChatService } from './chat.service';

@Module({
  imports: [StorageModule, InferenceModule],
  controllers: [ChatController],
  providers: [ChatService],
})
export class ChatModule {}
