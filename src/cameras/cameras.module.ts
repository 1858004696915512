import { Module } from '@nestjs/common';
import { StreamingModule } from '../../libs/common';
import { CamerasController } from './cameras.controller';
import { CamerasService } from './cameras.service';

@Module({
  imports: [StreamingModule],
  controllers: [CamerasController],
  providers: [CamerasService],
})
export class CamerasModule {}
