import { Module } from '@nestjs/common';
import { StreamSignerService } from './stream-signer.service';

@Module({
  providers: [StreamSignerService],
  exports: [StreamSignerService],
})
export class StreamingModule {}
