import { Module } from '@nestjs/common';
import { LogStreamService } from './log-stream.service';
import { SSEController } from './sse.controller';

/** Live job output over SSE; RunsService publishes, clients subscribe per run. */
@Module({
  controllers: [SSEController],
  providers: [LogStreamService],
  exports: [LogStreamService],
})
export class StreamingModule {}
