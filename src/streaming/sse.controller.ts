import { Controller, Param, Sse } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { Observable } from 'rxjs';
import { map } from 'rxjs/operators';
import { LogStreamEvent, LogStreamService } from './log-stream.service';

@Controller('stream')
@ApiTags('stream')
export class SSEController {
  constructor(private readonly logStream: LogStreamService) {}

  /**
   * SSE endpoint for real-time logs of one pipeline run.
   * GET /stream/logs/:runId - clients receive log lines of every job in the run as they are written.
   */
  @Sse('logs/:runId')
  @ApiOperation({ summary: 'SSE: real-time logs for a run' })
  streamRunLogs(@Param('runId') runId: string): Observable<{ data: LogStreamEvent }> {
    return this.logStream.getLogStreamForRun(runId).pipe(map((ev) => ({ data: ev })));
  }

  /**
   * SSE endpoint for all log events (all runs).
   */
  @Sse('logs')
  @ApiOperation({ summary: 'SSE: real-time logs for all runs' })
  streamAllLogs(): Observable<{ data: LogStreamEvent }> {
    return this.logStream.getLogStream().pipe(map((ev) => ({ data: ev })));
  }
}
