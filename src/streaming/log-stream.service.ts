import { Injectable, OnModuleDestroy } from '@nestjs/common';
import { Observable, Subject } from 'rxjs';
import { filter } from 'rxjs/operators';
import type { LogLine } from '../engine/run-result';

export interface LogStreamEvent extends LogLine {
  runId: string;
}

/**
 * Real-time log streaming: runs publish every line their jobs write; SSE clients and
 * the CLI subscribe. Lines are persisted separately when a job finishes
 * (see RunsService), so a late subscriber reads history from /runs instead.
 */
@Injectable()
export class LogStreamService implements OnModuleDestroy {
  private readonly logSubject = new Subject<LogStreamEvent>();

  publish(runId: string, line: LogLine): void {
    this.logSubject.next({ runId, ...line });
  }

  getLogStream(): Observable<LogStreamEvent> {
    return this.logSubject.asObservable();
  }

  getLogStreamForRun(runId: string): Observable<LogStreamEvent> {
    return this.logSubject.pipe(filter((ev) => ev.runId === runId));
  }

  onModuleDestroy(): void {
    this.logSubject.complete();
  }
}
