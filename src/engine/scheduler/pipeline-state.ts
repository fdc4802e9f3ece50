import { Logger } from '@nestjs/common';
import type { PipelineStatus } from '../run-result';

const TRANSITIONS: Record<PipelineStatus, readonly PipelineStatus[]> = {
  pending: ['running'],
  running: ['succeeded', 'failed'],
  succeeded: [],
  failed: [],
};

export function isValidTransition(from: PipelineStatus, to: PipelineStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export function isTerminal(status: PipelineStatus): boolean {
  return TRANSITIONS[status].length === 0;
}

/**
 * pending -> running -> succeeded | failed, nothing else. Invalid transitions are
 * rejected (and logged), not silently applied.
 */
export class PipelineRunState {
  private readonly logger = new Logger(PipelineRunState.name);
  private current: PipelineStatus = 'pending';

  constructor(
    private readonly runLabel: string,
    private readonly onChange?: (from: PipelineStatus, to: PipelineStatus) => void,
  ) {}

  get status(): PipelineStatus {
    return this.current;
  }

  transition(to: PipelineStatus): boolean {
    const from = this.current;
    if (!isValidTransition(from, to)) {
      this.logger.warn(`Invalid transition rejected: ${this.runLabel} ${from} -> ${to}`);
      return false;
    }
    this.current = to;
    this.logger.debug(`Pipeline transition: ${this.runLabel} ${from} -> ${to}`);
    this.onChange?.(from, to);
    return true;
  }
}
