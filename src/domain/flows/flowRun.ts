import { InvalidTransitionError } from './errors.js';

export const RUN_STATUSES = ['pending', 'running', 'completed', 'failed', 'cancelled'] as const;

export type RunStatus = (typeof RUN_STATUSES)[number];

export type TerminalRunStatus = Extract<RunStatus, 'completed' | 'failed' | 'cancelled'>;

const TRANSITIONS: Readonly<Record<RunStatus, readonly RunStatus[]>> = {
  pending: ['running'],
  running: ['completed', 'failed', 'cancelled'],
  completed: [],
  failed: [],
  cancelled: [],
};

export function isTerminal(status: RunStatus): status is TerminalRunStatus {
  return TRANSITIONS[status].length === 0;
}

export function canTransition(from: RunStatus, to: RunStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

/**
 * Persisted flow run record.
 */
export interface FlowRun {
  readonly id: number;
  readonly flowId: number;
  readonly status: RunStatus;
  readonly createdAt: Date;
  readonly startedAt: Date | null;
  readonly completedAt: Date | null;
}

export type NewFlowRun = Omit<FlowRun, 'id'>;

/**
 * Run lifecycle aggregate. Wraps a run snapshot and applies status changes,
 * stamping startedAt on entering running and completedAt on entering a
 * terminal status.
 */
export class RunLifecycle {
  private constructor(private state: FlowRun) {}

  /**
   * A fresh run record for a flow. Nothing is executed; the run stays
   * pending until something moves it.
   */
  static pending(flowId: number, now: Date): NewFlowRun {
    return {
      flowId,
      status: 'pending',
      createdAt: now,
      startedAt: null,
      completedAt: null,
    };
  }

  static fromRecord(run: FlowRun): RunLifecycle {
    return new RunLifecycle(run);
  }

  getState(): FlowRun {
    return { ...this.state };
  }

  start(now: Date): FlowRun {
    return this.transitionTo('running', now);
  }

  complete(now: Date): FlowRun {
    return this.transitionTo('completed', now);
  }

  fail(now: Date): FlowRun {
    return this.transitionTo('failed', now);
  }

  cancel(now: Date): FlowRun {
    return this.transitionTo('cancelled', now);
  }

  transitionTo(to: RunStatus, now: Date): FlowRun {
    const from = this.state.status;
    if (!canTransition(from, to)) {
      throw new InvalidTransitionError(from, to);
    }

    this.state = {
      ...this.state,
      status: to,
      startedAt: to === 'running' ? now : this.state.startedAt,
      completedAt: isTerminal(to) ? now : this.state.completedAt,
    };

    return this.getState();
  }
}
