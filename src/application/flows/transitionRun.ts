import { FlowRun, RunLifecycle, RunStatus } from '../../domain/flows/flowRun.js';
import { InvalidTransitionError } from '../../domain/flows/errors.js';
import { NotFoundOrForbiddenError } from '../errors.js';
import { Clock, RunRepository, systemClock } from '../ports.js';

export interface TransitionRunCommand {
  identityId: number;
  runId: number;
  to: RunStatus;
}

/**
 * Move a run to a new status. No route calls this yet: it is the entry point
 * an executor would use.
 */
export class TransitionRunUseCase {
  constructor(
    private runRepo: RunRepository,
    private clock: Clock = systemClock
  ) {}

  async execute(command: TransitionRunCommand): Promise<FlowRun> {
    const run = await this.runRepo.findOwned(command.runId, command.identityId);
    if (!run) {
      throw new NotFoundOrForbiddenError('Run');
    }

    const next = RunLifecycle.fromRecord(run).transitionTo(command.to, this.clock());

    const saved = await this.runRepo.saveTransition(next, run.status);
    if (!saved) {
      // Status changed underneath us; the transition we validated no longer applies
      throw new InvalidTransitionError(run.status, command.to);
    }

    return next;
  }
}
