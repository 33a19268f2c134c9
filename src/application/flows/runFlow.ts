import { FlowRun, RunLifecycle } from '../../domain/flows/flowRun.js';
import { NotFoundOrForbiddenError } from '../errors.js';
import { Clock, FlowRepository, RunRepository, systemClock } from '../ports.js';

export interface RunFlowCommand {
  identityId: number;
  flowId: number;
}

/**
 * Record a new run for a flow. Only the record is created; nothing executes it.
 */
export class RunFlowUseCase {
  constructor(
    private flowRepo: FlowRepository,
    private runRepo: RunRepository,
    private clock: Clock = systemClock
  ) {}

  async execute(command: RunFlowCommand): Promise<FlowRun> {
    const flow = await this.flowRepo.findOwned(command.flowId, command.identityId);
    if (!flow) {
      throw new NotFoundOrForbiddenError('Flow');
    }

    return this.runRepo.create(RunLifecycle.pending(flow.id, this.clock()));
  }
}
