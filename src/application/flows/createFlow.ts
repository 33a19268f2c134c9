import { Flow } from '../../domain/flows/resources.js';
import { NotFoundOrForbiddenError } from '../errors.js';
import { FlowRepository } from '../ports.js';

export interface CreateFlowCommand {
  identityId: number;
  projectId: number;
  name: string;
  description?: string | null;
}

export class CreateFlowUseCase {
  constructor(private flowRepo: FlowRepository) {}

  async execute(command: CreateFlowCommand): Promise<Flow> {
    // Ownership check and insert happen in one statement
    const flow = await this.flowRepo.createInOwnedProject(command.identityId, {
      projectId: command.projectId,
      name: command.name,
      description: command.description ?? null,
    });

    if (!flow) {
      throw new NotFoundOrForbiddenError('Project');
    }

    return flow;
  }
}
