import { NotFoundOrForbiddenError } from '../errors.js';
import { FlowRepository, ProjectRepository } from '../ports.js';

export class DeleteResourcesUseCase {
  constructor(
    private projectRepo: ProjectRepository,
    private flowRepo: FlowRepository
  ) {}

  /** Removes the project with its flows and runs. */
  async deleteProject(projectId: number, identityId: number): Promise<void> {
    if (!(await this.projectRepo.deleteOwned(projectId, identityId))) {
      throw new NotFoundOrForbiddenError('Project');
    }
  }

  async deleteFlow(flowId: number, identityId: number): Promise<void> {
    if (!(await this.flowRepo.deleteOwned(flowId, identityId))) {
      throw new NotFoundOrForbiddenError('Flow');
    }
  }
}
