import { Flow, Project } from '../../domain/flows/resources.js';
import { FlowRun } from '../../domain/flows/flowRun.js';
import { NotFoundOrForbiddenError } from '../errors.js';
import { FlowRepository, ProjectRepository, RunRepository } from '../ports.js';

export class ResourceQueries {
  constructor(
    private projectRepo: ProjectRepository,
    private flowRepo: FlowRepository,
    private runRepo: RunRepository
  ) {}

  async listProjects(identityId: number): Promise<Project[]> {
    return this.projectRepo.listByOwner(identityId);
  }

  async getProject(projectId: number, identityId: number): Promise<Project> {
    const project = await this.projectRepo.findOwned(projectId, identityId);
    if (!project) {
      throw new NotFoundOrForbiddenError('Project');
    }
    return project;
  }

  async listFlows(projectId: number, identityId: number): Promise<Flow[]> {
    // Missing and foreign projects both 404 instead of listing nothing
    await this.getProject(projectId, identityId);
    return this.flowRepo.listByProject(projectId, identityId);
  }

  async getFlow(flowId: number, identityId: number): Promise<Flow> {
    const flow = await this.flowRepo.findOwned(flowId, identityId);
    if (!flow) {
      throw new NotFoundOrForbiddenError('Flow');
    }
    return flow;
  }

  async listRuns(flowId: number, identityId: number): Promise<FlowRun[]> {
    await this.getFlow(flowId, identityId);
    return this.runRepo.listByFlow(flowId, identityId);
  }

  async getRun(runId: number, identityId: number): Promise<FlowRun> {
    const run = await this.runRepo.findOwned(runId, identityId);
    if (!run) {
      throw new NotFoundOrForbiddenError('Run');
    }
    return run;
  }
}
