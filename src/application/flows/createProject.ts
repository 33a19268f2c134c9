import { Project } from '../../domain/flows/resources.js';
import { ProjectRepository } from '../ports.js';

export interface CreateProjectCommand {
  identityId: number;
  name: string;
}

export class CreateProjectUseCase {
  constructor(private projectRepo: ProjectRepository) {}

  async execute(command: CreateProjectCommand): Promise<Project> {
    return this.projectRepo.create(command.identityId, command.name);
  }
}
