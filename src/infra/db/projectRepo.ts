import pg from 'pg';
import { Project } from '../../domain/flows/resources.js';
import { ProjectRepository } from '../../application/ports.js';
import { NotFoundOrForbiddenError } from '../../application/errors.js';
import { isForeignKeyViolation, withStore } from './storeErrors.js';

interface ProjectRow {
  id: number;
  owner_id: number;
  name: string;
  created_at: Date;
  updated_at: Date;
}

const PROJECT_COLUMNS = 'id, owner_id, name, created_at, updated_at';

function toProject(row: ProjectRow): Project {
  return {
    id: row.id,
    ownerId: row.owner_id,
    name: row.name,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export class ProjectRepo implements ProjectRepository {
  constructor(private pool: pg.Pool) {}

  async create(ownerId: number, name: string): Promise<Project> {
    try {
      const result = await withStore(() =>
        this.pool.query<ProjectRow>(
          `INSERT INTO projects (owner_id, name) VALUES ($1, $2) RETURNING ${PROJECT_COLUMNS}`,
          [ownerId, name]
        )
      );
      return toProject(result.rows[0]);
    } catch (error) {
      // Owner deleted mid-request
      if (isForeignKeyViolation(error)) {
        throw new NotFoundOrForbiddenError('Identity');
      }
      throw error;
    }
  }

  async listByOwner(ownerId: number): Promise<Project[]> {
    const result = await withStore(() =>
      this.pool.query<ProjectRow>(
        `SELECT ${PROJECT_COLUMNS} FROM projects
         WHERE owner_id = $1
         ORDER BY created_at DESC, id DESC`,
        [ownerId]
      )
    );
    return result.rows.map(toProject);
  }

  async findOwned(id: number, ownerId: number): Promise<Project | null> {
    const result = await withStore(() =>
      this.pool.query<ProjectRow>(
        `SELECT ${PROJECT_COLUMNS} FROM projects WHERE id = $1 AND owner_id = $2`,
        [id, ownerId]
      )
    );
    return result.rows.length > 0 ? toProject(result.rows[0]) : null;
  }

  async deleteOwned(id: number, ownerId: number): Promise<boolean> {
    const result = await withStore(() =>
      this.pool.query('DELETE FROM projects WHERE id = $1 AND owner_id = $2', [id, ownerId])
    );
    return (result.rowCount ?? 0) > 0;
  }
}
