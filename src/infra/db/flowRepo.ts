import pg from 'pg';
import { Flow } from '../../domain/flows/resources.js';
import { FlowRepository } from '../../application/ports.js';
import { isForeignKeyViolation, withStore } from './storeErrors.js';

interface FlowRow {
  id: number;
  project_id: number;
  name: string;
  description: string | null;
  created_at: Date;
  updated_at: Date;
}

function toFlow(row: FlowRow): Flow {
  return {
    id: row.id,
    projectId: row.project_id,
    name: row.name,
    description: row.description,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export class FlowRepo implements FlowRepository {
  constructor(private pool: pg.Pool) {}

  async createInOwnedProject(
    ownerId: number,
    input: { projectId: number; name: string; description: string | null }
  ): Promise<Flow | null> {
    try {
      const result = await withStore(() =>
        this.pool.query<FlowRow>(
          `INSERT INTO flows (project_id, name, description)
           SELECT p.id, $3, $4 FROM projects p
           WHERE p.id = $1 AND p.owner_id = $2
           RETURNING id, project_id, name, description, created_at, updated_at`,
          [input.projectId, ownerId, input.name, input.description]
        )
      );
      return result.rows.length > 0 ? toFlow(result.rows[0]) : null;
    } catch (error) {
      // Project deleted between the ownership check and the insert
      if (isForeignKeyViolation(error)) {
        return null;
      }
      throw error;
    }
  }

  async listByProject(projectId: number, ownerId: number): Promise<Flow[]> {
    const result = await withStore(() =>
      this.pool.query<FlowRow>(
        `SELECT f.id, f.project_id, f.name, f.description, f.created_at, f.updated_at
         FROM flows f
         JOIN projects p ON p.id = f.project_id
         WHERE f.project_id = $1 AND p.owner_id = $2
         ORDER BY f.created_at DESC, f.id DESC`,
        [projectId, ownerId]
      )
    );
    return result.rows.map(toFlow);
  }

  async findOwned(id: number, ownerId: number): Promise<Flow | null> {
    const result = await withStore(() =>
      this.pool.query<FlowRow>(
        `SELECT f.id, f.project_id, f.name, f.description, f.created_at, f.updated_at
         FROM flows f
         JOIN projects p ON p.id = f.project_id
         WHERE f.id = $1 AND p.owner_id = $2`,
        [id, ownerId]
      )
    );
    return result.rows.length > 0 ? toFlow(result.rows[0]) : null;
  }

  async deleteOwned(id: number, ownerId: number): Promise<boolean> {
    const result = await withStore(() =>
      this.pool.query(
        `DELETE FROM flows f
         USING projects p
         WHERE f.id = $1 AND p.id = f.project_id AND p.owner_id = $2`,
        [id, ownerId]
      )
    );
    return (result.rowCount ?? 0) > 0;
  }
}
