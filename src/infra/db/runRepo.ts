import pg from 'pg';
import { FlowRun, NewFlowRun, RunStatus } from '../../domain/flows/flowRun.js';
import { RunRepository } from '../../application/ports.js';
import { NotFoundOrForbiddenError } from '../../application/errors.js';
import { isForeignKeyViolation, withStore } from './storeErrors.js';

interface RunRow {
  id: number;
  flow_id: number;
  status: RunStatus;
  created_at: Date;
  started_at: Date | null;
  completed_at: Date | null;
}

const OWNED_RUN_SELECT = `
  SELECT r.id, r.flow_id, r.status, r.created_at, r.started_at, r.completed_at
  FROM flow_runs r
  JOIN flows f ON f.id = r.flow_id
  JOIN projects p ON p.id = f.project_id`;

function toRun(row: RunRow): FlowRun {
  return {
    id: row.id,
    flowId: row.flow_id,
    status: row.status,
    createdAt: row.created_at,
    startedAt: row.started_at,
    completedAt: row.completed_at,
  };
}

export class RunRepo implements RunRepository {
  constructor(private pool: pg.Pool) {}

  async create(run: NewFlowRun): Promise<FlowRun> {
    try {
      const result = await withStore(() =>
        this.pool.query<RunRow>(
          `INSERT INTO flow_runs (flow_id, status, created_at, started_at, completed_at)
           VALUES ($1, $2, $3, $4, $5)
           RETURNING id, flow_id, status, created_at, started_at, completed_at`,
          [run.flowId, run.status, run.createdAt, run.startedAt, run.completedAt]
        )
      );
      return toRun(result.rows[0]);
    } catch (error) {
      // Flow deleted after the ownership check
      if (isForeignKeyViolation(error)) {
        throw new NotFoundOrForbiddenError('Flow');
      }
      throw error;
    }
  }

  async listByFlow(flowId: number, ownerId: number): Promise<FlowRun[]> {
    const result = await withStore(() =>
      this.pool.query<RunRow>(
        `${OWNED_RUN_SELECT}
         WHERE r.flow_id = $1 AND p.owner_id = $2
         ORDER BY r.created_at DESC, r.id DESC`,
        [flowId, ownerId]
      )
    );
    return result.rows.map(toRun);
  }

  async findOwned(id: number, ownerId: number): Promise<FlowRun | null> {
    const result = await withStore(() =>
      this.pool.query<RunRow>(`${OWNED_RUN_SELECT} WHERE r.id = $1 AND p.owner_id = $2`, [
        id,
        ownerId,
      ])
    );
    return result.rows.length > 0 ? toRun(result.rows[0]) : null;
  }

  async saveTransition(run: FlowRun, expectedStatus: RunStatus): Promise<boolean> {
    const result = await withStore(() =>
      this.pool.query(
        `UPDATE flow_runs
         SET status = $2, started_at = $3, completed_at = $4
         WHERE id = $1 AND status = $5`,
        [run.id, run.status, run.startedAt, run.completedAt, expectedStatus]
      )
    );
    return (result.rowCount ?? 0) > 0;
  }
}
