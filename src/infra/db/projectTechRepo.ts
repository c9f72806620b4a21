import type { ProjectTechRepository } from '../../domain/portfolio/ports.js';
import { withTransaction, type Db } from './pool.js';

export class ProjectTechRepo implements ProjectTechRepository {
  constructor(private readonly db: Db) {}

  /** Links to soft-deleted technologies are left out. */
  async findTechnologyIds(projectId: number): Promise<number[]> {
    const result = await this.db.query<{ tech_id: number }>(
      `SELECT pt.tech_id FROM project_technologies pt
       JOIN technologies t ON t.id = pt.tech_id
       WHERE pt.project_id = $1 AND pt.is_active AND t.is_active
       ORDER BY pt.tech_id ASC`,
      [projectId]
    );
    return result.rows.map((row) => row.tech_id);
  }

  /**
   * A previously unlinked pair is revived in place with fresh audit stamps,
   * since the pair is the primary key.
   */
  async replaceForProject(
    projectId: number,
    techIds: readonly number[],
    actorId: number
  ): Promise<void> {
    await withTransaction(this.db, async (client) => {
      await client.query(
        `UPDATE project_technologies
         SET is_active = FALSE, updated_at = NOW(), updated_by = $2
         WHERE project_id = $1 AND is_active`,
        [projectId, actorId]
      );

      if (techIds.length === 0) {
        return;
      }
      await client.query(
        `INSERT INTO project_technologies (project_id, tech_id, created_by)
         SELECT $1, tech_id, $3 FROM unnest($2::int[]) AS tech_id
         ON CONFLICT (project_id, tech_id) DO UPDATE
         SET is_active = TRUE, created_at = NOW(), created_by = EXCLUDED.created_by,
             updated_at = NULL, updated_by = NULL`,
        [projectId, [...techIds], actorId]
      );
    });
  }
}
