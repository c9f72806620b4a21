import type { ProjectPreviewRepository } from '../../domain/portfolio/ports.js';
import type { ProjectPreview, ProjectPreviewInput } from '../../domain/portfolio/project.js';
import { AUDIT_COLUMNS, auditFromRow, type AuditRow } from './audit.js';
import { withTransaction, type Db } from './pool.js';

interface ProjectPreviewRow extends AuditRow {
  id: number;
  project_id: number;
  image_url: string;
  caption: string | null;
  sort_order: number;
}

const COLUMNS = `id, project_id, image_url, caption, sort_order, ${AUDIT_COLUMNS}`;

function toPreview(row: ProjectPreviewRow): ProjectPreview {
  return {
    id: row.id,
    projectId: row.project_id,
    imageUrl: row.image_url,
    caption: row.caption,
    order: row.sort_order,
    ...auditFromRow(row),
  };
}

function byOrder(a: ProjectPreview, b: ProjectPreview): number {
  return a.order - b.order || a.id - b.id;
}

export class ProjectPreviewRepo implements ProjectPreviewRepository {
  constructor(private readonly db: Db) {}

  async findByProjectId(projectId: number): Promise<ProjectPreview[]> {
    const result = await this.db.query<ProjectPreviewRow>(
      `SELECT ${COLUMNS} FROM project_previews
       WHERE project_id = $1 AND is_active
       ORDER BY sort_order ASC, id ASC`,
      [projectId]
    );
    return result.rows.map(toPreview);
  }

  async replaceForProject(
    projectId: number,
    previews: readonly ProjectPreviewInput[],
    actorId: number
  ): Promise<ProjectPreview[]> {
    return withTransaction(this.db, async (client) => {
      await client.query(
        `UPDATE project_previews
         SET is_active = FALSE, updated_at = NOW(), updated_by = $2
         WHERE project_id = $1 AND is_active`,
        [projectId, actorId]
      );

      const stored: ProjectPreview[] = [];
      for (const preview of previews) {
        const result = await client.query<ProjectPreviewRow>(
          `INSERT INTO project_previews (project_id, image_url, caption, sort_order, created_by)
           VALUES ($1, $2, $3, $4, $5)
           RETURNING ${COLUMNS}`,
          [projectId, preview.imageUrl, preview.caption, preview.order, actorId]
        );
        stored.push(toPreview(result.rows[0]));
      }
      return stored.sort(byOrder);
    });
  }
}
