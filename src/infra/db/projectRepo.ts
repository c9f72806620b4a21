import type { NewRecord } from '../../domain/audit.js';
import type { ProjectRepository } from '../../domain/portfolio/ports.js';
import type { Project, ProjectCategory, ProjectData } from '../../domain/portfolio/project.js';
import { AUDIT_COLUMNS, auditFromRow, softDelete, type AuditRow } from './audit.js';
import type { Db } from './pool.js';

interface ProjectRow extends AuditRow {
  id: number;
  profile_id: number;
  title: string;
  category: ProjectCategory;
  description: string | null;
  thumbnail_url: string | null;
  live_url: string | null;
  repo_url: string | null;
  featured: boolean;
  work_experience_id: number | null;
}

const COLUMNS = `id, profile_id, title, category, description, thumbnail_url, live_url,
  repo_url, featured, work_experience_id, ${AUDIT_COLUMNS}`;

function toProject(row: ProjectRow): Project {
  return {
    id: row.id,
    profileId: row.profile_id,
    title: row.title,
    category: row.category,
    description: row.description,
    thumbnailUrl: row.thumbnail_url,
    liveUrl: row.live_url,
    repoUrl: row.repo_url,
    featured: row.featured,
    workExperienceId: row.work_experience_id,
    ...auditFromRow(row),
  };
}

export class ProjectRepo implements ProjectRepository {
  constructor(private readonly db: Db) {}

  async findById(id: number): Promise<Project | null> {
    const result = await this.db.query<ProjectRow>(
      `SELECT ${COLUMNS} FROM projects WHERE id = $1 AND is_active`,
      [id]
    );
    return result.rows.length === 0 ? null : toProject(result.rows[0]);
  }

  async findAllByProfileId(profileId: number): Promise<Project[]> {
    const result = await this.db.query<ProjectRow>(
      `SELECT ${COLUMNS} FROM projects
       WHERE profile_id = $1 AND is_active
       ORDER BY featured DESC, id DESC`,
      [profileId]
    );
    return result.rows.map(toProject);
  }

  async findFeaturedByProfileId(profileId: number): Promise<Project[]> {
    const result = await this.db.query<ProjectRow>(
      `SELECT ${COLUMNS} FROM projects
       WHERE profile_id = $1 AND featured AND is_active
       ORDER BY id DESC`,
      [profileId]
    );
    return result.rows.map(toProject);
  }

  async save(record: NewRecord<ProjectData>): Promise<Project> {
    const result = await this.db.query<ProjectRow>(
      `INSERT INTO projects (profile_id, title, category, description, thumbnail_url,
         live_url, repo_url, featured, work_experience_id, created_by)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)
       RETURNING ${COLUMNS}`,
      [
        record.profileId,
        record.title,
        record.category,
        record.description,
        record.thumbnailUrl,
        record.liveUrl,
        record.repoUrl,
        record.featured,
        record.workExperienceId,
        record.createdBy,
      ]
    );
    return toProject(result.rows[0]);
  }

  async update(record: Project): Promise<Project> {
    const result = await this.db.query<ProjectRow>(
      `UPDATE projects
       SET title = $2, category = $3, description = $4, thumbnail_url = $5, live_url = $6,
           repo_url = $7, featured = $8, work_experience_id = $9,
           updated_at = $10, updated_by = $11
       WHERE id = $1 AND is_active
       RETURNING ${COLUMNS}`,
      [
        record.id,
        record.title,
        record.category,
        record.description,
        record.thumbnailUrl,
        record.liveUrl,
        record.repoUrl,
        record.featured,
        record.workExperienceId,
        record.updatedAt,
        record.updatedBy,
      ]
    );
    if (result.rows.length === 0) {
      throw new Error(`Project ${record.id} does not exist`);
    }
    return toProject(result.rows[0]);
  }

  async delete(id: number, deletedBy: number): Promise<boolean> {
    return softDelete(this.db, 'projects', id, deletedBy);
  }
}
