import type { NewRecord } from '../../domain/audit.js';
import type { WorkExperienceRepository } from '../../domain/portfolio/ports.js';
import type { WorkExperience, WorkExperienceData } from '../../domain/portfolio/workExperience.js';
import { AUDIT_COLUMNS, auditFromRow, softDelete, type AuditRow } from './audit.js';
import type { Db } from './pool.js';

interface WorkExperienceRow extends AuditRow {
  id: number;
  profile_id: number;
  job_title: string;
  company: string;
  location: string | null;
  start_date: string;
  end_date: string | null;
  description: string | null;
}

const COLUMNS = `id, profile_id, job_title, company, location, start_date, end_date,
  description, ${AUDIT_COLUMNS}`;

function toWorkExperience(row: WorkExperienceRow): WorkExperience {
  return {
    id: row.id,
    profileId: row.profile_id,
    jobTitle: row.job_title,
    company: row.company,
    location: row.location,
    startDate: row.start_date,
    endDate: row.end_date,
    description: row.description,
    ...auditFromRow(row),
  };
}

export class WorkExperienceRepo implements WorkExperienceRepository {
  constructor(private readonly db: Db) {}

  async findById(id: number): Promise<WorkExperience | null> {
    const result = await this.db.query<WorkExperienceRow>(
      `SELECT ${COLUMNS} FROM work_experiences WHERE id = $1 AND is_active`,
      [id]
    );
    return result.rows.length === 0 ? null : toWorkExperience(result.rows[0]);
  }

  async findAllByProfileId(profileId: number): Promise<WorkExperience[]> {
    const result = await this.db.query<WorkExperienceRow>(
      `SELECT ${COLUMNS} FROM work_experiences
       WHERE profile_id = $1 AND is_active
       ORDER BY start_date DESC, id DESC`,
      [profileId]
    );
    return result.rows.map(toWorkExperience);
  }

  async save(record: NewRecord<WorkExperienceData>): Promise<WorkExperience> {
    const result = await this.db.query<WorkExperienceRow>(
      `INSERT INTO work_experiences (profile_id, job_title, company, location, start_date,
         end_date, description, created_by)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
       RETURNING ${COLUMNS}`,
      [
        record.profileId,
        record.jobTitle,
        record.company,
        record.location,
        record.startDate,
        record.endDate,
        record.description,
        record.createdBy,
      ]
    );
    return toWorkExperience(result.rows[0]);
  }

  async update(record: WorkExperience): Promise<WorkExperience> {
    const result = await this.db.query<WorkExperienceRow>(
      `UPDATE work_experiences
       SET job_title = $2, company = $3, location = $4, start_date = $5, end_date = $6,
           description = $7, updated_at = $8, updated_by = $9
       WHERE id = $1 AND is_active
       RETURNING ${COLUMNS}`,
      [
        record.id,
        record.jobTitle,
        record.company,
        record.location,
        record.startDate,
        record.endDate,
        record.description,
        record.updatedAt,
        record.updatedBy,
      ]
    );
    if (result.rows.length === 0) {
      throw new Error(`Work experience ${record.id} does not exist`);
    }
    return toWorkExperience(result.rows[0]);
  }

  async delete(id: number, deletedBy: number): Promise<boolean> {
    return softDelete(this.db, 'work_experiences', id, deletedBy);
  }
}
