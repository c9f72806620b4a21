import type { NewRecord } from '../../domain/audit.js';
import type { TechnologyRepository } from '../../domain/portfolio/ports.js';
import type {
  Technology,
  TechnologyCategory,
  TechnologyData,
} from '../../domain/portfolio/technology.js';
import { AUDIT_COLUMNS, auditFromRow, softDelete, type AuditRow } from './audit.js';
import type { Db } from './pool.js';

interface TechnologyRow extends AuditRow {
  id: number;
  profile_id: number;
  name: string;
  category: TechnologyCategory;
  icon_url: string | null;
}

const COLUMNS = `id, profile_id, name, category, icon_url, ${AUDIT_COLUMNS}`;

function toTechnology(row: TechnologyRow): Technology {
  return {
    id: row.id,
    profileId: row.profile_id,
    name: row.name,
    category: row.category,
    iconUrl: row.icon_url,
    ...auditFromRow(row),
  };
}

export class TechnologyRepo implements TechnologyRepository {
  constructor(private readonly db: Db) {}

  async findById(id: number): Promise<Technology | null> {
    const result = await this.db.query<TechnologyRow>(
      `SELECT ${COLUMNS} FROM technologies WHERE id = $1 AND is_active`,
      [id]
    );
    return result.rows.length === 0 ? null : toTechnology(result.rows[0]);
  }

  async findAllByProfileId(profileId: number): Promise<Technology[]> {
    const result = await this.db.query<TechnologyRow>(
      `SELECT ${COLUMNS} FROM technologies
       WHERE profile_id = $1 AND is_active
       ORDER BY name ASC, id ASC`,
      [profileId]
    );
    return result.rows.map(toTechnology);
  }

  async save(record: NewRecord<TechnologyData>): Promise<Technology> {
    const result = await this.db.query<TechnologyRow>(
      `INSERT INTO technologies (profile_id, name, category, icon_url, created_by)
       VALUES ($1, $2, $3, $4, $5)
       RETURNING ${COLUMNS}`,
      [record.profileId, record.name, record.category, record.iconUrl, record.createdBy]
    );
    return toTechnology(result.rows[0]);
  }

  async update(record: Technology): Promise<Technology> {
    const result = await this.db.query<TechnologyRow>(
      `UPDATE technologies
       SET name = $2, category = $3, icon_url = $4, updated_at = $5, updated_by = $6
       WHERE id = $1 AND is_active
       RETURNING ${COLUMNS}`,
      [record.id, record.name, record.category, record.iconUrl, record.updatedAt, record.updatedBy]
    );
    if (result.rows.length === 0) {
      throw new Error(`Technology ${record.id} does not exist`);
    }
    return toTechnology(result.rows[0]);
  }

  async delete(id: number, deletedBy: number): Promise<boolean> {
    return softDelete(this.db, 'technologies', id, deletedBy);
  }
}
