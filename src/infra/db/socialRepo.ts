import type { NewRecord } from '../../domain/audit.js';
import type { SocialRepository } from '../../domain/portfolio/ports.js';
import type { Social, SocialData } from '../../domain/portfolio/social.js';
import { AUDIT_COLUMNS, auditFromRow, softDelete, type AuditRow } from './audit.js';
import type { Db } from './pool.js';

interface SocialRow extends AuditRow {
  id: number;
  profile_id: number;
  platform: string;
  url: string;
  icon_name: string | null;
  sort_order: number;
}

const COLUMNS = `id, profile_id, platform, url, icon_name, sort_order, ${AUDIT_COLUMNS}`;

function toSocial(row: SocialRow): Social {
  return {
    id: row.id,
    profileId: row.profile_id,
    platform: row.platform,
    url: row.url,
    iconName: row.icon_name,
    order: row.sort_order,
    ...auditFromRow(row),
  };
}

export class SocialRepo implements SocialRepository {
  constructor(private readonly db: Db) {}

  async findById(id: number): Promise<Social | null> {
    const result = await this.db.query<SocialRow>(
      `SELECT ${COLUMNS} FROM socials WHERE id = $1 AND is_active`,
      [id]
    );
    return result.rows.length === 0 ? null : toSocial(result.rows[0]);
  }

  async findAllByProfileId(profileId: number): Promise<Social[]> {
    const result = await this.db.query<SocialRow>(
      `SELECT ${COLUMNS} FROM socials
       WHERE profile_id = $1 AND is_active
       ORDER BY sort_order ASC, id ASC`,
      [profileId]
    );
    return result.rows.map(toSocial);
  }

  async save(record: NewRecord<SocialData>): Promise<Social> {
    const result = await this.db.query<SocialRow>(
      `INSERT INTO socials (profile_id, platform, url, icon_name, sort_order, created_by)
       VALUES ($1, $2, $3, $4, $5, $6)
       RETURNING ${COLUMNS}`,
      [record.profileId, record.platform, record.url, record.iconName, record.order, record.createdBy]
    );
    return toSocial(result.rows[0]);
  }

  async update(record: Social): Promise<Social> {
    const result = await this.db.query<SocialRow>(
      `UPDATE socials
       SET platform = $2, url = $3, icon_name = $4, sort_order = $5,
           updated_at = $6, updated_by = $7
       WHERE id = $1 AND is_active
       RETURNING ${COLUMNS}`,
      [
        record.id,
        record.platform,
        record.url,
        record.iconName,
        record.order,
        record.updatedAt,
        record.updatedBy,
      ]
    );
    if (result.rows.length === 0) {
      throw new Error(`Social link ${record.id} does not exist`);
    }
    return toSocial(result.rows[0]);
  }

  async delete(id: number, deletedBy: number): Promise<boolean> {
    return softDelete(this.db, 'socials', id, deletedBy);
  }
}
