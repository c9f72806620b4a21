import type { NewRecord } from '../../domain/audit.js';
import type { Client, ClientData } from '../../domain/portfolio/client.js';
import type { ClientRepository } from '../../domain/portfolio/ports.js';
import { AUDIT_COLUMNS, auditFromRow, softDelete, type AuditRow } from './audit.js';
import type { Db } from './pool.js';

interface ClientRow extends AuditRow {
  id: number;
  profile_id: number;
  name: string;
  company: string | null;
  feedback: string | null;
  client_photo_url: string | null;
  project_link: string | null;
}

const COLUMNS = `id, profile_id, name, company, feedback, client_photo_url, project_link,
  ${AUDIT_COLUMNS}`;

function toClient(row: ClientRow): Client {
  return {
    id: row.id,
    profileId: row.profile_id,
    name: row.name,
    company: row.company,
    feedback: row.feedback,
    clientPhotoUrl: row.client_photo_url,
    projectLink: row.project_link,
    ...auditFromRow(row),
  };
}

export class ClientRepo implements ClientRepository {
  constructor(private readonly db: Db) {}

  async findById(id: number): Promise<Client | null> {
    const result = await this.db.query<ClientRow>(
      `SELECT ${COLUMNS} FROM clients WHERE id = $1 AND is_active`,
      [id]
    );
    return result.rows.length === 0 ? null : toClient(result.rows[0]);
  }

  async findAllByProfileId(profileId: number): Promise<Client[]> {
    const result = await this.db.query<ClientRow>(
      `SELECT ${COLUMNS} FROM clients
       WHERE profile_id = $1 AND is_active
       ORDER BY name ASC, id ASC`,
      [profileId]
    );
    return result.rows.map(toClient);
  }

  async save(record: NewRecord<ClientData>): Promise<Client> {
    const result = await this.db.query<ClientRow>(
      `INSERT INTO clients (profile_id, name, company, feedback, client_photo_url,
         project_link, created_by)
       VALUES ($1, $2, $3, $4, $5, $6, $7)
       RETURNING ${COLUMNS}`,
      [
        record.profileId,
        record.name,
        record.company,
        record.feedback,
        record.clientPhotoUrl,
        record.projectLink,
        record.createdBy,
      ]
    );
    return toClient(result.rows[0]);
  }

  async update(record: Client): Promise<Client> {
    const result = await this.db.query<ClientRow>(
      `UPDATE clients
       SET name = $2, company = $3, feedback = $4, client_photo_url = $5, project_link = $6,
           updated_at = $7, updated_by = $8
       WHERE id = $1 AND is_active
       RETURNING ${COLUMNS}`,
      [
        record.id,
        record.name,
        record.company,
        record.feedback,
        record.clientPhotoUrl,
        record.projectLink,
        record.updatedAt,
        record.updatedBy,
      ]
    );
    if (result.rows.length === 0) {
      throw new Error(`Client ${record.id} does not exist`);
    }
    return toClient(result.rows[0]);
  }

  async delete(id: number, deletedBy: number): Promise<boolean> {
    return softDelete(this.db, 'clients', id, deletedBy);
  }
}
