import type { AuditFields } from '../../domain/audit.js';
import type { Db } from './pool.js';

export interface AuditRow {
  created_at: Date;
  updated_at: Date | null;
  created_by: number | null;
  updated_by: number | null;
  is_active: boolean;
}

export const AUDIT_COLUMNS = 'created_at, updated_at, created_by, updated_by, is_active';

export function auditFromRow(row: AuditRow): AuditFields {
  return {
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    createdBy: row.created_by,
    updatedBy: row.updated_by,
    isActive: row.is_active,
  };
}

export type SoftDeletableTable =
  | 'profiles'
  | 'work_experiences'
  | 'projects'
  | 'technologies'
  | 'clients'
  | 'socials';

export async function softDelete(
  db: Db,
  table: SoftDeletableTable,
  id: number,
  deletedBy: number
): Promise<boolean> {
  const result = await db.query(
    `UPDATE ${table}
     SET is_active = FALSE, updated_at = NOW(), updated_by = $2
     WHERE id = $1 AND is_active`,
    [id, deletedBy]
  );
  return (result.rowCount ?? 0) > 0;
}
