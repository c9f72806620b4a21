import { ProfileAlreadyExistsError } from '../../application/errors.js';
import type { NewRecord } from '../../domain/audit.js';
import type { ProfileRepository } from '../../domain/portfolio/ports.js';
import type { Profile, ProfileData } from '../../domain/portfolio/profile.js';
import { AUDIT_COLUMNS, auditFromRow, type AuditRow } from './audit.js';
import { uniqueViolationConstraint } from './pgErrors.js';
import type { Db } from './pool.js';

interface ProfileRow extends AuditRow {
  id: number;
  user_id: number;
  name: string;
  last_name: string;
  email: string;
  current_title: string | null;
  bio_summary: string | null;
  phone: string | null;
  location: string | null;
  photo_url: string | null;
}

const PROFILE_COLUMNS = `id, user_id, name, last_name, email, current_title, bio_summary,
  phone, location, photo_url, ${AUDIT_COLUMNS}`;

function toProfile(row: ProfileRow): Profile {
  return {
    id: row.id,
    userId: row.user_id,
    name: row.name,
    lastName: row.last_name,
    email: row.email,
    currentTitle: row.current_title,
    bioSummary: row.bio_summary,
    phone: row.phone,
    location: row.location,
    photoUrl: row.photo_url,
    ...auditFromRow(row),
  };
}

export class ProfileRepo implements ProfileRepository {
  constructor(private readonly db: Db) {}

  async findById(id: number): Promise<Profile | null> {
    const result = await this.db.query<ProfileRow>(
      `SELECT ${PROFILE_COLUMNS} FROM profiles WHERE id = $1 AND is_active`,
      [id]
    );
    return result.rows.length === 0 ? null : toProfile(result.rows[0]);
  }

  async findByUserId(userId: number): Promise<Profile | null> {
    const result = await this.db.query<ProfileRow>(
      `SELECT ${PROFILE_COLUMNS} FROM profiles WHERE user_id = $1 AND is_active`,
      [userId]
    );
    return result.rows.length === 0 ? null : toProfile(result.rows[0]);
  }

  /** Only one active profile per user; a concurrent create loses here. */
  async save(profile: NewRecord<ProfileData>): Promise<Profile> {
    try {
      const result = await this.db.query<ProfileRow>(
        `INSERT INTO profiles (user_id, name, last_name, email, current_title, bio_summary,
           phone, location, photo_url, created_by)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)
         RETURNING ${PROFILE_COLUMNS}`,
        [
          profile.userId,
          profile.name,
          profile.lastName,
          profile.email,
          profile.currentTitle,
          profile.bioSummary,
          profile.phone,
          profile.location,
          profile.photoUrl,
          profile.createdBy,
        ]
      );
      return toProfile(result.rows[0]);
    } catch (error: unknown) {
      if (uniqueViolationConstraint(error) !== null) {
        throw new ProfileAlreadyExistsError();
      }
      throw error;
    }
  }

  async update(profile: Profile): Promise<Profile> {
    const result = await this.db.query<ProfileRow>(
      `UPDATE profiles
       SET name = $2, last_name = $3, email = $4, current_title = $5, bio_summary = $6,
           phone = $7, location = $8, photo_url = $9, updated_at = $10, updated_by = $11
       WHERE id = $1 AND is_active
       RETURNING ${PROFILE_COLUMNS}`,
      [
        profile.id,
        profile.name,
        profile.lastName,
        profile.email,
        profile.currentTitle,
        profile.bioSummary,
        profile.phone,
        profile.location,
        profile.photoUrl,
        profile.updatedAt,
        profile.updatedBy,
      ]
    );
    if (result.rows.length === 0) {
      throw new Error(`Profile ${profile.id} does not exist`);
    }
    return toProfile(result.rows[0]);
  }
}
