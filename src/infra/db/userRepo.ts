import { UserAlreadyExistsError } from '../../application/errors.js';
import type { UserRepository } from '../../domain/auth/ports.js';
import type { NewUser, Role, User } from '../../domain/auth/user.js';
import { uniqueViolationConstraint } from './pgErrors.js';
import type { Db } from './pool.js';

interface UserRow {
  id: number;
  username: string;
  email: string;
  password_hash: string;
  role: Role;
  last_login: Date | null;
  created_at: Date;
}

const USERNAME_CONSTRAINT = 'users_username_key';

const USER_COLUMNS = 'id, username, email, password_hash, role, last_login, created_at';

function toUser(row: UserRow): User {
  return {
    id: row.id,
    username: row.username,
    email: row.email,
    passwordHash: row.password_hash,
    role: row.role,
    lastLogin: row.last_login,
    createdAt: row.created_at,
  };
}

export class UserRepo implements UserRepository {
  constructor(private readonly db: Db) {}

  async findById(id: number): Promise<User | null> {
    const result = await this.db.query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users WHERE id = $1`,
      [id]
    );
    return result.rows.length === 0 ? null : toUser(result.rows[0]);
  }

  async findByEmail(email: string): Promise<User | null> {
    const result = await this.db.query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users WHERE email = $1`,
      [email]
    );
    return result.rows.length === 0 ? null : toUser(result.rows[0]);
  }

  async findByUsername(username: string): Promise<User | null> {
    const result = await this.db.query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users WHERE username = $1`,
      [username]
    );
    return result.rows.length === 0 ? null : toUser(result.rows[0]);
  }

  /**
   * A concurrent registration that slipped past the duplicate check surfaces
   * here as a unique violation.
   */
  async save(user: NewUser): Promise<User> {
    try {
      const result = await this.db.query<UserRow>(
        `INSERT INTO users (username, email, password_hash, role)
         VALUES ($1, $2, $3, $4)
         RETURNING ${USER_COLUMNS}`,
        [user.username, user.email, user.passwordHash, user.role]
      );
      return toUser(result.rows[0]);
    } catch (error: unknown) {
      const constraint = uniqueViolationConstraint(error);
      if (constraint === USERNAME_CONSTRAINT) {
        throw new UserAlreadyExistsError(`Username ${user.username} is already taken`);
      }
      if (constraint !== null) {
        throw new UserAlreadyExistsError(`Email ${user.email} is already registered`);
      }
      throw error;
    }
  }

  async update(user: User): Promise<User> {
    const result = await this.db.query<UserRow>(
      `UPDATE users
       SET username = $2, email = $3, password_hash = $4, role = $5, last_login = $6
       WHERE id = $1
       RETURNING ${USER_COLUMNS}`,
      [user.id, user.username, user.email, user.passwordHash, user.role, user.lastLogin]
    );
    if (result.rows.length === 0) {
      throw new Error(`User ${user.id} does not exist`);
    }
    return toUser(result.rows[0]);
  }
}
