import { PoolClient } from 'pg';
import { NewUser, User } from '../types/user';
import { logger } from '../utils/logger';
import { translateUniqueViolation } from './errors';

interface UserRow {
  id: number;
  name: string;
  email: string;
  cv_text: string | null;
  cv_filename: string | null;
  cv_vector: number[] | null;
  cv_updated_at: Date | null;
  created_at: Date;
}

const USER_COLUMNS = 'id, name, email, cv_text, cv_filename, cv_vector, cv_updated_at, created_at';

function toUser(row: UserRow): User {
  return {
    id: row.id,
    name: row.name,
    email: row.email,
    cvText: row.cv_text,
    cvFilename: row.cv_filename,
    cvVector: row.cv_vector,
    cvUpdatedAt: row.cv_updated_at,
    createdAt: row.created_at,
  };
}

/**
 * Database operations for users
 */
export class UsersRepository {
  /**
   * Creates a user; a taken email surfaces as StoreConstraintViolation
   */
  async insertUser(client: PoolClient, user: NewUser): Promise<User> {
    try {
      const result = await client.query<UserRow>(
        `INSERT INTO users (name, email)
         VALUES ($1, $2)
         RETURNING ${USER_COLUMNS}`,
        [user.name, user.email.toLowerCase()]
      );
      return toUser(result.rows[0]);
    } catch (error) {
      const translated = translateUniqueViolation(error, 'users_email_key');
      if (translated === error) {
        logger.error(`Error inserting user`, error, { email: user.email });
      }
      throw translated;
    }
  }

  async getUserById(client: PoolClient, id: number): Promise<User | null> {
    const result = await client.query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users WHERE id = $1`,
      [id]
    );
    return result.rows.length > 0 ? toUser(result.rows[0]) : null;
  }

  /**
   * Users that uploaded a CV, oldest first
   */
  async getUsersWithCv(client: PoolClient): Promise<User[]> {
    const result = await client.query<UserRow>(
      `SELECT ${USER_COLUMNS}
       FROM users
       WHERE cv_text IS NOT NULL
       ORDER BY id ASC`
    );
    return result.rows.map(toUser);
  }

  /**
   * Replaces the CV wholesale: text, filename and vector together
   */
  async replaceCv(
    client: PoolClient,
    id: number,
    cv: { cvText: string; cvFilename: string; cvVector: number[] | null }
  ): Promise<User | null> {
    const result = await client.query<UserRow>(
      `UPDATE users
       SET cv_text = $2, cv_filename = $3, cv_vector = $4, cv_updated_at = NOW()
       WHERE id = $1
       RETURNING ${USER_COLUMNS}`,
      [id, cv.cvText, cv.cvFilename, cv.cvVector]
    );
    return result.rows.length > 0 ? toUser(result.rows[0]) : null;
  }

  async updateCvVector(client: PoolClient, id: number, cvVector: number[]): Promise<void> {
    await client.query(
      `UPDATE users SET cv_vector = $2 WHERE id = $1`,
      [id, cvVector]
    );
  }
}
