import { Injectable, Inject, Logger } from '@nestjs/common';
import { eq } from 'drizzle-orm';
import type { InferSelectModel } from 'drizzle-orm';
import * as argon2 from 'argon2';
import { users } from '@crewdesk/db';
import type { Database } from '@crewdesk/db';
import { DRIZZLE } from '../providers/drizzle.provider';
import { DEFAULT_USER_ROLE } from '../constants';
import { isPgUniqueViolation } from '../utils/pg-errors';
import { EmailConflictException } from './exceptions/email-conflict.exception';

export type UserRecord = InferSelectModel<typeof users>;

/** Public view of a user; never carries the password hash. */
export interface UserView {
  id: number;
  email: string;
  name: string;
  role: string;
  active: boolean;
}

export const USER_COLUMNS = {
  id: users.id,
  email: users.email,
  name: users.name,
  role: users.role,
  active: users.active,
};

export function toUserView(user: UserRecord): UserView {
  return {
    id: user.id,
    email: user.email,
    name: user.name,
    role: user.role,
    active: user.active,
  };
}

@Injectable()
export class UsersService {
  private readonly logger = new Logger(UsersService.name);

  constructor(@Inject(DRIZZLE) private readonly db: Database) {}

  async createUser(input: { name: string; email: string; password: string; role?: string }): Promise<UserView> {
    const password_hash = await argon2.hash(input.password);

    let created: UserView;
    try {
      [created] = await this.db.insert(users).values({
        name: input.name,
        email: input.email,
        password_hash,
        role: input.role ?? DEFAULT_USER_ROLE,
      }).returning(USER_COLUMNS);
    } catch (err) {
      if (isPgUniqueViolation(err)) {
        throw new EmailConflictException();
      }
      throw err;
    }

    this.logger.log({ userId: created.id }, 'User created');
    return created;
  }

  async findByEmail(email: string): Promise<UserRecord | null> {
    const [user] = await this.db
      .select()
      .from(users)
      .where(eq(users.email, email))
      .limit(1);
    return user ?? null;
  }

  async verifyPassword(user: Pick<UserRecord, 'id' | 'password_hash'>, plaintext: string): Promise<boolean> {
    try {
      return await argon2.verify(user.password_hash, plaintext);
    } catch (err) {
      this.logger.warn({ userId: user.id, err }, 'Stored password hash is not verifiable');
      return false;
    }
  }
}
