import type { Provider } from '@nestjs/common';
import type { PostgresDatabase } from '@crewdesk/db';
import { createDb } from '@crewdesk/db';

export const DRIZZLE = Symbol('DRIZZLE');

export const DrizzleProvider: Provider<PostgresDatabase> = {
  provide: DRIZZLE,
  useFactory: () => {
    if (process.env.NODE_ENV === 'production' && !process.env.DATABASE_URL) {
      throw new Error('DATABASE_URL environment variable is required in production');
    }
    return createDb(process.env.DATABASE_URL);
  },
};
