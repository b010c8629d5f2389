import { Global, Inject, Logger, Module, OnApplicationShutdown, OnModuleInit } from '@nestjs/common';
import { sql } from 'drizzle-orm';
import type { PostgresDatabase } from '@crewdesk/db';
import { DrizzleProvider, DRIZZLE } from '../providers/drizzle.provider';

@Global()
@Module({
  providers: [DrizzleProvider],
  exports: [DRIZZLE],
})
export class DatabaseModule implements OnModuleInit, OnApplicationShutdown {
  private readonly logger = new Logger(DatabaseModule.name);

  constructor(@Inject(DRIZZLE) private readonly db: PostgresDatabase) {}

  async onModuleInit() {
    try {
      await this.db.execute(sql`select 1`);
    } catch (err) {
      this.logger.error({ err }, 'Database is unreachable, refusing to start');
      throw err;
    }
    this.logger.log('Database connection verified');
  }

  async onApplicationShutdown() {
    await this.db.$client.end();
    this.logger.log('Database connections closed');
  }
}
