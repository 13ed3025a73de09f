import 'dotenv/config';
import { Logger } from '@nestjs/common';
import { loadAppConfig } from '../config/app.config';
import { DatabaseService } from '../database/database.service';
import { MigrationService } from '../database/migration.service';

async function main() {
  const database = new DatabaseService(loadAppConfig());
  if (!database.enabled) {
    throw new Error(
      'Database connection is not configured. Set DATABASE_URL or DB_HOST/DB_NAME/DB_USER.',
    );
  }
  try {
    await new MigrationService(database).runMigrations();
  } finally {
    await database.onModuleDestroy();
  }
}

main().catch((error: unknown) => {
  Logger.error(
    'Migration run failed',
    error instanceof Error ? error.stack : String(error),
    'Migrations',
  );
  process.exitCode = 1;
});
