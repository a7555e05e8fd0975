import { Kysely, PostgresDialect } from 'kysely';
import pg from 'pg';

import type { FarmDatabase } from './types.js';
import type { AppConfig } from '../config/env.js';

const { Pool: PG_POOL, types: PG_TYPES } = pg;

/** OID of the PostgreSQL DATE type */
const PG_DATE_OID = 1082;

export type FarmDbClient = Kysely<FarmDatabase>;

export type {
  FarmDatabase,
  PeopleTable,
  FarmsTable,
  FarmPeopleTable,
  DocumentsTable,
  DebtsTable,
  DebtPeopleTable,
  DebtFarmsTable,
  DebtInstallmentsTable,
  DebtAlertSettingsTable,
  DeadlineAlertRecordsTable,
} from './types.js';

// Keep DATE values as calendar strings; the default parser shifts them into local time
PG_TYPES.setTypeParser(PG_DATE_OID, (value: string) => value);

/**
 * Initialize the database client
 */
export const initDatabase = (config: AppConfig): FarmDbClient => {
  const connectionString = config.database.url;

  if (connectionString === '') {
    throw new Error('Missing configuration for database (DATABASE_URL)');
  }

  return new Kysely<FarmDatabase>({
    dialect: new PostgresDialect({
      pool: new PG_POOL({
        connectionString,
        max: 10, // connection pool size
      }),
    }),
  });
};

export type * from './types.js';
