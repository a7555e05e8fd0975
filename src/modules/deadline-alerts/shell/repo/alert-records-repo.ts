/**
 * Alert Records Repository Implementation
 */

import { sql, type Selectable } from 'kysely';
import { err, ok, type Result } from 'neverthrow';

import { createDatabaseError, type DatabaseError } from '../../core/errors.js';
import { isObligationKind } from '../../core/types.js';

import type { OffsetPage } from '../../../../common/constants/pagination.js';
import type {
  DeadlineAlertRecordsTable,
  FarmDbClient,
} from '../../../../infra/database/client.js';
import type { AlertRecordsRepository, StatsWindow } from '../../core/ports.js';
import type {
  AlertHistoryFilter,
  AlertRecord,
  AlertStats,
  NewAlertRecord,
  ObligationKind,
  SentThreshold,
} from '../../core/types.js';
import type { Logger } from 'pino';

export interface AlertRecordsRepoOptions {
  db: FarmDbClient;
  logger: Logger;
}

type AlertRecordRow = Selectable<DeadlineAlertRecordsTable>;

class KyselyAlertRecordsRepo implements AlertRecordsRepository {
  private readonly db: FarmDbClient;
  private readonly log: Logger;

  constructor(options: AlertRecordsRepoOptions) {
    this.db = options.db;
    this.log = options.logger.child({ repo: 'AlertRecordsRepo' });
  }

  async findSentThresholds(
    kind: ObligationKind,
    obligationIds: readonly string[]
  ): Promise<Result<SentThreshold[], DatabaseError>> {
    if (obligationIds.length === 0) {
      return ok([]);
    }

    try {
      const rows = await this.db
        .selectFrom('deadline_alert_records')
        .select(['obligation_id', 'threshold_days'])
        .where('obligation_kind', '=', kind)
        .where('success', '=', true)
        .where('obligation_id', 'in', [...obligationIds])
        .execute();

      return ok(
        rows.map((row) => ({ obligationId: row.obligation_id, thresholdDays: row.threshold_days }))
      );
    } catch (error) {
      this.log.error({ err: error, kind }, 'Failed to load sent thresholds');
      return err(createDatabaseError('Failed to load sent thresholds', error));
    }
  }

  async insert(record: NewAlertRecord): Promise<Result<AlertRecord, DatabaseError>> {
    try {
      const row = await this.db
        .insertInto('deadline_alert_records')
        .values({
          obligation_kind: record.kind,
          obligation_id: record.obligationId,
          threshold_days: record.thresholdDays,
          days_remaining: record.daysRemaining,
          success: record.success,
          recipients: record.recipients,
          error_message: record.errorMessage,
          email_id: record.emailId,
        })
        .returningAll()
        .executeTakeFirstOrThrow();

      const mapped = this.mapRow(row);
      if (mapped === null) {
        return err(createDatabaseError(`Unexpected obligation kind '${row.obligation_kind}'`));
      }
      return ok(mapped);
    } catch (error) {
      this.log.error(
        { err: error, kind: record.kind, obligationId: record.obligationId },
        'Failed to insert alert record'
      );
      return err(createDatabaseError('Failed to insert alert record', error));
    }
  }

  async list(
    filter: AlertHistoryFilter
  ): Promise<Result<OffsetPage<AlertRecord>, DatabaseError>> {
    const { kind, obligationId, limit, offset } = filter;

    let base = this.db.selectFrom('deadline_alert_records');
    if (kind !== undefined) {
      base = base.where('obligation_kind', '=', kind);
    }
    if (obligationId !== undefined) {
      base = base.where('obligation_id', '=', obligationId);
    }

    try {
      const [rows, countRow] = await Promise.all([
        base
          .selectAll()
          .orderBy('sent_at', 'desc')
          .orderBy('id', 'desc')
          .limit(limit)
          .offset(offset)
          .execute(),
        base.select((eb) => eb.fn.countAll<string>().as('count')).executeTakeFirstOrThrow(),
      ]);

      const items: AlertRecord[] = [];
      for (const row of rows) {
        const mapped = this.mapRow(row);
        if (mapped !== null) items.push(mapped);
      }

      return ok({ items, total: Number(countRow.count), limit, offset });
    } catch (error) {
      this.log.error({ err: error, filter }, 'Failed to list alert records');
      return err(createDatabaseError('Failed to list alert records', error));
    }
  }

  async deleteOlderThan(cutoff: Date): Promise<Result<number, DatabaseError>> {
    try {
      const result = await this.db
        .deleteFrom('deadline_alert_records')
        .where('sent_at', '<', cutoff)
        .executeTakeFirst();

      const deleted = Number(result.numDeletedRows);
      this.log.info({ cutoff: cutoff.toISOString(), deleted }, 'Purged alert records');
      return ok(deleted);
    } catch (error) {
      this.log.error({ err: error }, 'Failed to purge alert records');
      return err(createDatabaseError('Failed to purge alert records', error));
    }
  }

  async getStats(window: StatsWindow): Promise<Result<AlertStats, DatabaseError>> {
    const { timeZone, today, monthStart } = window;
    const sentDate = sql`(sent_at at time zone ${timeZone})::date`;

    try {
      const row = await this.db
        .selectFrom('deadline_alert_records')
        .select((eb) => [
          eb.fn.countAll<string>().as('total'),
          eb.fn.countAll<string>().filterWhere('success', '=', true).as('successful'),
          eb.fn.countAll<string>().filterWhere('success', '=', false).as('failed'),
          eb.fn
            .countAll<string>()
            .filterWhere(sql<boolean>`success and ${sentDate} = ${today}::date`)
            .as('sent_today'),
          eb.fn
            .countAll<string>()
            .filterWhere(sql<boolean>`success and ${sentDate} >= ${monthStart}::date`)
            .as('sent_this_month'),
        ])
        .executeTakeFirstOrThrow();

      return ok({
        total: Number(row.total),
        successful: Number(row.successful),
        failed: Number(row.failed),
        sentToday: Number(row.sent_today),
        sentThisMonth: Number(row.sent_this_month),
      });
    } catch (error) {
      this.log.error({ err: error }, 'Failed to compute alert stats');
      return err(createDatabaseError('Failed to compute alert stats', error));
    }
  }

  private mapRow(row: AlertRecordRow): AlertRecord | null {
    const kind = row.obligation_kind;
    if (!isObligationKind(kind)) {
      this.log.warn({ recordId: row.id, kind }, 'Skipping alert record with unknown kind');
      return null;
    }

    return {
      id: row.id,
      kind,
      obligationId: row.obligation_id,
      thresholdDays: row.threshold_days,
      daysRemaining: row.days_remaining,
      sentAt: row.sent_at,
      success: row.success,
      recipients: row.recipients,
      errorMessage: row.error_message,
      emailId: row.email_id,
    };
  }
}

export const makeAlertRecordsRepo = (options: AlertRecordsRepoOptions): AlertRecordsRepository => {
  return new KyselyAlertRecordsRepo(options);
};
