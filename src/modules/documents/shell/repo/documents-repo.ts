/**
 * Documents Repository Implementation
 */

import { sql, type Selectable } from 'kysely';
import { err, ok, type Result } from 'neverthrow';

import { isForeignKeyViolation } from '../../../../common/errors.js';
import {
  createDatabaseError,
  createMissingReferenceError,
  type DocumentsError,
} from '../../core/errors.js';
import { isDocumentKind } from '../../core/types.js';

import type { OffsetPage } from '../../../../common/constants/pagination.js';
import type { DocumentsTable, FarmDbClient } from '../../../../infra/database/client.js';
import type { DocumentsRepository } from '../../core/ports.js';
import type { DocumentFields, DocumentListFilter, LedgerDocument } from '../../core/types.js';
import type { Logger } from 'pino';

export interface DocumentsRepoOptions {
  db: FarmDbClient;
  logger: Logger;
}

type DocumentRow = Selectable<DocumentsTable>;

const toColumns = (fields: DocumentFields) => ({
  name: fields.name,
  kind: fields.kind,
  custom_kind: fields.customKind,
  issued_on: fields.issuedOn,
  expires_on: fields.expiresOn,
  farm_id: fields.farmId,
  person_id: fields.personId,
  alert_emails: fields.alertEmails,
  alert_thresholds: fields.alertThresholds,
  alerts_enabled: fields.alertsEnabled,
});

const mapRowToDocument = (row: DocumentRow): LedgerDocument => {
  const { kind } = row;

  return {
    id: row.id,
    name: row.name,
    // Kinds outside the known set (legacy rows) surface as custom kinds
    kind: isDocumentKind(kind) ? kind : 'other',
    customKind: isDocumentKind(kind) ? row.custom_kind : (row.custom_kind ?? kind),
    issuedOn: row.issued_on,
    expiresOn: row.expires_on,
    farmId: row.farm_id,
    personId: row.person_id,
    alertEmails: row.alert_emails,
    alertThresholds: row.alert_thresholds,
    alertsEnabled: row.alerts_enabled,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
};

class KyselyDocumentsRepo implements DocumentsRepository {
  private readonly db: FarmDbClient;
  private readonly log: Logger;

  constructor(options: DocumentsRepoOptions) {
    this.db = options.db;
    this.log = options.logger.child({ repo: 'DocumentsRepo' });
  }

  async create(fields: DocumentFields): Promise<Result<LedgerDocument, DocumentsError>> {
    try {
      const row = await this.db
        .insertInto('documents')
        .values(toColumns(fields))
        .returningAll()
        .executeTakeFirstOrThrow();

      this.log.debug({ documentId: row.id }, 'Document created');
      return ok(mapRowToDocument(row));
    } catch (error) {
      if (isForeignKeyViolation(error)) {
        return err(createMissingReferenceError());
      }
      this.log.error({ err: error }, 'Failed to create document');
      return err(createDatabaseError('Failed to create document', error));
    }
  }

  async findById(id: string): Promise<Result<LedgerDocument | null, DocumentsError>> {
    try {
      const row = await this.db
        .selectFrom('documents')
        .selectAll()
        .where('id', '=', id)
        .executeTakeFirst();

      return ok(row === undefined ? null : mapRowToDocument(row));
    } catch (error) {
      this.log.error({ err: error, documentId: id }, 'Failed to find document by ID');
      return err(createDatabaseError('Failed to find document by ID', error));
    }
  }

  async list(
    filter: DocumentListFilter
  ): Promise<Result<OffsetPage<LedgerDocument>, DocumentsError>> {
    const { farmId, personId, expiring, limit, offset } = filter;

    let base = this.db.selectFrom('documents');
    if (farmId !== undefined) {
      base = base.where('farm_id', '=', farmId);
    }
    if (personId !== undefined) {
      base = base.where('person_id', '=', personId);
    }
    if (expiring !== undefined) {
      base = base.where('expires_on', '>=', expiring.from).where('expires_on', '<=', expiring.to);
    }

    try {
      const [rows, countRow] = await Promise.all([
        base
          .selectAll()
          .orderBy(sql`expires_on asc nulls last`)
          .orderBy('name', 'asc')
          .orderBy('id', 'asc')
          .limit(limit)
          .offset(offset)
          .execute(),
        base.select((eb) => eb.fn.countAll<string>().as('count')).executeTakeFirstOrThrow(),
      ]);

      return ok({
        items: rows.map(mapRowToDocument),
        total: Number(countRow.count),
        limit,
        offset,
      });
    } catch (error) {
      this.log.error({ err: error, filter }, 'Failed to list documents');
      return err(createDatabaseError('Failed to list documents', error));
    }
  }

  async update(
    id: string,
    fields: DocumentFields
  ): Promise<Result<LedgerDocument | null, DocumentsError>> {
    try {
      const row = await this.db
        .updateTable('documents')
        .set({ ...toColumns(fields), updated_at: new Date() })
        .where('id', '=', id)
        .returningAll()
        .executeTakeFirst();

      return ok(row === undefined ? null : mapRowToDocument(row));
    } catch (error) {
      if (isForeignKeyViolation(error)) {
        return err(createMissingReferenceError());
      }
      this.log.error({ err: error, documentId: id }, 'Failed to update document');
      return err(createDatabaseError('Failed to update document', error));
    }
  }

  async delete(id: string): Promise<Result<boolean, DocumentsError>> {
    try {
      const result = await this.db.deleteFrom('documents').where('id', '=', id).executeTakeFirst();
      return ok(Number(result.numDeletedRows) > 0);
    } catch (error) {
      this.log.error({ err: error, documentId: id }, 'Failed to delete document');
      return err(createDatabaseError('Failed to delete document', error));
    }
  }
}

export const makeDocumentsRepo = (options: DocumentsRepoOptions): DocumentsRepository => {
  return new KyselyDocumentsRepo(options);
};
