/**
 * People Repository Implementation
 *
 * Kysely-based implementation for the people table.
 */

import { err, ok, type Result } from 'neverthrow';

import { isUniqueViolation } from '../../../../common/errors.js';
import {
  createDatabaseError,
  createPersonConflictError,
  type PeopleError,
} from '../../core/errors.js';

import type { FarmDbClient, PeopleTable } from '../../../../infra/database/client.js';
import type { OffsetPage } from '../../../../common/constants/pagination.js';
import type { PeopleRepository } from '../../core/ports.js';
import type {
  NewPerson,
  Person,
  PersonPatch,
  PersonSearchHits,
  SearchPeopleQuery,
} from '../../core/types.js';
import type { Selectable, Updateable } from 'kysely';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface PeopleRepoOptions {
  db: FarmDbClient;
  logger: Logger;
}

type PersonRow = Selectable<PeopleTable>;

/**
 * Escapes LIKE wildcards so the term matches literally.
 */
const escapeLike = (value: string): string => value.replace(/[\\%_]/g, (char) => `\\${char}`);

// ─────────────────────────────────────────────────────────────────────────────
// Repository Implementation
// ─────────────────────────────────────────────────────────────────────────────

class KyselyPeopleRepo implements PeopleRepository {
  private readonly db: FarmDbClient;
  private readonly log: Logger;

  constructor(options: PeopleRepoOptions) {
    this.db = options.db;
    this.log = options.logger.child({ repo: 'PeopleRepo' });
  }

  async create(input: NewPerson): Promise<Result<Person, PeopleError>> {
    try {
      const row = await this.db
        .insertInto('people')
        .values({
          name: input.name,
          tax_id: input.taxId,
          email: input.email,
          phone: input.phone,
          address: input.address,
        })
        .returningAll()
        .executeTakeFirstOrThrow();

      this.log.debug({ personId: row.id }, 'Person created');
      return ok(this.mapRowToPerson(row));
    } catch (error) {
      if (isUniqueViolation(error)) {
        return err(createPersonConflictError(input.taxId));
      }
      this.log.error({ err: error }, 'Failed to create person');
      return err(createDatabaseError('Failed to create person', error));
    }
  }

  async findById(id: string): Promise<Result<Person | null, PeopleError>> {
    try {
      const row = await this.db
        .selectFrom('people')
        .selectAll()
        .where('id', '=', id)
        .executeTakeFirst();

      return ok(row === undefined ? null : this.mapRowToPerson(row));
    } catch (error) {
      this.log.error({ err: error, personId: id }, 'Failed to find person by ID');
      return err(createDatabaseError('Failed to find person by ID', error));
    }
  }

  async list(params: {
    limit: number;
    offset: number;
  }): Promise<Result<OffsetPage<Person>, PeopleError>> {
    const { limit, offset } = params;

    try {
      const [rows, countRow] = await Promise.all([
        this.db
          .selectFrom('people')
          .selectAll()
          .orderBy('name', 'asc')
          .orderBy('id', 'asc')
          .limit(limit)
          .offset(offset)
          .execute(),
        this.db
          .selectFrom('people')
          .select((eb) => eb.fn.countAll<string>().as('count'))
          .executeTakeFirstOrThrow(),
      ]);

      return ok({
        items: rows.map((row) => this.mapRowToPerson(row)),
        total: Number(countRow.count),
        limit,
        offset,
      });
    } catch (error) {
      this.log.error({ err: error, limit, offset }, 'Failed to list people');
      return err(createDatabaseError('Failed to list people', error));
    }
  }

  async update(id: string, patch: PersonPatch): Promise<Result<Person | null, PeopleError>> {
    const values: Updateable<PeopleTable> = { updated_at: new Date() };
    if (patch.name !== undefined) values.name = patch.name;
    if (patch.taxId !== undefined) values.tax_id = patch.taxId;
    if (patch.email !== undefined) values.email = patch.email;
    if (patch.phone !== undefined) values.phone = patch.phone;
    if (patch.address !== undefined) values.address = patch.address;

    try {
      const row = await this.db
        .updateTable('people')
        .set(values)
        .where('id', '=', id)
        .returningAll()
        .executeTakeFirst();

      return ok(row === undefined ? null : this.mapRowToPerson(row));
    } catch (error) {
      if (isUniqueViolation(error) && patch.taxId !== undefined) {
        return err(createPersonConflictError(patch.taxId));
      }
      this.log.error({ err: error, personId: id }, 'Failed to update person');
      return err(createDatabaseError('Failed to update person', error));
    }
  }

  async delete(id: string): Promise<Result<boolean, PeopleError>> {
    try {
      const result = await this.db.deleteFrom('people').where('id', '=', id).executeTakeFirst();
      return ok(Number(result.numDeletedRows) > 0);
    } catch (error) {
      this.log.error({ err: error, personId: id }, 'Failed to delete person');
      return err(createDatabaseError('Failed to delete person', error));
    }
  }

  async countFarmlessDocuments(personId: string): Promise<Result<number, PeopleError>> {
    try {
      const row = await this.db
        .selectFrom('documents')
        .select((eb) => eb.fn.countAll<string>().as('count'))
        .where('person_id', '=', personId)
        .where('farm_id', 'is', null)
        .executeTakeFirst();
      return ok(Number(row?.count ?? 0));
    } catch (error) {
      this.log.error({ err: error, personId }, 'Failed to count documents of person');
      return err(createDatabaseError('Failed to count documents of person', error));
    }
  }

  async search(query: SearchPeopleQuery): Promise<Result<PersonSearchHits, PeopleError>> {
    const { term, page, limit } = query;
    const namePattern = `%${escapeLike(term)}%`;
    const digits = term.replace(/\D/g, '');

    const base = this.db.selectFrom('people').where((eb) => {
      const byName = eb('name', 'ilike', namePattern);
      return digits === '' ? byName : eb.or([byName, eb('tax_id', 'like', `%${digits}%`)]);
    });

    try {
      const [rows, countRow] = await Promise.all([
        base
          .select(['id', 'name', 'tax_id', 'email', 'phone'])
          .orderBy('name', 'asc')
          .orderBy('id', 'asc')
          .limit(limit)
          .offset((page - 1) * limit)
          .execute(),
        base.select((eb) => eb.fn.countAll<string>().as('count')).executeTakeFirstOrThrow(),
      ]);

      return ok({
        items: rows.map((row) => ({
          id: row.id,
          name: row.name,
          taxId: row.tax_id,
          email: row.email,
          phone: row.phone,
        })),
        total: Number(countRow.count),
      });
    } catch (error) {
      this.log.error({ err: error, term, page, limit }, 'Failed to search people');
      return err(createDatabaseError('Failed to search people', error));
    }
  }

  private mapRowToPerson(row: PersonRow): Person {
    return {
      id: row.id,
      name: row.name,
      taxId: row.tax_id,
      email: row.email,
      phone: row.phone,
      address: row.address,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    };
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Factory Function
// ─────────────────────────────────────────────────────────────────────────────

export const makePeopleRepo = (options: PeopleRepoOptions): PeopleRepository => {
  return new KyselyPeopleRepo(options);
};
