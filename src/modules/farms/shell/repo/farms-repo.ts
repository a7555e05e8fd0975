/**
 * Farms Repository Implementation
 *
 * Kysely-based implementation for the farms and farm_people tables.
 */

import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import { isUniqueViolation } from '../../../../common/errors.js';
import {
  createDatabaseError,
  createFarmConflictError,
  type FarmsError,
} from '../../core/errors.js';
import {
  isFarmTenure,
  type Farm,
  type FarmFields,
  type FarmPerson,
  type FarmTenure,
} from '../../core/types.js';

import type { OffsetPage } from '../../../../common/constants/pagination.js';
import type { FarmDbClient, FarmsTable } from '../../../../infra/database/client.js';
import type { FarmsRepository } from '../../core/ports.js';
import type { Selectable } from 'kysely';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface FarmsRepoOptions {
  db: FarmDbClient;
  logger: Logger;
}

type FarmRow = Selectable<FarmsTable>;

interface FarmPersonRow {
  farm_id: string;
  person_id: string;
  person_name: string;
  tenure: string;
  created_at: Date;
}

const toColumns = (fields: FarmFields) => ({
  name: fields.name,
  registration_number: fields.registrationNumber,
  total_area: fields.totalArea.toString(),
  consolidated_area: fields.consolidatedArea.toString(),
  municipality: fields.municipality,
  state: fields.state,
  car_receipt: fields.carReceipt,
});

// ─────────────────────────────────────────────────────────────────────────────
// Repository Implementation
// ─────────────────────────────────────────────────────────────────────────────

class KyselyFarmsRepo implements FarmsRepository {
  private readonly db: FarmDbClient;
  private readonly log: Logger;

  constructor(options: FarmsRepoOptions) {
    this.db = options.db;
    this.log = options.logger.child({ repo: 'FarmsRepo' });
  }

  async create(fields: FarmFields): Promise<Result<Farm, FarmsError>> {
    try {
      const row = await this.db
        .insertInto('farms')
        .values(toColumns(fields))
        .returningAll()
        .executeTakeFirstOrThrow();

      this.log.debug({ farmId: row.id }, 'Farm created');
      return ok(this.mapRowToFarm(row));
    } catch (error) {
      if (isUniqueViolation(error)) {
        return err(createFarmConflictError(fields.registrationNumber));
      }
      this.log.error({ err: error }, 'Failed to create farm');
      return err(createDatabaseError('Failed to create farm', error));
    }
  }

  async findById(id: string): Promise<Result<Farm | null, FarmsError>> {
    try {
      const row = await this.db
        .selectFrom('farms')
        .selectAll()
        .where('id', '=', id)
        .executeTakeFirst();

      return ok(row === undefined ? null : this.mapRowToFarm(row));
    } catch (error) {
      this.log.error({ err: error, farmId: id }, 'Failed to find farm by ID');
      return err(createDatabaseError('Failed to find farm by ID', error));
    }
  }

  async list(params: {
    limit: number;
    offset: number;
  }): Promise<Result<OffsetPage<Farm>, FarmsError>> {
    const { limit, offset } = params;

    try {
      const [rows, countRow] = await Promise.all([
        this.db
          .selectFrom('farms')
          .selectAll()
          .orderBy('name', 'asc')
          .orderBy('id', 'asc')
          .limit(limit)
          .offset(offset)
          .execute(),
        this.db
          .selectFrom('farms')
          .select((eb) => eb.fn.countAll<string>().as('count'))
          .executeTakeFirstOrThrow(),
      ]);

      return ok({
        items: rows.map((row) => this.mapRowToFarm(row)),
        total: Number(countRow.count),
        limit,
        offset,
      });
    } catch (error) {
      this.log.error({ err: error, limit, offset }, 'Failed to list farms');
      return err(createDatabaseError('Failed to list farms', error));
    }
  }

  async update(id: string, fields: FarmFields): Promise<Result<Farm | null, FarmsError>> {
    try {
      const row = await this.db
        .updateTable('farms')
        .set({ ...toColumns(fields), updated_at: new Date() })
        .where('id', '=', id)
        .returningAll()
        .executeTakeFirst();

      return ok(row === undefined ? null : this.mapRowToFarm(row));
    } catch (error) {
      if (isUniqueViolation(error)) {
        return err(createFarmConflictError(fields.registrationNumber));
      }
      this.log.error({ err: error, farmId: id }, 'Failed to update farm');
      return err(createDatabaseError('Failed to update farm', error));
    }
  }

  async delete(id: string): Promise<Result<boolean, FarmsError>> {
    try {
      const result = await this.db.deleteFrom('farms').where('id', '=', id).executeTakeFirst();
      return ok(Number(result.numDeletedRows) > 0);
    } catch (error) {
      this.log.error({ err: error, farmId: id }, 'Failed to delete farm');
      return err(createDatabaseError('Failed to delete farm', error));
    }
  }

  async listPeople(farmId: string): Promise<Result<FarmPerson[], FarmsError>> {
    try {
      const rows = await this.db
        .selectFrom('farm_people')
        .innerJoin('people', 'people.id', 'farm_people.person_id')
        .select([
          'farm_people.farm_id',
          'farm_people.person_id',
          'people.name as person_name',
          'farm_people.tenure',
          'farm_people.created_at',
        ])
        .where('farm_people.farm_id', '=', farmId)
        .orderBy('people.name', 'asc')
        .execute();

      return ok(rows.flatMap((row) => this.mapRowToFarmPerson(row)));
    } catch (error) {
      this.log.error({ err: error, farmId }, 'Failed to list farm people');
      return err(createDatabaseError('Failed to list farm people', error));
    }
  }

  async personExists(personId: string): Promise<Result<boolean, FarmsError>> {
    try {
      const row = await this.db
        .selectFrom('people')
        .select('id')
        .where('id', '=', personId)
        .executeTakeFirst();
      return ok(row !== undefined);
    } catch (error) {
      this.log.error({ err: error, personId }, 'Failed to check person');
      return err(createDatabaseError('Failed to check person', error));
    }
  }

  async upsertPersonLink(
    farmId: string,
    personId: string,
    tenure: FarmTenure
  ): Promise<Result<FarmPerson, FarmsError>> {
    try {
      await this.db
        .insertInto('farm_people')
        .values({ farm_id: farmId, person_id: personId, tenure })
        .onConflict((oc) => oc.columns(['farm_id', 'person_id']).doUpdateSet({ tenure }))
        .execute();

      const row = await this.db
        .selectFrom('farm_people')
        .innerJoin('people', 'people.id', 'farm_people.person_id')
        .select([
          'farm_people.farm_id',
          'farm_people.person_id',
          'people.name as person_name',
          'farm_people.tenure',
          'farm_people.created_at',
        ])
        .where('farm_people.farm_id', '=', farmId)
        .where('farm_people.person_id', '=', personId)
        .executeTakeFirstOrThrow();

      return ok({
        farmId: row.farm_id,
        personId: row.person_id,
        personName: row.person_name,
        tenure,
        createdAt: row.created_at,
      });
    } catch (error) {
      this.log.error({ err: error, farmId, personId }, 'Failed to link person to farm');
      return err(createDatabaseError('Failed to link person to farm', error));
    }
  }

  async deletePersonLink(farmId: string, personId: string): Promise<Result<boolean, FarmsError>> {
    try {
      const result = await this.db
        .deleteFrom('farm_people')
        .where('farm_id', '=', farmId)
        .where('person_id', '=', personId)
        .executeTakeFirst();
      return ok(Number(result.numDeletedRows) > 0);
    } catch (error) {
      this.log.error({ err: error, farmId, personId }, 'Failed to unlink person from farm');
      return err(createDatabaseError('Failed to unlink person from farm', error));
    }
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Mappers
  // ─────────────────────────────────────────────────────────────────────────

  private mapRowToFarm(row: FarmRow): Farm {
    const totalArea = new Decimal(row.total_area);
    const consolidatedArea = new Decimal(row.consolidated_area);

    return {
      id: row.id,
      name: row.name,
      registrationNumber: row.registration_number,
      totalArea,
      consolidatedArea,
      availableArea: totalArea.minus(consolidatedArea),
      municipality: row.municipality,
      state: row.state,
      carReceipt: row.car_receipt,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    };
  }

  /** Rows with a tenure outside the known set are dropped and logged */
  private mapRowToFarmPerson(row: FarmPersonRow): FarmPerson[] {
    if (!isFarmTenure(row.tenure)) {
      this.log.warn({ farmId: row.farm_id, tenure: row.tenure }, 'Unknown tenure in farm_people');
      return [];
    }
    return [
      {
        farmId: row.farm_id,
        personId: row.person_id,
        personName: row.person_name,
        tenure: row.tenure,
        createdAt: row.created_at,
      },
    ];
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Factory Function
// ─────────────────────────────────────────────────────────────────────────────

export const makeFarmsRepo = (options: FarmsRepoOptions): FarmsRepository => {
  return new KyselyFarmsRepo(options);
};
