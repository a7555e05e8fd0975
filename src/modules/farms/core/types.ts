/**
 * Farms Module - Core Types
 */

import type { Decimal } from 'decimal.js';

// ─────────────────────────────────────────────────────────────────────────────
// Tenure
// ─────────────────────────────────────────────────────────────────────────────

/**
 * How a person holds a farm.
 */
export const FARM_TENURES = ['owned', 'leased', 'loan', 'possession'] as const;

export type FarmTenure = (typeof FARM_TENURES)[number];

export const isFarmTenure = (value: string): value is FarmTenure =>
  FARM_TENURES.some((tenure) => tenure === value);

// ─────────────────────────────────────────────────────────────────────────────
// Domain Types
// ─────────────────────────────────────────────────────────────────────────────

export interface Farm {
  id: string;
  name: string;
  /** Land registry number */
  registrationNumber: string;
  /** Hectares */
  totalArea: Decimal;
  consolidatedArea: Decimal;
  /** totalArea - consolidatedArea */
  availableArea: Decimal;
  municipality: string;
  /** Two-letter state code, upper case */
  state: string;
  /** Rural environmental registry receipt */
  carReceipt: string | null;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Validated farm fields, as stored.
 */
export interface FarmFields {
  name: string;
  registrationNumber: string;
  totalArea: Decimal;
  consolidatedArea: Decimal;
  municipality: string;
  state: string;
  carReceipt: string | null;
}

export interface CreateFarmInput {
  name: string;
  registrationNumber: string;
  totalArea: string;
  consolidatedArea: string;
  municipality: string;
  state: string;
  carReceipt?: string | null;
}

export type UpdateFarmInput = Partial<CreateFarmInput>;

export interface FarmPerson {
  farmId: string;
  personId: string;
  personName: string;
  tenure: FarmTenure;
  createdAt: Date;
}
