/**
 * Documents Module - Core Types
 */

import type { IsoDate } from '../../../common/dates.js';

export const DOCUMENT_KINDS = ['certificate', 'contract', 'land', 'other'] as const;

export type DocumentKind = (typeof DOCUMENT_KINDS)[number];

export const isDocumentKind = (value: string): value is DocumentKind =>
  DOCUMENT_KINDS.some((kind) => kind === value);

/** Upper bound for a custom alert offset (ten years) */
export const MAX_ALERT_THRESHOLD_DAYS = 3650;

/**
 * A certificate, contract or land document kept for a farm and/or person.
 */
export interface LedgerDocument {
  id: string;
  name: string;
  kind: DocumentKind;
  /** Set only when kind is 'other' */
  customKind: string | null;
  issuedOn: IsoDate;
  /** null when the document never expires */
  expiresOn: IsoDate | null;
  farmId: string | null;
  /** Responsible person */
  personId: string | null;
  alertEmails: string[];
  /** Custom day offsets, descending; null means the default set */
  alertThresholds: number[] | null;
  alertsEnabled: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export interface DocumentFields {
  name: string;
  kind: DocumentKind;
  customKind: string | null;
  issuedOn: IsoDate;
  expiresOn: IsoDate | null;
  farmId: string | null;
  personId: string | null;
  alertEmails: string[];
  alertThresholds: number[] | null;
  alertsEnabled: boolean;
}

export interface CreateDocumentInput {
  name: string;
  kind: string;
  customKind?: string | null;
  issuedOn: string;
  expiresOn?: string | null;
  farmId?: string | null;
  personId?: string | null;
  alertEmails?: string[];
  alertThresholds?: number[] | null;
  alertsEnabled?: boolean;
}

export type UpdateDocumentInput = Partial<CreateDocumentInput>;

export interface DocumentListFilter {
  farmId?: string;
  personId?: string;
  /** Keeps documents expiring between `today` and `today + n` */
  expiring?: { from: IsoDate; to: IsoDate };
  limit: number;
  offset: number;
}
