import type { ColumnType, Generated } from 'kysely';

// Timestamps come back as Date; inserts accept Date or ISO strings
export type Timestamp = ColumnType<Date, Date | string | undefined, Date | string>;

// NUMERIC columns are strings at the driver boundary (decimal.js in the domain)
export type Numeric = ColumnType<string, string, string>;

// DATE columns are read as raw 'YYYY-MM-DD' strings (see client.ts type parser)
export type CalendarDate = ColumnType<string, string, string>;

export interface PeopleTable {
  id: Generated<string>; // UUID
  name: string;
  tax_id: string;
  email: string | null;
  phone: string | null;
  address: string | null;
  created_at: Timestamp;
  updated_at: Timestamp;
}

export interface FarmsTable {
  id: Generated<string>; // UUID
  name: string;
  registration_number: string;
  total_area: Numeric;
  consolidated_area: Numeric;
  municipality: string;
  state: string;
  car_receipt: string | null;
  created_at: Timestamp;
  updated_at: Timestamp;
}

export interface FarmPeopleTable {
  farm_id: string;
  person_id: string;
  tenure: string;
  created_at: Timestamp;
}

export interface DocumentsTable {
  id: Generated<string>; // UUID
  name: string;
  kind: string;
  custom_kind: string | null;
  issued_on: CalendarDate;
  expires_on: CalendarDate | null;
  farm_id: string | null;
  person_id: string | null;
  alert_emails: Generated<string[]>;
  alert_thresholds: number[] | null;
  alerts_enabled: Generated<boolean>;
  created_at: Timestamp;
  updated_at: Timestamp;
}

export interface DebtsTable {
  id: Generated<string>; // UUID
  bank: string;
  proposal_number: string;
  issued_on: CalendarDate;
  final_due_on: CalendarDate;
  interest_rate: Numeric;
  rate_basis: string;
  grace_period_months: number | null;
  amount: Numeric;
  created_at: Timestamp;
  updated_at: Timestamp;
}

export interface DebtPeopleTable {
  debt_id: string;
  person_id: string;
}

export interface DebtFarmsTable {
  debt_id: string;
  farm_id: string;
  purpose: string;
  hectares: Numeric | null;
}

export interface DebtInstallmentsTable {
  id: Generated<string>; // UUID
  debt_id: string;
  due_on: CalendarDate;
  amount: Numeric;
  paid: Generated<boolean>;
  paid_on: CalendarDate | null;
  amount_paid: Numeric | null;
  notes: string | null;
  created_at: Timestamp;
}

export interface DebtAlertSettingsTable {
  debt_id: string;
  emails: string[];
  active: boolean;
  updated_at: Timestamp;
}

export interface DeadlineAlertRecordsTable {
  id: Generated<string>; // BIGSERIAL -> string
  obligation_kind: string;
  obligation_id: string;
  threshold_days: number;
  days_remaining: number;
  sent_at: Timestamp;
  success: boolean;
  recipients: string[];
  error_message: string | null;
  email_id: string | null;
}

// Database Schema Interface
// Keys are lowercase to match PostgreSQL's folding of unquoted identifiers.
export interface FarmDatabase {
  people: PeopleTable;
  farms: FarmsTable;
  farm_people: FarmPeopleTable;
  documents: DocumentsTable;
  debts: DebtsTable;
  debt_people: DebtPeopleTable;
  debt_farms: DebtFarmsTable;
  debt_installments: DebtInstallmentsTable;
  debt_alert_settings: DebtAlertSettingsTable;
  deadline_alert_records: DeadlineAlertRecordsTable;
}
