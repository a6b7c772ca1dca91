/** A row of the company master table (reference A). */
export interface CompanyReferenceRow {
  client_id: string | null;
  client_check_digit: string | null;
  segment: string | null;
  platform: string | null;
  /** Indirection key into the staff table. */
  account_owner_code: string | null;
  process_date: string | null;
}

/** A row of the staff table (reference B). */
export interface StaffReferenceRow {
  staff_id: string | null;
  staff_check_digit: string | null;
  staff_name: string | null;
  staff_role: string | null;
  staff_email: string | null;
  staff_unit: string | null;
  load_date: string | null;
}
