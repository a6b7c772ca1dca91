import { z } from "zod";

const ReferenceText = z
  .string()
  .nullish()
  .transform((value) => {
    const trimmed = value?.trim() ?? "";
    return trimmed === "" ? null : trimmed;
  });

export const CompanyReferenceRowSchema = z.object({
  client_id: ReferenceText,
  client_check_digit: ReferenceText,
  segment: ReferenceText,
  platform: ReferenceText,
  account_owner_code: ReferenceText,
  process_date: ReferenceText
});

export const StaffReferenceRowSchema = z.object({
  staff_id: ReferenceText,
  staff_check_digit: ReferenceText,
  staff_name: ReferenceText,
  staff_role: ReferenceText,
  staff_email: ReferenceText,
  staff_unit: ReferenceText,
  load_date: ReferenceText
});
