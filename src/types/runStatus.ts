import { z } from "zod";
import {
  NotificationStatusSchema,
  ReconciliationStatusSchema,
  RunStatusSchema,
  SourceRunStatusSchema,
  StatusErrorSchema
} from "../validation/runStatusSchema";

export type RunStatus = z.infer<typeof RunStatusSchema>;
export type SourceRunStatus = z.infer<typeof SourceRunStatusSchema>;
export type ReconciliationStatus = z.infer<typeof ReconciliationStatusSchema>;
export type NotificationStatus = z.infer<typeof NotificationStatusSchema>;
export type StatusError = z.infer<typeof StatusErrorSchema>;
