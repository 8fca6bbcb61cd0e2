import { z } from "zod";

export const RESPIRATORY_COLUMNS = ["date", "metric", "submetric", "value", "display"] as const;

export const RespiratoryRowSchema = z.object({
  date: z
    .string()
    .refine((value) => !Number.isNaN(Date.parse(value)), "Invalid date")
    .transform((value) => new Date(value).toISOString().slice(0, 10)),
  metric: z.string().min(1),
  submetric: z.string().min(1),
  value: z
    .string()
    .refine((value) => value.trim() !== "" && Number.isFinite(Number(value)), "Value is not numeric")
    .transform(Number),
  display: z.string(),
});
