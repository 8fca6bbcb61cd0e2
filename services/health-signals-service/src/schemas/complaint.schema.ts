import { z } from "zod";

/**
 * One row of the 311 Service Requests resource (erm2-nwe9).
 * Socrata serializes numbers as strings and omits empty columns.
 */
export const ServiceRequestRowSchema = z.object({
  unique_key: z.string().min(1),
  created_date: z
    .string()
    .refine((value) => !Number.isNaN(Date.parse(value)), "Invalid created_date"),
  complaint_type: z.string().min(1),
  descriptor: z.string().optional(),
  borough: z.string().optional(),
  status: z.string().optional(),
  incident_address: z.string().optional(),
  latitude: z.string().optional(),
  longitude: z.string().optional(),
});

export type ServiceRequestRow = z.infer<typeof ServiceRequestRowSchema>;
