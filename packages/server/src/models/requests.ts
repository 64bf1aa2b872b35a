import { z } from "zod";

/** One uploaded table row: column name → cell value */
const rowSchema = z.record(z.string(), z.unknown());

export const computeRouteRequestSchema = z.object({
  source: z.array(rowSchema),
  destinations: z.array(rowSchema),
  finalStop: z.array(rowSchema),
  /** Destinations column holding each destination's name */
  identifierField: z.string().trim().min(1),
});

export type ComputeRouteRequest = z.infer<typeof computeRouteRequestSchema>;
