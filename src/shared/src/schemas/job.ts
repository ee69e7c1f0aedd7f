import { z } from "zod";
import { tleDataSchema } from "./tle";

export const jobIdSchema = z.union([
  z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER),
  z.string().regex(/^\d{1,20}$/, "Job id must be a decimal integer"),
]);

export const uplinkSchema = z.array(z.number().int().min(0).max(255));

export const jobSubmissionSchema = z.object({
  id: jobIdSchema,
  satellite_id: z.string().min(1).max(200),
  start: z.string().datetime({ offset: true }),
  end: z.string().datetime({ offset: true }),
  tle: tleDataSchema,
  rx_frequency: z.number(),
  tx_frequency: z.number(),
  uplink: uplinkSchema.nullish(),
});

export type JobSubmissionInput = z.infer<typeof jobSubmissionSchema>;
