import { z } from "zod";

export const tleDataSchema = z.object({
  tle0: z.string(),
  tle1: z.string(),
  tle2: z.string(),
});

export type TleDataInput = z.infer<typeof tleDataSchema>;
