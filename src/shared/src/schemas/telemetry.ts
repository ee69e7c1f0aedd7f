import { z } from "zod";

export const telemetryPayloadSchema = z.union([
  z.array(z.number().int().min(0).max(255)),
  z.string().base64(),
]);

export const telemetryEnvelopeSchema = z.object({
  ground_station_id: z.string().min(1).max(200),
  timestamp: z.string().datetime({ offset: true }),
  payload: telemetryPayloadSchema,
});

export const telemetryRecordSchema = z.object({
  id: z.string().min(1).optional(),
  timestamp: z.number().int(),
  temperature: z.number(),
  voltage: z.number(),
  current: z.number(),
  battery_level: z.number().int(),
});

export type TelemetryEnvelopeInput = z.infer<typeof telemetryEnvelopeSchema>;
export type TelemetryRecordInput = z.infer<typeof telemetryRecordSchema>;
