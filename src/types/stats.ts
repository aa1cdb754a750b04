import { z } from "zod";

// Scoreboard entries are loosely typed; fields are coerced one at a time.
export const RunRecordSchema = z
  .object({
    wpm: z.unknown().optional(),
    acc: z.unknown().optional(),
  })
  .passthrough();

export type RunRecord = z.infer<typeof RunRecordSchema>;

export const ScoreboardPayloadSchema = z.array(z.unknown()).nonempty();

export type ScoreboardPayload = z.infer<typeof ScoreboardPayloadSchema>;

export const StatsSummarySchema = z.object({
  bestWpm: z.number().int(),
  averageAccuracy: z.number(),
  accuracySamples: z.number().int().nonnegative(),
});

export type StatsSummary = z.infer<typeof StatsSummarySchema>;

export interface RunSamples {
  wpms: number[];
  accs: number[];
}
