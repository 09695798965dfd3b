import { z } from "zod";

const field = z.unknown().optional();

export const RecordSchema = z.record(z.string(), z.unknown());
export type VendorRecord = z.infer<typeof RecordSchema>;

export const FanStudioFrameSchema = z
  .object({
    type: z.string().optional(),
    source: z.string().optional(),
    message: field,
    Data: RecordSchema.nullish()
  })
  .passthrough();

export const FanStudioEnvelopeSchema = z.object({ Data: RecordSchema.nullish() }).passthrough();

export const NiedFrameSchema = z
  .object({
    type: z.literal("update"),
    data: RecordSchema
  })
  .passthrough();

export const P2PQuakeItemSchema = z
  .object({
    id: field,
    earthquake: z
      .object({
        time: field,
        maxScale: field,
        hypocenter: RecordSchema.nullish()
      })
      .passthrough(),
    issue: z.object({ time: field }).passthrough().nullish()
  })
  .passthrough();

export const TsunamiAreaSchema = z
  .object({
    name: field,
    name_en: field,
    grade: field,
    immediate: field,
    maxHeight: z.object({ description: field, value: field }).passthrough().nullish(),
    firstHeight: z.object({ arrivalTime: field }).passthrough().nullish()
  })
  .passthrough();

export type TsunamiArea = z.infer<typeof TsunamiAreaSchema>;

export const TsunamiItemSchema = z
  .object({
    id: field,
    time: field,
    cancelled: field,
    issue: z.object({ time: field, type: field }).passthrough().nullish(),
    areas: z.array(z.unknown()).nullish()
  })
  .passthrough();
