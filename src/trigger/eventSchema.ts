import { z } from "zod";

export const ACTIVE_STATE = "ACTIVE";

export const ImageSetEventDetailSchema = z
  .object({
    imageSetId: z.string().optional(),
    datastoreId: z.string().optional(),
    state: z.string().optional()
  })
  .passthrough();

export const ImageSetEventSchema = z
  .object({
    source: z.string().optional(),
    "detail-type": z.string().optional(),
    detail: ImageSetEventDetailSchema.default({})
  })
  .passthrough();

export type ImageSetEvent = z.infer<typeof ImageSetEventSchema>;
