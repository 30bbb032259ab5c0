import { z } from "zod";

// Vendor fields beyond the hierarchy are kept so metadata.json stays verbatim.
export const FrameReferenceSchema = z.object({ ID: z.string().optional() }).passthrough();

export const InstanceSchema = z
  .object({ ImageFrames: z.array(FrameReferenceSchema).optional() })
  .passthrough();

export const SeriesSchema = z
  .object({ Instances: z.record(InstanceSchema).optional() })
  .passthrough();

export const StudySchema = z.object({ Series: z.record(SeriesSchema).optional() }).passthrough();

export const ImageSetMetadataSchema = z.object({ Study: StudySchema.optional() }).passthrough();

export type FrameReference = z.infer<typeof FrameReferenceSchema>;
export type Instance = z.infer<typeof InstanceSchema>;
export type Series = z.infer<typeof SeriesSchema>;
export type ImageSetMetadata = z.infer<typeof ImageSetMetadataSchema>;
