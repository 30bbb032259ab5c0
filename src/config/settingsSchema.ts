import { z } from "zod";

export const DEFAULT_REGION = "us-east-1";
export const DEFAULT_PIPELINE_NAME = "ahi-mlops-pipeline";

export const SettingsSchema = z.object({
  region: z.string().min(1).default(DEFAULT_REGION),
  processingRoot: z.string().min(1).default("/opt/ml/processing"),
  maxFramesPerImageSet: z.coerce.number().int().min(0).default(0),
  imagingMaxAttempts: z.coerce.number().int().min(1).default(3),
  imagingConnectTimeoutMs: z.coerce.number().int().positive().default(30000),
  imagingReadTimeoutMs: z.coerce.number().int().positive().default(60000),
  pipelineName: z.string().min(1).default(DEFAULT_PIPELINE_NAME),
  datastoreFilter: z.string().min(1).optional(),
  processingInstanceType: z.string().min(1).default("ml.m5.large"),
  trainingInstanceType: z.string().min(1).default("ml.m5.large"),
  trainingChannelDir: z.string().min(1).default("/opt/ml/input/data/training"),
  modelDir: z.string().min(1).default("/opt/ml/model"),
  logLevel: z.enum(["debug", "info", "warn", "error", "silent"]).default("info")
});

export type Settings = z.infer<typeof SettingsSchema>;
