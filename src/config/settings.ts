import path from "path";
import { Settings, SettingsSchema } from "./settingsSchema";

type Env = Record<string, string | undefined>;

function envValue(env: Env, ...keys: string[]): string | undefined {
  for (const key of keys) {
    const value = env[key]?.trim();
    if (value) return value;
  }
  return undefined;
}

export function loadSettings(env: Env = process.env): Settings {
  return SettingsSchema.parse({
    region: envValue(env, "AWS_REGION", "AWS_DEFAULT_REGION"),
    processingRoot: envValue(env, "PROCESSING_ROOT"),
    maxFramesPerImageSet: envValue(env, "MAX_FRAMES_PER_IMAGESET"),
    imagingMaxAttempts: envValue(env, "IMAGING_MAX_ATTEMPTS"),
    imagingConnectTimeoutMs: envValue(env, "IMAGING_CONNECT_TIMEOUT_MS"),
    imagingReadTimeoutMs: envValue(env, "IMAGING_READ_TIMEOUT_MS"),
    pipelineName: envValue(env, "PIPELINE_NAME"),
    datastoreFilter: envValue(env, "DATASTORE_ID"),
    processingInstanceType: envValue(env, "PROCESSING_INSTANCE_TYPE"),
    trainingInstanceType: envValue(env, "TRAINING_INSTANCE_TYPE"),
    trainingChannelDir: envValue(env, "SM_CHANNEL_TRAINING"),
    modelDir: envValue(env, "SM_MODEL_DIR"),
    logLevel: envValue(env, "LOG_LEVEL")?.toLowerCase()
  });
}

export function defaultOutputDir(settings: Settings): string {
  return path.join(settings.processingRoot, "output");
}
