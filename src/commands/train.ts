import path from "path";
import { promises as fs } from "fs";
import { loadSettings } from "../config/settings";
import { Settings } from "../config/settingsSchema";
import { readManifest } from "../io/manifest";
import { manifestPath, modelInfoPath } from "../io/paths";
import { Manifest } from "../types/manifest";
import { listFilesRecursive, pathExists, writeJson } from "../utils/fs";
import { createLogger } from "../utils/log";

const log = createLogger("train");

const LISTED_FILE_LIMIT = 20;

export interface TrainOptions {
  trainingDir?: string;
  modelDir?: string;
  epochs?: number;
}

export interface ModelInfo {
  model_type: "dummy";
  epochs: number;
  status: string;
  file_count: number;
  total_frames: number | null;
}

async function inspectTrainingDir(trainingDir: string): Promise<string[]> {
  if (!(await pathExists(trainingDir))) {
    log.warn(`Training path does not exist: ${trainingDir}`);
    return [];
  }

  const files = await listFilesRecursive(trainingDir);
  log.info(`Found ${files.length} files in training data:`);
  for (const filePath of files.slice(0, LISTED_FILE_LIMIT)) {
    const stat = await fs.stat(filePath);
    log.info(`  - ${path.basename(filePath)} (${stat.size} bytes)`);
  }
  return files;
}

async function readTrainingManifest(trainingDir: string): Promise<Manifest | null> {
  if (!(await pathExists(manifestPath(trainingDir)))) return null;
  const manifest = await readManifest(trainingDir);
  log.info(`Manifest: ${manifest.totalFrames} frames from ImageSet ${manifest.imageSetId}`);
  return manifest;
}

/**
 * Placeholder training stage. Records what the fetch stage produced and writes
 * a dummy model artifact; no model is fitted.
 */
export async function runTrain(
  options: TrainOptions,
  settings: Settings = loadSettings()
): Promise<ModelInfo> {
  const trainingDir = path.resolve(options.trainingDir ?? settings.trainingChannelDir);
  const modelDir = path.resolve(options.modelDir ?? settings.modelDir);
  const epochs = options.epochs ?? 1;

  log.info(`Training data path: ${trainingDir}`);
  const files = await inspectTrainingDir(trainingDir);
  const manifest = files.length > 0 ? await readTrainingManifest(trainingDir) : null;

  log.info(`Running ${epochs} epoch(s) of dummy training...`);
  for (let epoch = 1; epoch <= epochs; epoch += 1) {
    log.info(`Epoch ${epoch}/${epochs} - Loss: 0.${Math.max(9 - epoch + 1, 0)}`);
  }

  const modelInfo: ModelInfo = {
    model_type: "dummy",
    epochs,
    status: "placeholder - replace with real model",
    file_count: files.length,
    total_frames: manifest?.totalFrames ?? null
  };

  const modelPath = modelInfoPath(modelDir);
  await writeJson(modelPath, modelInfo);
  log.info(`Saved dummy model to ${modelPath}`);
  log.info("Training complete!");
  return modelInfo;
}
