import path from "path";
import { loadSettings, defaultOutputDir } from "../config/settings";
import { Settings } from "../config/settingsSchema";
import { PersistError } from "../errors";
import { captureFrame } from "../capture/frameCapture";
import { enumerateFrames, FrameFetcher, limitFrames } from "../imaging/frames";
import { MetadataResolver } from "../imaging/metadata";
import { AwsImagingService, ImagingService, imagingClientConfig } from "../imaging/service";
import { buildManifest, writeManifest } from "../io/manifest";
import { metadataPath } from "../io/paths";
import { FrameResult, Manifest } from "../types/manifest";
import { ensureDir, writeJson } from "../utils/fs";
import { errorMessage } from "../utils/errors";
import { createLogger } from "../utils/log";
import { nowUtcIsoSeconds } from "../utils/time";

const log = createLogger("fetch");

export interface FetchOptions {
  datastoreId: string;
  imageSetId: string;
  outputDir?: string;
  maxFrames?: number;
  region?: string;
}

export interface FetchDependencies {
  settings?: Settings;
  service?: ImagingService;
}

export async function runFetch(
  options: FetchOptions,
  deps: FetchDependencies = {}
): Promise<Manifest> {
  const settings = deps.settings ?? loadSettings();
  const outputDir = path.resolve(options.outputDir ?? defaultOutputDir(settings));
  const maxFrames = options.maxFrames ?? settings.maxFramesPerImageSet;

  try {
    await ensureDir(outputDir);
  } catch (error) {
    throw new PersistError(
      `Cannot create output directory ${outputDir}: ${errorMessage(error)}`,
      outputDir,
      error
    );
  }

  log.info(`Starting fetch for ImageSet: ${options.imageSetId}`);
  log.info(`Datastore: ${options.datastoreId}`);
  log.info(`Output directory: ${outputDir}`);

  let ownedService: AwsImagingService | null = null;
  let service: ImagingService;
  if (deps.service) {
    service = deps.service;
  } else {
    ownedService = new AwsImagingService(imagingClientConfig(settings, options.region));
    service = ownedService;
  }

  try {
    const startedAt = nowUtcIsoSeconds();
    const resolver = new MetadataResolver(service);
    const { metadata, document } = await resolver.resolve(options.datastoreId, options.imageSetId);

    const metadataFile = metadataPath(outputDir);
    await writeJson(metadataFile, document);
    log.info(`Saved metadata to ${metadataFile}`);

    const frames = enumerateFrames(metadata);
    log.info(`Found ${frames.length} image frames`);
    const selected = limitFrames(frames, maxFrames);
    if (selected.length < frames.length) {
      log.info(`Limited to ${maxFrames} frames`);
    }

    const fetcher = new FrameFetcher(service);
    const results: FrameResult[] = [];
    for (const [index, frame] of selected.entries()) {
      log.info(`Fetching frame ${index + 1}/${selected.length}: ${frame.frameId}`);
      results.push(
        await captureFrame(frame, {
          fetcher,
          datastoreId: options.datastoreId,
          imageSetId: options.imageSetId,
          outputDir
        })
      );
    }

    const manifest = buildManifest({
      datastoreId: options.datastoreId,
      imageSetId: options.imageSetId,
      totalFrames: selected.length,
      startedAt,
      endedAt: nowUtcIsoSeconds(),
      frames: results
    });
    const manifestFile = await writeManifest(outputDir, manifest);
    log.info(`Saved manifest to ${manifestFile}`);

    const failed = results.filter((result) => result.status === "error").length;
    log.info(`Fetch complete. ${results.length} frames processed, ${failed} failed.`);
    return manifest;
  } finally {
    ownedService?.destroy();
  }
}
