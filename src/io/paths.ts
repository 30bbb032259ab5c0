import path from "path";
import { FrameDescriptor } from "../imaging/frames";

export const FRAME_EXTENSION = ".htj2k";

export function metadataPath(outputDir: string): string {
  return path.join(outputDir, "metadata.json");
}

export function manifestPath(outputDir: string): string {
  return path.join(outputDir, "manifest.json");
}

export function frameFilename(frame: FrameDescriptor): string {
  return `${frame.seriesId}_${frame.instanceId}_${frame.frameId}${FRAME_EXTENSION}`;
}

export function framePath(outputDir: string, frame: FrameDescriptor): string {
  return path.join(outputDir, frameFilename(frame));
}

export function modelInfoPath(modelDir: string): string {
  return path.join(modelDir, "model_info.json");
}
