import { manifestPath } from "./paths";
import { readJson, writeJson } from "../utils/fs";
import { FrameResult, Manifest } from "../types/manifest";

export interface ManifestParams {
  datastoreId: string;
  imageSetId: string;
  totalFrames: number;
  startedAt: string;
  endedAt: string;
  frames: FrameResult[];
}

export function buildManifest(params: ManifestParams): Manifest {
  return {
    datastoreId: params.datastoreId,
    imageSetId: params.imageSetId,
    totalFrames: params.totalFrames,
    startedAt: params.startedAt,
    endedAt: params.endedAt,
    frames: params.frames
  };
}

export async function writeManifest(outputDir: string, manifest: Manifest): Promise<string> {
  const filePath = manifestPath(outputDir);
  await writeJson(filePath, manifest);
  return filePath;
}

export async function readManifest(outputDir: string): Promise<Manifest> {
  return readJson<Manifest>(manifestPath(outputDir));
}
