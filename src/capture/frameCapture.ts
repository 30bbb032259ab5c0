import { PersistError } from "../errors";
import { FrameDescriptor, FrameFetcher } from "../imaging/frames";
import { frameFilename, framePath } from "../io/paths";
import { FrameResult, FrameSuccess } from "../types/manifest";
import { writeBinary } from "../utils/fs";
import { sha256 } from "../utils/hash";
import { errorMessage } from "../utils/errors";
import { createLogger } from "../utils/log";

const log = createLogger("capture");

export interface FrameCaptureOptions {
  fetcher: FrameFetcher;
  datastoreId: string;
  imageSetId: string;
  outputDir: string;
}

export async function persistFrame(
  outputDir: string,
  frameData: Uint8Array,
  frame: FrameDescriptor
): Promise<FrameSuccess> {
  const filePath = framePath(outputDir, frame);
  try {
    await writeBinary(filePath, frameData);
  } catch (error) {
    throw new PersistError(`Failed to write ${filePath}: ${errorMessage(error)}`, filePath, error);
  }

  return {
    status: "success",
    frameId: frame.frameId,
    seriesId: frame.seriesId,
    instanceId: frame.instanceId,
    filename: frameFilename(frame),
    size: frameData.byteLength,
    sha256: sha256(frameData)
  };
}

/** Fetches and writes one frame. Never throws: failures come back as error results. */
export async function captureFrame(
  frame: FrameDescriptor,
  options: FrameCaptureOptions
): Promise<FrameResult> {
  try {
    const data = await options.fetcher.fetchFrame(
      options.datastoreId,
      options.imageSetId,
      frame.frameId
    );
    return await persistFrame(options.outputDir, data, frame);
  } catch (error) {
    const message = errorMessage(error);
    log.error(`Frame ${frame.frameId} failed: ${message}`);
    return {
      status: "error",
      frameId: frame.frameId,
      seriesId: frame.seriesId,
      instanceId: frame.instanceId,
      error: message
    };
  }
}
