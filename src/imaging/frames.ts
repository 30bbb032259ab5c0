import { RemoteFetchError } from "../errors";
import { errorMessage } from "../utils/errors";
import { ImagingService } from "./service";
import { ImageSetMetadata } from "./metadataSchema";

export interface FrameDescriptor {
  frameId: string;
  seriesId: string;
  instanceId: string;
}

/**
 * Flattens study → series → instance → frame into document order.
 * A missing level contributes no frames; frame references without an ID are skipped.
 * Integer-like series or instance keys follow JavaScript property order
 * (ascending, before string keys) rather than their position in the document.
 * `maxFrames` of 0 keeps everything, otherwise the first `maxFrames` are kept.
 */
export function enumerateFrames(metadata: ImageSetMetadata, maxFrames = 0): FrameDescriptor[] {
  const frames: FrameDescriptor[] = [];
  const series = metadata.Study?.Series ?? {};

  for (const [seriesId, seriesData] of Object.entries(series)) {
    const instances = seriesData.Instances ?? {};
    for (const [instanceId, instanceData] of Object.entries(instances)) {
      for (const frame of instanceData.ImageFrames ?? []) {
        if (!frame.ID) continue;
        frames.push({ frameId: frame.ID, seriesId, instanceId });
      }
    }
  }

  return limitFrames(frames, maxFrames);
}

export function limitFrames(frames: FrameDescriptor[], maxFrames: number): FrameDescriptor[] {
  return maxFrames > 0 ? frames.slice(0, maxFrames) : frames;
}

export class FrameFetcher {
  constructor(private readonly service: ImagingService) {}

  async fetchFrame(datastoreId: string, imageSetId: string, frameId: string): Promise<Uint8Array> {
    try {
      return await this.service.getImageFrame(datastoreId, imageSetId, frameId);
    } catch (error) {
      throw new RemoteFetchError(
        `Failed to fetch frame ${frameId}: ${errorMessage(error)}`,
        datastoreId,
        imageSetId,
        frameId,
        error
      );
    }
  }
}
