import {
  GetImageFrameCommand,
  GetImageSetMetadataCommand,
  MedicalImagingClient
} from "@aws-sdk/client-medical-imaging";
import { Settings } from "../config/settingsSchema";

export interface ImagingService {
  /** Returns the gzip-compressed metadata document for an image set. */
  getImageSetMetadata(datastoreId: string, imageSetId: string): Promise<Uint8Array>;
  /** Returns the encoded pixel payload of one frame. */
  getImageFrame(datastoreId: string, imageSetId: string, frameId: string): Promise<Uint8Array>;
}

export interface ImagingClientConfig {
  region: string;
  maxAttempts: number;
  connectTimeoutMs: number;
  readTimeoutMs: number;
}

export function imagingClientConfig(settings: Settings, region?: string): ImagingClientConfig {
  return {
    region: region ?? settings.region,
    maxAttempts: settings.imagingMaxAttempts,
    connectTimeoutMs: settings.imagingConnectTimeoutMs,
    readTimeoutMs: settings.imagingReadTimeoutMs
  };
}

export class AwsImagingService implements ImagingService {
  private client: MedicalImagingClient;

  constructor(config: ImagingClientConfig) {
    this.client = new MedicalImagingClient({
      region: config.region,
      maxAttempts: config.maxAttempts,
      retryMode: "adaptive",
      requestHandler: {
        connectionTimeout: config.connectTimeoutMs,
        requestTimeout: config.readTimeoutMs
      }
    });
  }

  async getImageSetMetadata(datastoreId: string, imageSetId: string): Promise<Uint8Array> {
    const response = await this.client.send(
      new GetImageSetMetadataCommand({ datastoreId, imageSetId })
    );
    if (!response.imageSetMetadataBlob) {
      throw new Error(`GetImageSetMetadata returned no body for ${imageSetId}`);
    }
    return response.imageSetMetadataBlob.transformToByteArray();
  }

  async getImageFrame(datastoreId: string, imageSetId: string, frameId: string): Promise<Uint8Array> {
    const response = await this.client.send(
      new GetImageFrameCommand({
        datastoreId,
        imageSetId,
        imageFrameInformation: { imageFrameId: frameId }
      })
    );
    if (!response.imageFrameBlob) {
      throw new Error(`GetImageFrame returned no body for ${frameId}`);
    }
    return response.imageFrameBlob.transformToByteArray();
  }

  destroy(): void {
    this.client.destroy();
  }
}
