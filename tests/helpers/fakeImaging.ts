import { gzipSync } from "zlib";
import { promises as fs } from "fs";
import os from "os";
import path from "path";
import { ImagingService } from "../../src/imaging/service";

export const sampleDocument = {
  SchemaVersion: "1.1",
  DatastoreID: "ds-test",
  ImageSetID: "is-test",
  Patient: { DICOM: { PatientID: "patient-0" } },
  Study: {
    DICOM: { StudyDescription: "test study" },
    Series: {
      "series-b": {
        Instances: {
          "inst-1": { ImageFrames: [{ ID: "f1" }, { ID: "f2" }] },
          "inst-2": { ImageFrames: [{ ID: "f3" }] }
        }
      },
      "series-a": {
        Instances: {
          "inst-3": { ImageFrames: [{ ID: "f4" }, { PixelDataChecksumFromBaseToFullResolution: [] }] }
        }
      },
      "series-empty": {}
    }
  }
};

export function gzipJson(document: unknown): Uint8Array {
  return gzipSync(Buffer.from(JSON.stringify(document), "utf8"));
}

export class FakeImagingService implements ImagingService {
  metadataCalls = 0;
  frameCalls: string[] = [];

  constructor(
    private readonly metadata: Uint8Array | Error,
    private readonly frames: Record<string, Uint8Array | Error> = {}
  ) {}

  async getImageSetMetadata(): Promise<Uint8Array> {
    this.metadataCalls += 1;
    if (this.metadata instanceof Error) throw this.metadata;
    return this.metadata;
  }

  async getImageFrame(_datastoreId: string, _imageSetId: string, frameId: string): Promise<Uint8Array> {
    this.frameCalls.push(frameId);
    const frame = this.frames[frameId];
    if (frame === undefined) throw new Error(`ResourceNotFoundException: ${frameId}`);
    if (frame instanceof Error) throw frame;
    return frame;
  }
}

export async function makeTempDir(prefix: string): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), `${prefix}-`));
}
