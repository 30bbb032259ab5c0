import { beforeAll, describe, expect, it } from "vitest";
import { promises as fs } from "fs";
import path from "path";
import { captureFrame, persistFrame } from "../src/capture/frameCapture";
import { FrameFetcher } from "../src/imaging/frames";
import { sha256 } from "../src/utils/hash";
import { setLogLevel } from "../src/utils/log";
import { FakeImagingService, gzipJson, makeTempDir, sampleDocument } from "./helpers/fakeImaging";

const frame = { frameId: "f9", seriesId: "s1", instanceId: "i1" };

describe("frame persistence", () => {
  beforeAll(() => {
    setLogLevel("silent");
  });

  it("names the file after series, instance and frame and creates the directory", async () => {
    const root = await makeTempDir("persist");
    const outputDir = path.join(root, "nested", "out");
    const data = Uint8Array.from([1, 2, 3, 4]);

    const result = await persistFrame(outputDir, data, frame);

    expect(result).toEqual({
      status: "success",
      frameId: "f9",
      seriesId: "s1",
      instanceId: "i1",
      filename: "s1_i1_f9.htj2k",
      size: 4,
      sha256: sha256(data)
    });
    expect([...(await fs.readFile(path.join(outputDir, "s1_i1_f9.htj2k")))]).toEqual([1, 2, 3, 4]);
  });

  it("turns a write failure into an error result", async () => {
    const root = await makeTempDir("persist-blocked");
    const blocker = path.join(root, "blocker");
    await fs.writeFile(blocker, "not a directory");
    const fetcher = new FrameFetcher(
      new FakeImagingService(gzipJson(sampleDocument), { f9: Buffer.from("pixels") })
    );

    const result = await captureFrame(frame, {
      fetcher,
      datastoreId: "ds-test",
      imageSetId: "is-test",
      outputDir: blocker
    });

    const prefix = `Failed to write ${path.join(blocker, "s1_i1_f9.htj2k")}: `;
    expect(result.status).toBe("error");
    expect(result).not.toHaveProperty("filename");
    expect(result.status === "error" && result.error.startsWith(prefix)).toBe(true);
  });

  it("turns a fetch failure into an error result", async () => {
    const fetcher = new FrameFetcher(new FakeImagingService(gzipJson(sampleDocument)));

    const result = await captureFrame(frame, {
      fetcher,
      datastoreId: "ds-test",
      imageSetId: "is-test",
      outputDir: await makeTempDir("persist-missing")
    });

    expect(result).toEqual({
      status: "error",
      frameId: "f9",
      seriesId: "s1",
      instanceId: "i1",
      error: "Failed to fetch frame f9: ResourceNotFoundException: f9"
    });
  });
});
