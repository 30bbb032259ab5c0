import { describe, expect, it } from "vitest";
import { enumerateFrames, FrameFetcher, limitFrames } from "../src/imaging/frames";
import { ImageSetMetadataSchema } from "../src/imaging/metadataSchema";
import { RemoteFetchError } from "../src/errors";
import { FakeImagingService, gzipJson, sampleDocument } from "./helpers/fakeImaging";

const metadata = ImageSetMetadataSchema.parse(sampleDocument);

describe("frame enumeration", () => {
  it("flattens series, instances and frames in document order", () => {
    expect(enumerateFrames(metadata)).toEqual([
      { frameId: "f1", seriesId: "series-b", instanceId: "inst-1" },
      { frameId: "f2", seriesId: "series-b", instanceId: "inst-1" },
      { frameId: "f3", seriesId: "series-b", instanceId: "inst-2" },
      { frameId: "f4", seriesId: "series-a", instanceId: "inst-3" }
    ]);
  });

  it("is stable across repeated runs", () => {
    expect(enumerateFrames(metadata)).toEqual(enumerateFrames(metadata));
  });

  it("treats missing levels as having no frames", () => {
    expect(enumerateFrames({})).toEqual([]);
    expect(enumerateFrames({ Study: {} })).toEqual([]);
    expect(enumerateFrames({ Study: { Series: { s: { Instances: { i: {} } } } } })).toEqual([]);
  });

  it("keeps everything for maxFrames 0 and the head for maxFrames N", () => {
    expect(enumerateFrames(metadata, 0)).toHaveLength(4);
    expect(enumerateFrames(metadata, 2).map((frame) => frame.frameId)).toEqual(["f1", "f2"]);
    expect(enumerateFrames(metadata, 10)).toHaveLength(4);
    expect(limitFrames(enumerateFrames(metadata), 1)).toEqual([
      { frameId: "f1", seriesId: "series-b", instanceId: "inst-1" }
    ]);
  });

  it("orders integer-like instance keys ascending, ahead of other keys", () => {
    const parsed = ImageSetMetadataSchema.parse(
      JSON.parse(
        '{"Study": {"Series": {"s": {"Instances": {"10": {"ImageFrames": [{"ID": "a"}]}, "inst": {"ImageFrames": [{"ID": "c"}]}, "2": {"ImageFrames": [{"ID": "b"}]}}}}}}'
      )
    );

    expect(enumerateFrames(parsed).map((frame) => frame.frameId)).toEqual(["b", "a", "c"]);
  });
});

describe("frame fetcher", () => {
  it("returns the payload untouched", async () => {
    const payload = Uint8Array.from([0xff, 0x4f, 0xff, 0x51]);
    const service = new FakeImagingService(gzipJson(sampleDocument), { f1: payload });
    const fetcher = new FrameFetcher(service);

    await expect(fetcher.fetchFrame("ds-test", "is-test", "f1")).resolves.toBe(payload);
    expect(service.frameCalls).toEqual(["f1"]);
  });

  it("wraps remote failures with the frame id", async () => {
    const service = new FakeImagingService(gzipJson(sampleDocument), {
      f1: new Error("ThrottlingException: Rate exceeded")
    });
    const fetcher = new FrameFetcher(service);

    const failure = await fetcher.fetchFrame("ds-test", "is-test", "f1").catch((error: unknown) => error);
    expect(failure).toBeInstanceOf(RemoteFetchError);
    expect(failure).toMatchObject({
      message: "Failed to fetch frame f1: ThrottlingException: Rate exceeded",
      datastoreId: "ds-test",
      imageSetId: "is-test",
      frameId: "f1"
    });
  });
});
