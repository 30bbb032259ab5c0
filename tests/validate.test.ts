import { beforeAll, describe, expect, it } from "vitest";
import { promises as fs } from "fs";
import path from "path";
import { runFetch } from "../src/commands/fetch";
import { validateOutput } from "../src/commands/validate";
import { loadSettings } from "../src/config/settings";
import { readJson, writeJson } from "../src/utils/fs";
import { setLogLevel } from "../src/utils/log";
import { FakeImagingService, gzipJson, makeTempDir, sampleDocument } from "./helpers/fakeImaging";

async function fetchInto(prefix: string): Promise<string> {
  const outputDir = await makeTempDir(prefix);
  const service = new FakeImagingService(gzipJson(sampleDocument), {
    f1: Buffer.from("one"),
    f2: new Error("InternalServerException"),
    f3: Buffer.from("three")
  });
  await runFetch(
    { datastoreId: "ds-test", imageSetId: "is-test", outputDir, maxFrames: 3 },
    { settings: loadSettings({}), service }
  );
  return outputDir;
}

describe("output validation", () => {
  beforeAll(() => {
    setLogLevel("silent");
  });

  it("accepts a completed fetch output", async () => {
    const outputDir = await fetchInto("validate-ok");

    expect(await validateOutput(outputDir)).toEqual({ outputDir, valid: true, issues: [] });
  });

  it("reports a frame file that went missing", async () => {
    const outputDir = await fetchInto("validate-missing");
    await fs.rm(path.join(outputDir, "series-b_inst-1_f1.htj2k"));

    const report = await validateOutput(outputDir);
    expect(report.valid).toBe(false);
    expect(report.issues).toEqual(["missing frame file series-b_inst-1_f1.htj2k"]);
  });

  it("reports a truncated frame file", async () => {
    const outputDir = await fetchInto("validate-size");
    await fs.writeFile(path.join(outputDir, "series-b_inst-2_f3.htj2k"), "th");

    const report = await validateOutput(outputDir);
    expect(report.issues).toEqual([
      "frame file series-b_inst-2_f3.htj2k has 2 bytes, manifest says 5"
    ]);
  });

  it("reports a frame count that disagrees with totalFrames", async () => {
    const outputDir = await fetchInto("validate-count");
    const manifestFile = path.join(outputDir, "manifest.json");
    const manifest = await readJson<Record<string, unknown>>(manifestFile);
    await writeJson(manifestFile, { ...manifest, totalFrames: 5 });

    const report = await validateOutput(outputDir);
    expect(report.issues).toEqual(["manifest lists 3 frames but totalFrames is 5"]);
  });

  it("rejects a manifest that breaks the schema", async () => {
    const outputDir = await fetchInto("validate-schema");
    const manifestFile = path.join(outputDir, "manifest.json");
    const manifest = await readJson<Record<string, unknown>>(manifestFile);
    await writeJson(manifestFile, { ...manifest, imageSetId: "" });

    const report = await validateOutput(outputDir);
    expect(report.valid).toBe(false);
    expect(report.issues).toContain("manifest.json /imageSetId must NOT have fewer than 1 characters");
  });

  it("reports a manifest that is not valid JSON", async () => {
    const outputDir = await fetchInto("validate-truncated");
    const truncated = '{"datastoreId": "ds-test", "frames": [';
    await fs.writeFile(path.join(outputDir, "manifest.json"), truncated);

    let parseMessage = "";
    try {
      JSON.parse(truncated);
    } catch (error) {
      if (error instanceof SyntaxError) parseMessage = error.message;
    }

    expect(await validateOutput(outputDir)).toEqual({
      outputDir,
      valid: false,
      issues: [`manifest.json is not valid JSON: ${parseMessage}`]
    });
  });

  it("reports an empty directory", async () => {
    const outputDir = await makeTempDir("validate-empty");

    expect(await validateOutput(outputDir)).toEqual({
      outputDir,
      valid: false,
      issues: ["missing metadata.json", "missing manifest.json"]
    });
  });
});
