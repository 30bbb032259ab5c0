import path from "path";
import { manifestPath, metadataPath } from "../io/paths";
import { Manifest } from "../types/manifest";
import { fileSize, pathExists, readJson } from "../utils/fs";
import { createLogger } from "../utils/log";
import { formatSchemaErrors, getManifestValidator } from "../validation/jsonSchema";

const log = createLogger("validate");

export interface ValidateOptions {
  outputDir: string;
}

export interface ValidationReport {
  outputDir: string;
  valid: boolean;
  issues: string[];
}

async function checkFrameFiles(outputDir: string, manifest: Manifest): Promise<string[]> {
  const issues: string[] = [];
  if (manifest.frames.length !== manifest.totalFrames) {
    issues.push(
      `manifest lists ${manifest.frames.length} frames but totalFrames is ${manifest.totalFrames}`
    );
  }

  for (const frame of manifest.frames) {
    if (frame.status !== "success") continue;
    const size = await fileSize(path.join(outputDir, frame.filename));
    if (size === null) {
      issues.push(`missing frame file ${frame.filename}`);
    } else if (size !== frame.size) {
      issues.push(`frame file ${frame.filename} has ${size} bytes, manifest says ${frame.size}`);
    }
  }
  return issues;
}

export async function validateOutput(outputDir: string): Promise<ValidationReport> {
  const root = path.resolve(outputDir);
  const issues: string[] = [];

  if (!(await pathExists(metadataPath(root)))) {
    issues.push("missing metadata.json");
  }

  const manifestFile = manifestPath(root);
  if (!(await pathExists(manifestFile))) {
    issues.push("missing manifest.json");
    return { outputDir: root, valid: false, issues };
  }

  let data: unknown;
  try {
    data = await readJson<unknown>(manifestFile);
  } catch (error) {
    if (!(error instanceof SyntaxError)) throw error;
    issues.push(`manifest.json is not valid JSON: ${error.message}`);
    return { outputDir: root, valid: false, issues };
  }

  const validator = getManifestValidator();
  if (!validator(data)) {
    issues.push(...formatSchemaErrors(validator.errors).map((error) => `manifest.json ${error}`));
    return { outputDir: root, valid: false, issues };
  }

  issues.push(...(await checkFrameFiles(root, data)));
  return { outputDir: root, valid: issues.length === 0, issues };
}

export async function runValidate(options: ValidateOptions): Promise<ValidationReport> {
  const report = await validateOutput(options.outputDir);
  if (report.valid) {
    log.info(`${report.outputDir} is a complete fetch output`);
  } else {
    for (const issue of report.issues) {
      log.error(issue);
    }
  }
  return report;
}
