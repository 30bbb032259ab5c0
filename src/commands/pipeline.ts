import path from "path";
import { loadSettings } from "../config/settings";
import { buildPipelineDefinition, PipelineDefinition } from "../pipeline/definition";
import { SageMakerPipelines } from "../pipeline/sagemaker";
import { writeJson } from "../utils/fs";
import { createLogger } from "../utils/log";

const log = createLogger("pipeline");

export interface PipelineCommandOptions {
  roleArn: string;
  imageUri: string;
  trainingImageUri?: string;
  bucket: string;
  pipelineName?: string;
  region?: string;
  epochs?: number;
  outPath?: string;
  upsert?: boolean;
}

export async function runPipelineCommand(options: PipelineCommandOptions): Promise<PipelineDefinition> {
  const settings = loadSettings();
  const region = options.region ?? settings.region;
  const pipelineName = options.pipelineName ?? settings.pipelineName;

  const definition = buildPipelineDefinition({
    roleArn: options.roleArn,
    imageUri: options.imageUri,
    trainingImageUri: options.trainingImageUri,
    bucket: options.bucket,
    region,
    processingInstanceType: settings.processingInstanceType,
    trainingInstanceType: settings.trainingInstanceType,
    epochs: options.epochs
  });

  if (options.outPath) {
    const outPath = path.resolve(options.outPath);
    await writeJson(outPath, definition);
    log.info(`Wrote pipeline definition to ${outPath}`);
  } else if (!options.upsert) {
    console.log(JSON.stringify(definition, null, 2));
  }

  if (options.upsert) {
    const pipelines = new SageMakerPipelines(region);
    try {
      const outcome = await pipelines.upsert(pipelineName, definition, options.roleArn);
      log.info(`Pipeline ${pipelineName} ${outcome}`);
    } finally {
      pipelines.destroy();
    }
  }

  return definition;
}
