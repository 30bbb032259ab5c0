import { Command, InvalidArgumentError } from "commander";
import pkg from "../../package.json";
import { runFetch } from "../commands/fetch";
import { runTrain } from "../commands/train";
import { runTriggerCommand } from "../commands/trigger";
import { runPipelineCommand } from "../commands/pipeline";
import { runValidate } from "../commands/validate";
import { Settings } from "../config/settingsSchema";
import { ImagingService } from "../imaging/service";
import { PipelineStarter } from "../pipeline/sagemaker";
import { createLogger } from "../utils/log";
import { errorMessage, errorStack } from "../utils/errors";

const log = createLogger("cli");

export interface CliDependencies {
  envPath?: string;
  settings?: Settings;
  imagingService?: ImagingService;
  pipelineStarter?: PipelineStarter;
}

interface FetchCliOptions {
  datastoreId: string;
  imageSetId: string;
  outputDir?: string;
  maxFrames?: number;
  region?: string;
}

interface TrainCliOptions {
  training?: string;
  modelDir?: string;
  epochs: number;
}

interface TriggerCliOptions {
  event: string;
  pipelineName?: string;
}

interface PipelineCliOptions {
  roleArn: string;
  imageUri: string;
  trainingImageUri?: string;
  bucket: string;
  pipelineName?: string;
  region?: string;
  epochs: number;
  out?: string;
  upsert?: boolean;
}

function nonNegativeInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError("Expected a non-negative integer.");
  }
  return parsed;
}

function positiveInt(value: string): number {
  const parsed = nonNegativeInt(value);
  if (parsed === 0) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
}

/**
 * Runs one command line (without the node and script entries) and resolves to
 * the process exit code. Unhandled command errors are logged with their stack
 * and give 1.
 */
export async function runCli(argv: string[], deps: CliDependencies = {}): Promise<number> {
  let exitCode = 0;
  const program = new Command();

  program
    .name("imaging-pipeline")
    .description("Fetch HealthImaging frames and drive the fetch → train pipeline")
    .version(pkg.version);

  program.option(
    "--env-file <path>",
    "Path to .env file (overrides IMAGING_PIPELINE_ENV_FILE/DOTENV_CONFIG_PATH)",
    deps.envPath
  );

  program
    .command("fetch")
    .description("Fetch every frame of an image set into an output directory")
    .requiredOption("--datastore-id <id>", "HealthImaging datastore ID")
    .requiredOption("--image-set-id <id>", "HealthImaging image set ID")
    .option("--output-dir <dir>", "Output directory (default: <PROCESSING_ROOT>/output)")
    .option("--max-frames <n>", "Maximum number of frames to fetch (0 = all)", nonNegativeInt)
    .option("--region <region>", "AWS region for HealthImaging")
    .action(async (opts: FetchCliOptions) => {
      await runFetch(
        {
          datastoreId: opts.datastoreId,
          imageSetId: opts.imageSetId,
          outputDir: opts.outputDir,
          maxFrames: opts.maxFrames,
          region: opts.region
        },
        { settings: deps.settings, service: deps.imagingService }
      );
    });

  program
    .command("train")
    .description("Placeholder training stage over a fetch output directory")
    .option("--training <dir>", "Training data directory (default: SM_CHANNEL_TRAINING)")
    .option("--model-dir <dir>", "Model output directory (default: SM_MODEL_DIR)")
    .option("--epochs <n>", "Number of epochs", positiveInt, 1)
    .action(async (opts: TrainCliOptions) => {
      await runTrain(
        { trainingDir: opts.training, modelDir: opts.modelDir, epochs: opts.epochs },
        deps.settings
      );
    });

  program
    .command("trigger")
    .description("Start a pipeline execution from a saved image set state change event")
    .requiredOption("--event <path>", "Path to the event JSON")
    .option("--pipeline-name <name>", "Pipeline to start (default: PIPELINE_NAME)")
    .action(async (opts: TriggerCliOptions) => {
      const result = await runTriggerCommand(
        { eventPath: opts.event, pipelineName: opts.pipelineName },
        deps.pipelineStarter
      );
      if (result.statusCode !== 200) {
        exitCode = 1;
      }
    });

  program
    .command("pipeline")
    .description("Render the fetch → train pipeline definition, optionally creating or updating it")
    .requiredOption("--role-arn <arn>", "Execution role ARN")
    .requiredOption("--image-uri <uri>", "Container image that runs this CLI")
    .option("--training-image-uri <uri>", "Container image for the training step (default: --image-uri)")
    .requiredOption("--bucket <name>", "Bucket for pipeline artifacts")
    .option("--pipeline-name <name>", "Pipeline name (default: PIPELINE_NAME)")
    .option("--region <region>", "AWS region")
    .option("--epochs <n>", "Training epochs", positiveInt, 1)
    .option("--out <path>", "Write the definition JSON here instead of stdout")
    .option("--upsert", "Create or update the pipeline")
    .action(async (opts: PipelineCliOptions) => {
      await runPipelineCommand({
        roleArn: opts.roleArn,
        imageUri: opts.imageUri,
        trainingImageUri: opts.trainingImageUri,
        bucket: opts.bucket,
        pipelineName: opts.pipelineName,
        region: opts.region,
        epochs: opts.epochs,
        outPath: opts.out,
        upsert: opts.upsert
      });
    });

  program
    .command("validate")
    .description("Check a fetch output directory against its manifest")
    .requiredOption("--output-dir <dir>", "Fetch output directory")
    .action(async (opts: { outputDir: string }) => {
      const report = await runValidate({ outputDir: opts.outputDir });
      if (!report.valid) {
        exitCode = 1;
      }
    });

  try {
    await program.parseAsync(argv, { from: "user" });
  } catch (error) {
    log.error(errorStack(error) ?? errorMessage(error));
    return 1;
  }
  return exitCode;
}
