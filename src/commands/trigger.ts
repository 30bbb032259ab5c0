import path from "path";
import { loadSettings } from "../config/settings";
import { PipelineStarter, SageMakerPipelines } from "../pipeline/sagemaker";
import { handleImageSetEvent, TriggerResult } from "../trigger/handler";
import { readJson } from "../utils/fs";

export interface TriggerOptions {
  eventPath: string;
  pipelineName?: string;
}

/** Replays a saved image set event against the pipeline, as the deployed handler would. */
export async function runTriggerCommand(
  options: TriggerOptions,
  starter?: PipelineStarter
): Promise<TriggerResult> {
  const settings = loadSettings();
  const event = await readJson<unknown>(path.resolve(options.eventPath));

  let ownedPipelines: SageMakerPipelines | null = null;
  let activeStarter: PipelineStarter;
  if (starter) {
    activeStarter = starter;
  } else {
    ownedPipelines = new SageMakerPipelines(settings.region);
    activeStarter = ownedPipelines;
  }

  try {
    const result = await handleImageSetEvent(event, {
      starter: activeStarter,
      pipelineName: options.pipelineName ?? settings.pipelineName,
      datastoreFilter: settings.datastoreFilter
    });
    console.log(JSON.stringify(result, null, 2));
    return result;
  } finally {
    ownedPipelines?.destroy();
  }
}
