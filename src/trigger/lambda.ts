import { loadSettings } from "../config/settings";
import { SageMakerPipelines } from "../pipeline/sagemaker";
import { setLogLevel } from "../utils/log";
import { handleImageSetEvent, TriggerResult } from "./handler";

let pipelines: SageMakerPipelines | null = null;

// Entry point for the event rule target; the client is reused across warm invocations.
export async function handler(event: unknown): Promise<TriggerResult> {
  const settings = loadSettings();
  setLogLevel(settings.logLevel);
  if (!pipelines) {
    pipelines = new SageMakerPipelines(settings.region);
  }
  return handleImageSetEvent(event, {
    starter: pipelines,
    pipelineName: settings.pipelineName,
    datastoreFilter: settings.datastoreFilter
  });
}
