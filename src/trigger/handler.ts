import { PipelineStarter } from "../pipeline/sagemaker";
import { createLogger } from "../utils/log";
import { ACTIVE_STATE, ImageSetEventSchema } from "./eventSchema";

const log = createLogger("trigger");

export interface TriggerContext {
  starter: PipelineStarter;
  pipelineName: string;
  /** When set, events from other datastores are ignored. */
  datastoreFilter?: string;
}

export interface TriggerResult {
  statusCode: 200 | 400;
  body: string;
  started: boolean;
}

function ignored(body: string): TriggerResult {
  log.info(body);
  return { statusCode: 200, body, started: false };
}

export async function handleImageSetEvent(
  event: unknown,
  context: TriggerContext
): Promise<TriggerResult> {
  log.debug(`Received event: ${JSON.stringify(event)}`);

  const parsed = ImageSetEventSchema.safeParse(event);
  if (!parsed.success) {
    log.warn("Event is not an object with a detail section");
    return { statusCode: 400, body: "Invalid event", started: false };
  }

  const { imageSetId, datastoreId, state } = parsed.data.detail;
  if (!imageSetId || !datastoreId) {
    log.warn("Missing imageSetId or datastoreId in event");
    return { statusCode: 400, body: "Missing required parameters", started: false };
  }

  if (state !== undefined && state !== ACTIVE_STATE) {
    return ignored(`Ignored image set state ${state}`);
  }

  if (context.datastoreFilter && context.datastoreFilter !== datastoreId) {
    return ignored(`Ignored datastore ${datastoreId}`);
  }

  const executionArn = await context.starter.startExecution({
    pipelineName: context.pipelineName,
    parameters: { ImageSetId: imageSetId, DatastoreId: datastoreId },
    description: `Triggered by ImageSet ${imageSetId}`
  });

  log.info(`Started pipeline execution: ${executionArn}`);
  return { statusCode: 200, body: executionArn, started: true };
}
