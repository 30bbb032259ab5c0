import { randomUUID } from "crypto";
import {
  CreatePipelineCommand,
  DescribePipelineCommand,
  ResourceNotFound,
  SageMakerClient,
  StartPipelineExecutionCommand,
  UpdatePipelineCommand
} from "@aws-sdk/client-sagemaker";
import { PipelineDefinition } from "./definition";

export interface PipelineExecutionRequest {
  pipelineName: string;
  parameters: Record<string, string>;
  description: string;
}

export interface PipelineStarter {
  /** Returns the execution ARN. */
  startExecution(request: PipelineExecutionRequest): Promise<string>;
}

export type UpsertOutcome = "created" | "updated";

export class SageMakerPipelines implements PipelineStarter {
  private client: SageMakerClient;

  constructor(region: string) {
    this.client = new SageMakerClient({ region });
  }

  async startExecution(request: PipelineExecutionRequest): Promise<string> {
    const response = await this.client.send(
      new StartPipelineExecutionCommand({
        PipelineName: request.pipelineName,
        PipelineParameters: Object.entries(request.parameters).map(([Name, Value]) => ({
          Name,
          Value
        })),
        PipelineExecutionDescription: request.description
      })
    );
    if (!response.PipelineExecutionArn) {
      throw new Error(`StartPipelineExecution returned no ARN for ${request.pipelineName}`);
    }
    return response.PipelineExecutionArn;
  }

  async upsert(
    pipelineName: string,
    definition: PipelineDefinition,
    roleArn: string
  ): Promise<UpsertOutcome> {
    const body = JSON.stringify(definition);
    if (await this.exists(pipelineName)) {
      await this.client.send(
        new UpdatePipelineCommand({
          PipelineName: pipelineName,
          PipelineDefinition: body,
          RoleArn: roleArn
        })
      );
      return "updated";
    }

    await this.client.send(
      new CreatePipelineCommand({
        PipelineName: pipelineName,
        PipelineDefinition: body,
        RoleArn: roleArn,
        ClientRequestToken: randomUUID()
      })
    );
    return "created";
  }

  destroy(): void {
    this.client.destroy();
  }

  private async exists(pipelineName: string): Promise<boolean> {
    try {
      await this.client.send(new DescribePipelineCommand({ PipelineName: pipelineName }));
      return true;
    } catch (error) {
      if (error instanceof ResourceNotFound) return false;
      throw error;
    }
  }
}
