export const FETCH_STEP_NAME = "FetchImageData";
export const TRAIN_STEP_NAME = "TrainModel";
export const PROCESSING_OUTPUT_DIR = "/opt/ml/processing/output";

export interface PipelineDefinitionParams {
  roleArn: string;
  imageUri: string;
  /** Defaults to `imageUri`: the same container runs the `train` command. */
  trainingImageUri?: string;
  bucket: string;
  region: string;
  processingInstanceType: string;
  trainingInstanceType: string;
  epochs?: number;
}

export interface ParameterRef {
  Get: string;
}

type ContainerArgument = string | ParameterRef;

export interface PipelineParameter {
  Name: string;
  Type: "String";
  DefaultValue: string;
}

export interface PipelineStep {
  Name: string;
  Type: "Processing" | "Training";
  Arguments: Record<string, unknown>;
  DependsOn?: string[];
}

export interface PipelineDefinition {
  Version: "2020-12-01";
  Metadata: Record<string, never>;
  Parameters: PipelineParameter[];
  Steps: PipelineStep[];
}

function parameter(name: string): ParameterRef {
  return { Get: `Parameters.${name}` };
}

function fetchStep(params: PipelineDefinitionParams): PipelineStep {
  const containerArguments: ContainerArgument[] = [
    "fetch",
    "--datastore-id",
    parameter("DatastoreId"),
    "--image-set-id",
    parameter("ImageSetId"),
    "--output-dir",
    PROCESSING_OUTPUT_DIR,
    "--region",
    params.region
  ];

  return {
    Name: FETCH_STEP_NAME,
    Type: "Processing",
    Arguments: {
      ProcessingResources: {
        ClusterConfig: {
          InstanceType: params.processingInstanceType,
          InstanceCount: 1,
          VolumeSizeInGB: 30
        }
      },
      AppSpecification: {
        ImageUri: params.imageUri,
        ContainerArguments: containerArguments
      },
      RoleArn: params.roleArn,
      Environment: { AWS_REGION: params.region },
      ProcessingOutputConfig: {
        Outputs: [
          {
            OutputName: "output",
            AppManaged: false,
            S3Output: {
              S3Uri: `s3://${params.bucket}/pipeline-output/fetched-data`,
              LocalPath: PROCESSING_OUTPUT_DIR,
              S3UploadMode: "EndOfJob"
            }
          }
        ]
      }
    }
  };
}

function trainStep(params: PipelineDefinitionParams): PipelineStep {
  return {
    Name: TRAIN_STEP_NAME,
    Type: "Training",
    Arguments: {
      AlgorithmSpecification: {
        TrainingImage: params.trainingImageUri ?? params.imageUri,
        TrainingInputMode: "File",
        ContainerArguments: ["train"]
      },
      HyperParameters: { epochs: String(params.epochs ?? 1) },
      OutputDataConfig: { S3OutputPath: `s3://${params.bucket}/pipeline-output/model` },
      ResourceConfig: {
        InstanceCount: 1,
        InstanceType: params.trainingInstanceType,
        VolumeSizeInGB: 30
      },
      RoleArn: params.roleArn,
      StoppingCondition: { MaxRuntimeInSeconds: 86400 },
      InputDataConfig: [
        {
          ChannelName: "training",
          ContentType: "application/octet-stream",
          DataSource: {
            S3DataSource: {
              S3DataType: "S3Prefix",
              S3DataDistributionType: "FullyReplicated",
              S3Uri: {
                Get: `Steps.${FETCH_STEP_NAME}.ProcessingOutputConfig.Outputs['output'].S3Output.S3Uri`
              }
            }
          }
        }
      ]
    }
  };
}

/** Two-step definition: fetch frames in a processing job, then hand the output to training. */
export function buildPipelineDefinition(params: PipelineDefinitionParams): PipelineDefinition {
  return {
    Version: "2020-12-01",
    Metadata: {},
    Parameters: [
      { Name: "ImageSetId", Type: "String", DefaultValue: "" },
      { Name: "DatastoreId", Type: "String", DefaultValue: "" }
    ],
    Steps: [fetchStep(params), trainStep(params)]
  };
}
