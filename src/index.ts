export { runFetch } from "./commands/fetch";
export type { FetchOptions, FetchDependencies } from "./commands/fetch";
export { runTrain } from "./commands/train";
export { validateOutput } from "./commands/validate";
export { MetadataResolver } from "./imaging/metadata";
export { enumerateFrames, limitFrames, FrameFetcher } from "./imaging/frames";
export type { FrameDescriptor } from "./imaging/frames";
export { AwsImagingService, imagingClientConfig } from "./imaging/service";
export type { ImagingService, ImagingClientConfig } from "./imaging/service";
export type { ImageSetMetadata } from "./imaging/metadataSchema";
export { captureFrame, persistFrame } from "./capture/frameCapture";
export { buildPipelineDefinition } from "./pipeline/definition";
export { SageMakerPipelines } from "./pipeline/sagemaker";
export type { PipelineStarter } from "./pipeline/sagemaker";
export { handleImageSetEvent } from "./trigger/handler";
export { handler } from "./trigger/lambda";
export { loadSettings } from "./config/settings";
export { RemoteFetchError, DecodeError, PersistError } from "./errors";
export type { Manifest, FrameResult } from "./types/manifest";
