export interface FrameSuccess {
  status: "success";
  frameId: string;
  seriesId: string;
  instanceId: string;
  filename: string;
  size: number;
  sha256: string;
}

export interface FrameFailure {
  status: "error";
  frameId: string;
  seriesId: string;
  instanceId: string;
  error: string;
}

export type FrameResult = FrameSuccess | FrameFailure;

export interface Manifest {
  datastoreId: string;
  imageSetId: string;
  totalFrames: number;
  startedAt: string;
  endedAt: string;
  frames: FrameResult[];
}
