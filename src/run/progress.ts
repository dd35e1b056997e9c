export type ClassifyProgressPhase = "roles" | "sinks";

export type ClassifyProgressEvent = {
  phase: ClassifyProgressPhase;
  current: number;
  total: number;
  sinkId?: string;
};

export type ClassifyProgressHandler = (event: ClassifyProgressEvent) => void;
