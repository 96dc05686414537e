export { RenderBuffers } from "./buffers";
export type { BufferSet } from "./buffers";
export { calculateAdaptiveBandCount, createRowBands } from "./chunks";
export type { RowBand } from "./chunks";
export { applyRgbShift } from "./compositing";
export { colorizeField, createPixelBuffer, crushChannel, tunnelBrightness, warpIteration } from "./effects";
export type { ShadingContext } from "./effects";
export { computeIterationGrid, computeIterationRows } from "./escape-time";
export { FrameRenderer } from "./frame-renderer";
export { assertGridShape, InProcessGridComputer, RenderCancelledError, throwIfCancelled } from "./grid-computer";
export type { GridComputeOptions, GridComputer } from "./grid-computer";
export { defaultWorkerFactory, ParallelRenderer } from "./parallel-renderer";
export type { WorkerFactory } from "./parallel-renderer";
export { encodePpm, renderSnapshot } from "./snapshot";
export type { Snapshot, SnapshotRequest } from "./snapshot";
