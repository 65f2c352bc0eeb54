export { ChunkQueueSource } from "./chunk-queue-source";
export { fromReadable, openFileSource, type FileSourceOptions } from "./readable-source";
export { createTransportSource } from "./transport-source";
