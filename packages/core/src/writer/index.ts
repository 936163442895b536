export { BoundedQueue } from './bounded-queue.js';
export type { PushResult } from './bounded-queue.js';
export { FileSink } from './sink.js';
export type { Sink, FileSinkOptions } from './sink.js';
export { DurableWriter } from './durable-writer.js';
export type {
  WriterState,
  QueueEntry,
  DurableWriterOptions,
  WriterStats,
  DrainReport,
} from './durable-writer.js';
