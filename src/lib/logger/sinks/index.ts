// Built-in sinks
export { ArraySink } from './array';
export {
  ConsoleSink,
  formatConsoleLine,
  processOutput,
  type ConsoleOutput,
  type ConsoleSinkOptions,
} from './console';
export { FileSink, FileSinkError, type FileSinkOptions } from './file';
