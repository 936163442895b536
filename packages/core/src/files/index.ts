export {
  DEFAULT_SESSION_PREFIX,
  listLogFiles,
  getLogFileStats,
  rotateLogs,
} from './log-files.js';
export type {
  LogFileInfo,
  ListLogFilesOptions,
  LogFileStats,
  RotateLogsOptions,
  RotationReport,
} from './log-files.js';
export { readSessionEvents } from './read-events.js';
