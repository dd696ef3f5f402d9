export {
  RngLive,
  HttpLive,
  HttpFrom,
  ArchiveLive,
  ArchiveFrom,
  DatasetsLive,
} from "./layers.js";

export {
  prettyLogger,
  loggingLayer,
  withSpan,
  parseLogLevel,
} from "./logging.js";
