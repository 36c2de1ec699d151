export {
  DEFAULT_CUE_FILES,
  type LoggingFeedbackSink,
  type LoggingFeedbackSinkConfig,
  createLoggingFeedbackSink,
} from "./feedback-sink";
