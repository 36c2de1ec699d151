export * from "./console";
export * from "./simulated";
export type {
  FeedbackSink,
  LocalizationListener,
  LocalizationService,
  NavigationListener,
  NavigationService,
  OrderReporter,
  StatusChannel,
} from "./types";
