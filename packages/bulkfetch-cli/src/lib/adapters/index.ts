export { realTimerService } from "./real-timers.js";
export { createProcessSignalHandler, INTERRUPTED_EXIT_CODE } from "./process-signals.js";
export { createNodeFetchTransport } from "./node-fetch-transport.js";
export { nodeFileSink } from "./fs-sink.js";
export {
  createProgressReporter,
  createSpinnerProgress,
  createLineProgress,
  createSilentProgress,
} from "./terminal-progress.js";
