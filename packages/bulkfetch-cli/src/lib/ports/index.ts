export type { TimerService } from "./timer.js";
export type { SignalHandler } from "./signal-handler.js";
export type { HttpTransport, HttpGetOptions, HttpResponse } from "./http.js";
export type { FileSink } from "./file-sink.js";
export type { ProgressReporter } from "./progress.js";
