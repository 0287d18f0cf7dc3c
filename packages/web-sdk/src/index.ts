export { KeyprintApiError, KeyprintClient } from "./client";
export type { FetchLike, KeyprintClientOptions } from "./client";
export { buildKeystrokeSample, createKeystrokeCollector } from "./keystroke";
export type {
  BuildKeystrokeSampleOptions,
  KeystrokeCollector,
  KeystrokeCollectorOptions,
  KeystrokeCollectorSnapshot,
} from "./keystroke";
