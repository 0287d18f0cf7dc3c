import type {
  KeystrokeEvent,
  KeystrokeFeatures,
  KeystrokeSample,
} from "../contracts/keystroke";
import { KEYSTROKE_FEATURE_KEYS } from "../contracts/keystroke";
import type { ResolvedKeystroke } from "../contracts/auth";
import { clamp, isFiniteNumber, isRecord, toRounded } from "./numeric";

type SeriesSummary = {
  mean: number;
  std: number;
  trimmed: boolean;
};

type KeyPress = {
  down: number;
  up: number;
};

const TRIM_LOWER_QUANTILE = 0.05;
const TRIM_UPPER_QUANTILE = 0.95;
const TRIM_MIN_VALUES = 10;

const IGNORED_KEYS = new Set(["Shift", "Control", "Alt", "Meta", "CapsLock", "NumLock"]);

function toCount(value: unknown): number {
  if (!isFiniteNumber(value) || value <= 0) return 0;
  return Math.round(value);
}

function summarizeSeries(values: number[]): SeriesSummary {
  let sorted = values.filter((value) => value >= 0).sort((a, b) => a - b);
  if (sorted.length === 0) return { mean: 0, std: 0, trimmed: false };

  let trimmed = false;
  if (sorted.length >= TRIM_MIN_VALUES) {
    const from = Math.floor(sorted.length * TRIM_LOWER_QUANTILE);
    const to = Math.ceil(sorted.length * TRIM_UPPER_QUANTILE);
    const kept = sorted.slice(from, to);
    if (kept.length >= 3 && kept.length < sorted.length) {
      sorted = kept;
      trimmed = true;
    }
  }

  const mean = sorted.reduce((sum, value) => sum + value, 0) / sorted.length;
  const variance =
    sorted.length < 2
      ? 0
      : sorted.reduce((sum, value) => sum + (value - mean) ** 2, 0) / sorted.length;

  return {
    mean: toRounded(mean),
    std: toRounded(Math.sqrt(variance)),
    trimmed,
  };
}

function isUsableEvent(event: KeystrokeEvent): boolean {
  if (event.type !== "down" && event.type !== "up") return false;
  if (!isFiniteNumber(event.t) || event.t < 0) return false;
  if (event.isRepeat) return false;
  if (event.key && event.key.length > 1 && IGNORED_KEYS.has(event.key)) return false;
  return true;
}

function pressToken(event: KeystrokeEvent): string {
  const index = isFiniteNumber(event.expectedIndex) ? String(event.expectedIndex) : "-";
  const location = isFiniteNumber(event.location) ? String(event.location) : "-";
  return [event.code ?? "", event.key ?? "", index, location].join("|");
}

function orderedEvents(events: KeystrokeEvent[]): KeystrokeEvent[] {
  // a down and an up sharing a timestamp: the down comes first
  return events.filter(isUsableEvent).sort((left, right) => {
    if (left.t !== right.t) return left.t - right.t;
    if (left.type === right.type) return 0;
    return left.type === "down" ? -1 : 1;
  });
}

function pairPresses(events: KeystrokeEvent[]): KeyPress[] {
  const pending = new Map<string, number[]>();
  const presses: KeyPress[] = [];

  for (const event of orderedEvents(events)) {
    const token = pressToken(event);
    const queue = pending.get(token) ?? [];

    if (event.type === "down") {
      queue.push(event.t);
      pending.set(token, queue);
      continue;
    }

    const down = queue.shift();
    if (down === undefined || event.t < down) continue;
    presses.push({ down, up: event.t });
  }

  return presses.sort((left, right) => left.down - right.down);
}

function intervals(presses: KeyPress[]): { hold: number[]; dd: number[]; ud: number[]; uu: number[] } {
  const hold = presses.map((press) => press.up - press.down);
  const dd: number[] = [];
  const ud: number[] = [];

  for (let index = 1; index < presses.length; index += 1) {
    const downToDown = presses[index].down - presses[index - 1].down;
    const upToDown = presses[index].down - presses[index - 1].up;
    if (downToDown >= 0) dd.push(downToDown);
    if (upToDown >= 0) ud.push(upToDown);
  }

  const ups = presses.map((press) => press.up).sort((a, b) => a - b);
  const uu: number[] = [];
  for (let index = 1; index < ups.length; index += 1) {
    uu.push(ups[index] - ups[index - 1]);
  }

  return { hold, dd, ud, uu };
}

function sampleDurationMs(events: KeystrokeEvent[]): number {
  const times = orderedEvents(events).map((event) => event.t);
  if (times.length < 2) return 0;
  return toRounded(Math.max(0, times[times.length - 1] - times[0]));
}

function typedLengthOf(sample: KeystrokeSample, keystrokeCount: number): number {
  if (isFiniteNumber(sample.typedLength) && sample.typedLength > 0) {
    return Math.round(sample.typedLength);
  }
  if (typeof sample.expectedText === "string" && sample.expectedText.length > 0) {
    return sample.expectedText.length;
  }
  return keystrokeCount;
}

export function extractKeystrokeFeatures(sample: KeystrokeSample): ResolvedKeystroke {
  const events = Array.isArray(sample.events) ? sample.events : [];
  const presses = pairPresses(events);
  const series = intervals(presses);

  const hold = summarizeSeries(series.hold);
  const dd = summarizeSeries(series.dd);
  const ud = summarizeSeries(series.ud);
  const uu = summarizeSeries(series.uu);
  const flight = series.ud.length > 0 ? ud : dd;

  const durationMs = sampleDurationMs(events);
  const typedLength = typedLengthOf(sample, presses.length);
  const rate = (count: unknown): number =>
    typedLength > 0 ? toRounded(clamp(toCount(count) / typedLength, 0, 1)) : 0;

  const features: KeystrokeFeatures = {
    keystrokeCount: presses.length,
    digraphCount: series.dd.length,
    durationMs,
    holdMeanMs: hold.mean,
    holdStdMs: hold.std,
    flightMeanMs: flight.mean,
    flightStdMs: flight.std,
    ddMeanMs: dd.mean,
    ddStdMs: dd.std,
    udMeanMs: ud.mean,
    udStdMs: ud.std,
    uuMeanMs: uu.mean,
    uuStdMs: uu.std,
    typingSpeedCharsPerSec: durationMs > 0 ? toRounded(typedLength / (durationMs / 1000)) : 0,
    errorRate: rate(sample.errorCount),
    backspaceRate: rate(sample.backspaceCount),
  };

  const reasons: string[] = [];
  if (hold.trimmed || dd.trimmed || ud.trimmed || uu.trimmed) reasons.push("OUTLIER_TRIMMED");
  if (presses.length < 3) reasons.push("INSUFFICIENT_KEYSTROKES");
  if (series.dd.length < 2 || series.ud.length < 2) reasons.push("LOW_DIGRAPH_COVERAGE");

  return { features, reasons };
}

/**
 * Reads a stored or submitted feature vector. Every key must be present as a
 * finite, non-negative number; anything else yields null.
 */
export function parseKeystrokeFeatures(value: unknown): KeystrokeFeatures | null {
  if (!isRecord(value)) return null;

  const features: Partial<KeystrokeFeatures> = {};
  for (const key of KEYSTROKE_FEATURE_KEYS) {
    const raw = value[key];
    if (!isFiniteNumber(raw) || raw < 0) return null;
    features[key] = raw;
  }

  return isCompleteFeatures(features) ? features : null;
}

function isCompleteFeatures(features: Partial<KeystrokeFeatures>): features is KeystrokeFeatures {
  return KEYSTROKE_FEATURE_KEYS.every((key) => isFiniteNumber(features[key]));
}

function parseKeystrokeEvent(value: unknown): KeystrokeEvent | null {
  if (!isRecord(value)) return null;
  if (value.type !== "down" && value.type !== "up") return null;
  if (!isFiniteNumber(value.t)) return null;

  return {
    type: value.type,
    t: value.t,
    ...(typeof value.key === "string" ? { key: value.key } : {}),
    ...(typeof value.code === "string" ? { code: value.code } : {}),
    ...(typeof value.isRepeat === "boolean" ? { isRepeat: value.isRepeat } : {}),
    ...(isFiniteNumber(value.location) ? { location: value.location } : {}),
    ...(isFiniteNumber(value.expectedIndex) ? { expectedIndex: value.expectedIndex } : {}),
  };
}

export function parseKeystrokeSample(value: unknown): KeystrokeSample | null {
  if (!isRecord(value) || !Array.isArray(value.events)) return null;

  const events: KeystrokeEvent[] = [];
  for (const item of value.events) {
    const event = parseKeystrokeEvent(item);
    if (!event) return null;
    events.push(event);
  }

  return {
    events,
    ...(typeof value.expectedText === "string" ? { expectedText: value.expectedText } : {}),
    ...(isFiniteNumber(value.typedLength) ? { typedLength: value.typedLength } : {}),
    ...(isFiniteNumber(value.errorCount) ? { errorCount: value.errorCount } : {}),
    ...(isFiniteNumber(value.backspaceCount) ? { backspaceCount: value.backspaceCount } : {}),
    ...(typeof value.imeCompositionUsed === "boolean"
      ? { imeCompositionUsed: value.imeCompositionUsed }
      : {}),
  };
}

/** Accepts either a raw sample (has `events`) or a ready feature vector. */
export function resolveKeystrokeInput(value: unknown): ResolvedKeystroke | null {
  if (isRecord(value) && "events" in value) {
    const sample = parseKeystrokeSample(value);
    return sample ? extractKeystrokeFeatures(sample) : null;
  }

  const features = parseKeystrokeFeatures(value);
  return features ? { features, reasons: [] } : null;
}
