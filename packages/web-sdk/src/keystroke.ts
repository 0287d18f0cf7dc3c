import type { KeystrokeEvent, KeystrokeSample } from "@keyprint/core";

export interface KeystrokeCollectorOptions {
  /** Text the user is asked to type; enables error counting. */
  expectedText?: string;
  includeBackspace?: boolean;
  includeEnter?: boolean;
  /** Records `event.key`. Off by default so typed characters stay on the device. */
  includeRawKey?: boolean;
  now?: () => number;
}

export interface KeystrokeCollectorSnapshot {
  events: KeystrokeEvent[];
  typedLength: number;
  errorCount: number;
  backspaceCount: number;
  ignoredEventCount: number;
  imeCompositionUsed: boolean;
  collecting: boolean;
}

export interface KeystrokeCollector {
  start(): void;
  stop(): void;
  reset(): void;
  getSnapshot(): KeystrokeCollectorSnapshot;
  /** Packages what was collected so far for /register or /login. */
  toSample(): KeystrokeSample;
}

export interface BuildKeystrokeSampleOptions {
  typedLength?: number;
  errorCount?: number;
  backspaceCount?: number;
  ignoredEventCount?: number;
  imeCompositionUsed?: boolean;
  source?: KeystrokeSample["source"];
}

type TypingTarget = HTMLInputElement | HTMLTextAreaElement;

const MODIFIER_KEYS = new Set(["Shift", "Control", "Alt", "Meta", "CapsLock", "NumLock"]);

function isTrackedKey(key: string, includeBackspace: boolean, includeEnter: boolean): boolean {
  if (MODIFIER_KEYS.has(key)) return false;
  if (key === "Backspace") return includeBackspace;
  if (key === "Enter") return includeEnter;
  return key.length === 1;
}

function pressToken(event: KeyboardEvent): string {
  return `${event.code}|${event.location}|${event.key}`;
}

function toCount(value: number | undefined): number | undefined {
  return typeof value === "number" && Number.isFinite(value) ? Math.max(0, Math.round(value)) : undefined;
}

export function createKeystrokeCollector(
  target: TypingTarget,
  options: KeystrokeCollectorOptions = {}
): KeystrokeCollector {
  const includeBackspace = options.includeBackspace ?? true;
  const includeEnter = options.includeEnter ?? false;
  const includeRawKey = options.includeRawKey ?? false;
  const now = options.now ?? (() => performance.now());

  let startedAt = now();
  let collecting = false;
  let composing = false;
  let imeCompositionUsed = false;
  let errorCount = 0;
  let backspaceCount = 0;
  let ignoredEventCount = 0;
  const events: KeystrokeEvent[] = [];
  const openPresses = new Map<string, number>();

  const record = (event: KeyboardEvent, type: KeystrokeEvent["type"], expectedIndex?: number): void => {
    events.push({
      ...(includeRawKey ? { key: event.key } : {}),
      ...(event.code ? { code: event.code } : {}),
      type,
      t: Math.round((now() - startedAt) * 1000) / 1000,
      location: event.location,
      ...(expectedIndex !== undefined ? { expectedIndex } : {}),
    });
  };

  const skip = (event: KeyboardEvent): boolean => {
    if (composing || !isTrackedKey(event.key, includeBackspace, includeEnter)) {
      ignoredEventCount += 1;
      return true;
    }
    return false;
  };

  const onCompositionStart = (): void => {
    composing = true;
    imeCompositionUsed = true;
  };

  const onCompositionEnd = (): void => {
    composing = false;
  };

  const onKeyDown = (event: Event): void => {
    if (!collecting || !(event instanceof KeyboardEvent)) return;
    if (event.repeat) {
      ignoredEventCount += 1;
      return;
    }
    if (skip(event)) return;

    const caret = target.value.length;
    const expectedIndex = event.key === "Backspace" ? Math.max(0, caret - 1) : caret;
    openPresses.set(pressToken(event), expectedIndex);

    if (event.key === "Backspace") backspaceCount += 1;
    if (options.expectedText !== undefined && event.key.length === 1) {
      const expectedChar = options.expectedText[expectedIndex];
      if (expectedChar !== undefined && expectedChar !== event.key) errorCount += 1;
    }

    record(event, "down", expectedIndex);
  };

  const onKeyUp = (event: Event): void => {
    if (!collecting || !(event instanceof KeyboardEvent)) return;
    if (skip(event)) return;

    const token = pressToken(event);
    const expectedIndex = openPresses.get(token);
    openPresses.delete(token);
    record(event, "up", expectedIndex);
  };

  const getSnapshot = (): KeystrokeCollectorSnapshot => ({
    events: events.map((event) => ({ ...event })),
    typedLength: target.value.length,
    errorCount,
    backspaceCount,
    ignoredEventCount,
    imeCompositionUsed,
    collecting,
  });

  return {
    start() {
      if (collecting) return;
      collecting = true;
      startedAt = now();
      target.addEventListener("compositionstart", onCompositionStart);
      target.addEventListener("compositionend", onCompositionEnd);
      target.addEventListener("keydown", onKeyDown);
      target.addEventListener("keyup", onKeyUp);
    },
    stop() {
      if (!collecting) return;
      collecting = false;
      target.removeEventListener("compositionstart", onCompositionStart);
      target.removeEventListener("compositionend", onCompositionEnd);
      target.removeEventListener("keydown", onKeyDown);
      target.removeEventListener("keyup", onKeyUp);
    },
    reset() {
      events.length = 0;
      openPresses.clear();
      composing = false;
      imeCompositionUsed = false;
      errorCount = 0;
      backspaceCount = 0;
      ignoredEventCount = 0;
      startedAt = now();
    },
    getSnapshot,
    toSample() {
      const snapshot = getSnapshot();
      return buildKeystrokeSample(snapshot.events, options.expectedText, snapshot);
    },
  };
}

export function buildKeystrokeSample(
  events: KeystrokeEvent[],
  expectedText?: string,
  options: BuildKeystrokeSampleOptions = {}
): KeystrokeSample {
  const typedLength = toCount(options.typedLength);
  const errorCount = toCount(options.errorCount);
  const backspaceCount = toCount(options.backspaceCount);
  const ignoredEventCount = toCount(options.ignoredEventCount);

  return {
    events: events.map((event) => ({ ...event })),
    ...(expectedText !== undefined ? { expectedText } : {}),
    ...(typedLength !== undefined ? { typedLength } : {}),
    ...(errorCount !== undefined ? { errorCount } : {}),
    ...(backspaceCount !== undefined ? { backspaceCount } : {}),
    ...(ignoredEventCount !== undefined ? { ignoredEventCount } : {}),
    ...(options.imeCompositionUsed !== undefined ? { imeCompositionUsed: options.imeCompositionUsed } : {}),
    source: options.source ?? "collector_v1",
  };
}
