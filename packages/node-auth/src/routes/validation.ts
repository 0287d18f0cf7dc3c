import {
  isRecord,
  resolveKeystrokeInput,
  type ResolvedKeystroke,
} from "@keyprint/core";

export const USERNAME_PATTERN = /^[A-Za-z0-9_.-]{3,64}$/;
export const PASSWORD_MIN_LENGTH = 8;
/** bcrypt ignores everything past the 72nd byte. */
export const PASSWORD_MAX_BYTES = 72;
export const MAX_REGISTRATION_SAMPLES = 20;

export type Parsed<T> =
  | { ok: true; value: T }
  | { ok: false; message: string; field: string };

export type ParsedRegisterBody = {
  username: string;
  password: string;
  samples: ResolvedKeystroke[];
};

export type ParsedLoginBody = {
  username: string;
  password: string;
  keystroke: ResolvedKeystroke;
};

function invalid(field: string, message: string): { ok: false; message: string; field: string } {
  return { ok: false, field, message };
}

export function parseUsername(value: unknown): Parsed<string> {
  if (typeof value !== "string") return invalid("username", "username is required.");

  const username = value.trim();
  if (!USERNAME_PATTERN.test(username)) {
    return invalid("username", "username must be 3-64 characters of letters, digits, '_', '.' or '-'.");
  }
  return { ok: true, value: username };
}

function parsePassword(value: unknown): Parsed<string> {
  if (typeof value !== "string") return invalid("password", "password is required.");
  if (value.length < PASSWORD_MIN_LENGTH || Buffer.byteLength(value, "utf8") > PASSWORD_MAX_BYTES) {
    return invalid(
      "password",
      `password must be at least ${PASSWORD_MIN_LENGTH} characters and at most ${PASSWORD_MAX_BYTES} bytes.`
    );
  }
  return { ok: true, value };
}

export function parseRegisterBody(body: unknown): Parsed<ParsedRegisterBody> {
  if (!isRecord(body)) return invalid("body", "Request body must be a JSON object.");

  const username = parseUsername(body.username);
  if (!username.ok) return username;
  const password = parsePassword(body.password);
  if (!password.ok) return password;

  const rawSamples = body.keystrokeSamples;
  if (
    !Array.isArray(rawSamples) ||
    rawSamples.length === 0 ||
    rawSamples.length > MAX_REGISTRATION_SAMPLES
  ) {
    return invalid(
      "keystrokeSamples",
      `keystrokeSamples must be an array of 1-${MAX_REGISTRATION_SAMPLES} samples.`
    );
  }

  const samples: ResolvedKeystroke[] = [];
  for (const [index, raw] of rawSamples.entries()) {
    const resolved = resolveKeystrokeInput(raw);
    if (resolved?.reasons.includes("INSUFFICIENT_KEYSTROKES")) {
      return invalid(
        `keystrokeSamples[${index}]`,
        `keystrokeSamples[${index}] must contain at least 3 keystrokes.`
      );
    }
    if (!resolved) {
      return invalid(
        `keystrokeSamples[${index}]`,
        `keystrokeSamples[${index}] must be a feature vector or a raw keystroke sample.`
      );
    }
    samples.push(resolved);
  }

  return { ok: true, value: { username: username.value, password: password.value, samples } };
}

export function parseLoginBody(body: unknown): Parsed<ParsedLoginBody> {
  if (!isRecord(body)) return invalid("body", "Request body must be a JSON object.");

  const username = parseUsername(body.username);
  if (!username.ok) return username;
  if (typeof body.password !== "string" || body.password.length === 0) {
    return invalid("password", "password is required.");
  }

  const keystroke = resolveKeystrokeInput(body.keystroke);
  if (!keystroke) {
    return invalid("keystroke", "keystroke must be a feature vector or a raw keystroke sample.");
  }

  return {
    ok: true,
    value: { username: username.value, password: body.password, keystroke },
  };
}
