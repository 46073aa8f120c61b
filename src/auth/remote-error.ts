/**
 * Structured error bodies returned by the Supabase Auth service.
 */

/** Any value JSON can carry. */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * Error body of a non-2xx response, in camelCase.
 *
 * Optional fields are either present or absent; `null` on the wire decodes
 * as absent.
 */
export interface RemoteErrorPayload {
  /** HTTP-like status code reported by the service */
  readonly code: number;
  /** Short machine-readable code (e.g. "invalid_grant") */
  readonly errorCode?: string;
  /** Human-readable message (`msg` on the wire) */
  readonly message: string;
  readonly internalError?: JsonValue;
  readonly internalMessage?: JsonValue;
  /** Correlation ID for support requests */
  readonly errorId?: string;
}

/** Wire format from the server (snake_case). */
export interface RemoteErrorPayloadWire {
  code: number;
  error_code?: string;
  msg: string;
  internal_error?: JsonValue;
  internal_message?: JsonValue;
  error_id?: string;
}

/** A JSON document that parsed but does not have the expected shape. */
export class JsonShapeError extends SyntaxError {
  override name = "JsonShapeError";
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Deepest array/object nesting accepted inside an opaque value. */
export const MAX_JSON_DEPTH = 128;

const I32_MIN = -2147483648;
const I32_MAX = 2147483647;

/** Iterative walk; nesting past MAX_JSON_DEPTH is a shape error. */
function assertJsonValue(root: unknown, key: string): asserts root is JsonValue {
  const pending: Array<[unknown, number]> = [[root, 0]];
  let next = pending.pop();
  for (; next !== undefined; next = pending.pop()) {
    const [value, depth] = next;
    if (typeof value === "string" || typeof value === "boolean") continue;
    if (typeof value === "number" && Number.isFinite(value)) continue;
    if (typeof value !== "object") {
      throw new JsonShapeError(`Invalid error payload: ${key} is not JSON`);
    }
    if (value === null) continue;
    if (depth >= MAX_JSON_DEPTH) {
      throw new JsonShapeError(
        `Invalid error payload: ${key} nests deeper than ${MAX_JSON_DEPTH} levels`,
      );
    }
    const children: unknown[] = Array.isArray(value)
      ? value
      : Object.values(value);
    for (const child of children) pending.push([child, depth + 1]);
  }
}

function optionalString(
  obj: Record<string, unknown>,
  key: string,
): string | undefined {
  const value = obj[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "string") {
    throw new JsonShapeError(`Invalid error payload: ${key} must be a string`);
  }
  return value;
}

function optionalJson(
  obj: Record<string, unknown>,
  key: string,
): JsonValue | undefined {
  const value = obj[key];
  if (value === undefined || value === null) return undefined;
  assertJsonValue(value, key);
  return value;
}

/**
 * Validate and map a decoded JSON value to a RemoteErrorPayload.
 * Unknown keys are ignored.
 *
 * @throws JsonShapeError when `code` or `msg` is missing or mistyped, when
 *   `code` is outside the 32-bit signed range, or when an internal value
 *   nests deeper than MAX_JSON_DEPTH.
 */
export function parseRemoteErrorPayload(data: unknown): RemoteErrorPayload {
  if (!isRecord(data)) {
    throw new JsonShapeError("Invalid error payload: expected object");
  }

  const code = data["code"];
  if (
    typeof code !== "number" ||
    !Number.isInteger(code) ||
    code < I32_MIN ||
    code > I32_MAX
  ) {
    throw new JsonShapeError(
      "Invalid error payload: missing or invalid code",
    );
  }
  const message = data["msg"];
  if (typeof message !== "string") {
    throw new JsonShapeError("Invalid error payload: missing or invalid msg");
  }

  const errorCode = optionalString(data, "error_code");
  const errorId = optionalString(data, "error_id");
  const internalError = optionalJson(data, "internal_error");
  const internalMessage = optionalJson(data, "internal_message");

  return {
    code,
    message,
    ...(errorCode !== undefined && { errorCode }),
    ...(internalError !== undefined && { internalError }),
    ...(internalMessage !== undefined && { internalMessage }),
    ...(errorId !== undefined && { errorId }),
  };
}

/**
 * JSON.parse, with a stack overflow on deep input reported as a
 * JsonShapeError.
 *
 * @throws SyntaxError
 */
export function parseJsonText(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch (err) {
    if (err instanceof RangeError) {
      throw new JsonShapeError("JSON document nests too deeply", { cause: err });
    }
    throw err;
  }
}

/**
 * Decode a response body into a RemoteErrorPayload.
 *
 * @throws SyntaxError for invalid JSON, JsonShapeError for the wrong shape.
 */
export function decodeRemoteErrorPayload(text: string): RemoteErrorPayload {
  return parseRemoteErrorPayload(parseJsonText(text));
}

/** Map a payload back to its wire form. Absent fields are omitted, never null. */
export function encodeRemoteErrorPayload(
  payload: RemoteErrorPayload,
): RemoteErrorPayloadWire {
  const wire: RemoteErrorPayloadWire = {
    code: payload.code,
    msg: payload.message,
  };
  if (payload.errorCode !== undefined) wire.error_code = payload.errorCode;
  if (payload.internalError !== undefined) {
    wire.internal_error = payload.internalError;
  }
  if (payload.internalMessage !== undefined) {
    wire.internal_message = payload.internalMessage;
  }
  if (payload.errorId !== undefined) wire.error_id = payload.errorId;
  return wire;
}

/**
 * Render a payload as a multi-line diagnostic:
 *
 *   Status Code 400 (invalid_grant) [Error ID: abc]
 *   Internal message: "..."
 *   Internal error: {...}
 *   Message: ...
 *
 * Bracketed parts and the two internal lines appear only when present.
 * Internal values render as compact JSON.
 */
export function formatRemoteError(payload: RemoteErrorPayload): string {
  let out = `Status Code ${payload.code}`;
  if (payload.errorCode !== undefined) out += ` (${payload.errorCode})`;
  if (payload.errorId !== undefined) out += ` [Error ID: ${payload.errorId}]`;
  if (payload.internalMessage !== undefined) {
    out += `\nInternal message: ${JSON.stringify(payload.internalMessage)}`;
  }
  if (payload.internalError !== undefined) {
    out += `\nInternal error: ${JSON.stringify(payload.internalError)}`;
  }
  return `${out}\nMessage: ${payload.message}`;
}
