/**
 * Auth module — error taxonomy and HTTP boundary for Supabase Auth.
 */

// Error taxonomy
export {
  AuthError,
  describeAuthError,
  isAuthError,
  type AuthErrorVariant,
  type AuthErrorKind,
} from "./errors.js";

// Remote error payloads
export {
  JsonShapeError,
  MAX_JSON_DEPTH,
  parseJsonText,
  parseRemoteErrorPayload,
  decodeRemoteErrorPayload,
  encodeRemoteErrorPayload,
  formatRemoteError,
  type RemoteErrorPayload,
  type RemoteErrorPayloadWire,
  type JsonValue,
} from "./remote-error.js";

// Configuration
export {
  EnvVarError,
  ENV_KEYS,
  readEnv,
  loadConfigFromEnv,
  type AuthClientConfig,
} from "./config.js";

// HTTP boundary
export {
  AUTH_V1,
  authEndpoint,
  buildHeaders,
  errorFromResponse,
  readJson,
  resolveEndpoint,
  send,
} from "./http.js";
