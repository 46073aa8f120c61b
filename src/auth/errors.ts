import { formatRemoteError, type RemoteErrorPayload } from "./remote-error.js";
import type { EnvVarError } from "./config.js";

/**
 * Every failure surfaced by the client, as a closed union on `kind`.
 *
 * Variants that wrap a foreign error keep the original instance in `cause`.
 */
export type AuthErrorVariant =
  | { readonly kind: "AlreadySignedUp" }
  | { readonly kind: "WrongCredentials" }
  | { readonly kind: "UserNotFound" }
  | { readonly kind: "NotAuthenticated" }
  | { readonly kind: "MissingRefreshToken" }
  | { readonly kind: "WrongToken" }
  | { readonly kind: "InternalError" }
  /** fetch rejected: connection, TLS, DNS, abort or timeout */
  | { readonly kind: "NetworkError"; readonly cause: Error }
  /** Body was not JSON, or not the expected JSON */
  | { readonly kind: "ParseError"; readonly cause: SyntaxError }
  /** A value could not be set on Headers */
  | { readonly kind: "InvalidHeaderValue"; readonly cause: TypeError }
  | { readonly kind: "InvalidEnvironmentVariable"; readonly cause: EnvVarError }
  | { readonly kind: "ParseUrlError" }
  /** Structured error body from the service */
  | { readonly kind: "Supabase"; readonly payload: RemoteErrorPayload }
  /** Failed remote call with an unclassified status/message pair */
  | { readonly kind: "AuthError"; readonly status: number; readonly message: string };

export type AuthErrorKind = AuthErrorVariant["kind"];

/** Render the display string for a variant. */
export function describeAuthError(variant: AuthErrorVariant): string {
  switch (variant.kind) {
    case "AlreadySignedUp":
      return "User Already Exists";
    case "WrongCredentials":
      return "Invalid Credentials";
    case "UserNotFound":
      return "User Not Found";
    case "NotAuthenticated":
      return "Supabase Client not Authenticated";
    case "MissingRefreshToken":
      return "Missing Refresh Token";
    case "WrongToken":
      return "JWT Is Invalid";
    case "InternalError":
      return "Internal Error";
    case "NetworkError":
      return "Network Error";
    case "ParseError":
      return "Failed to Parse";
    case "InvalidHeaderValue":
      return "Header Value is Invalid";
    case "InvalidEnvironmentVariable":
      return "Environment Variable Unreadable";
    case "ParseUrlError":
      return "Failed to parse URL";
    case "Supabase":
      return formatRemoteError(variant.payload);
    case "AuthError":
      return `Error: ${variant.status}: ${variant.message}`;
    default: {
      const unreachable: never = variant;
      return unreachable;
    }
  }
}

/**
 * The single error type thrown by every fallible operation of the client.
 *
 * Branch on `error.variant.kind`; `message` is the display string.
 */
export class AuthError extends Error {
  override name = "AuthError";
  readonly variant: AuthErrorVariant;

  constructor(variant: AuthErrorVariant) {
    super(
      describeAuthError(variant),
      "cause" in variant ? { cause: variant.cause } : undefined,
    );
    this.variant = variant;
  }

  get kind(): AuthErrorKind {
    return this.variant.kind;
  }

  /** Lift a transport failure. */
  static network(cause: Error): AuthError {
    return new AuthError({ kind: "NetworkError", cause });
  }

  /** Lift a JSON decoding failure. */
  static parse(cause: SyntaxError): AuthError {
    return new AuthError({ kind: "ParseError", cause });
  }

  /** Lift a header construction failure. */
  static header(cause: TypeError): AuthError {
    return new AuthError({ kind: "InvalidHeaderValue", cause });
  }

  /** Lift an environment lookup failure. */
  static environment(cause: EnvVarError): AuthError {
    return new AuthError({ kind: "InvalidEnvironmentVariable", cause });
  }

  static supabase(payload: RemoteErrorPayload): AuthError {
    return new AuthError({ kind: "Supabase", payload });
  }

  static status(status: number, message: string): AuthError {
    return new AuthError({ kind: "AuthError", status, message });
  }

  static urlParse(): AuthError {
    return new AuthError({ kind: "ParseUrlError" });
  }
}

export function isAuthError(value: unknown): value is AuthError {
  return value instanceof AuthError;
}
