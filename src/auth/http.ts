/**
 * HTTP boundary helpers. Each lifts the foreign error it can hit into an
 * AuthError at the point of failure.
 */

import { AuthError } from "./errors.js";
import { decodeRemoteErrorPayload, parseJsonText } from "./remote-error.js";
import type { AuthClientConfig } from "./config.js";

/** Path of the Auth API under a project URL. */
export const AUTH_V1 = "/auth/v1";

/**
 * Join a base URL and a path and parse the result.
 *
 * @throws AuthError (ParseUrlError)
 */
export function resolveEndpoint(baseUrl: string, path: string): URL {
  const joined = `${baseUrl.replace(/\/+$/, "")}/${path.replace(/^\/+/, "")}`;
  try {
    return new URL(joined);
  } catch (err) {
    if (err instanceof TypeError) throw AuthError.urlParse();
    throw err;
  }
}

/** URL of an Auth API endpoint, e.g. authEndpoint(config, "/token"). */
export function authEndpoint(config: AuthClientConfig, path: string): URL {
  return resolveEndpoint(`${config.projectUrl}${AUTH_V1}`, path);
}

/**
 * Default request headers: `apikey`, JSON content type, and a bearer
 * token when one is given.
 *
 * @throws AuthError (InvalidHeaderValue)
 */
export function buildHeaders(
  config: AuthClientConfig,
  accessToken?: string,
): Headers {
  const headers = new Headers();
  try {
    headers.set("apikey", config.apiKey);
    headers.set("Content-Type", "application/json");
    if (accessToken !== undefined) {
      headers.set("Authorization", `Bearer ${accessToken}`);
    }
  } catch (err) {
    if (err instanceof TypeError) throw AuthError.header(err);
    throw err;
  }
  return headers;
}

/**
 * fetch() with transport failures lifted.
 *
 * @throws AuthError (NetworkError)
 */
export async function send(
  url: URL | string,
  init?: RequestInit,
): Promise<Response> {
  try {
    return await fetch(url, init);
  } catch (err) {
    if (err instanceof Error) throw AuthError.network(err);
    throw err;
  }
}

async function readText(response: Response): Promise<string> {
  try {
    return await response.text();
  } catch (err) {
    if (err instanceof Error) throw AuthError.network(err);
    throw err;
  }
}

/**
 * Read a JSON body and validate it with `parse`. Validators signal a bad
 * shape by throwing a SyntaxError (see JsonShapeError).
 *
 * @throws AuthError (NetworkError or ParseError)
 */
export async function readJson<T>(
  response: Response,
  parse: (data: unknown) => T,
): Promise<T> {
  const text = await readText(response);
  try {
    return parse(parseJsonText(text));
  } catch (err) {
    if (err instanceof SyntaxError) throw AuthError.parse(err);
    throw err;
  }
}

/**
 * Classify a non-2xx response. A structured body yields a Supabase error;
 * anything else yields AuthError{status, message}, using the body text, the
 * status text, or "No response body" as the message.
 *
 * Returns the error rather than throwing it; body read failures still throw.
 */
export async function errorFromResponse(response: Response): Promise<AuthError> {
  const text = await readText(response);
  try {
    return AuthError.supabase(decodeRemoteErrorPayload(text));
  } catch (err) {
    if (!(err instanceof SyntaxError)) throw err;
    console.warn(
      `[supabase-auth] Unstructured error response (HTTP ${response.status}):`,
      err.message,
    );
    const message = text.trim() || response.statusText || "No response body";
    return AuthError.status(response.status, message);
  }
}
