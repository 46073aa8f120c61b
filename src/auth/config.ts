import { AuthError } from "./errors.js";
import { resolveEndpoint } from "./http.js";

/**
 * Connection settings for a Supabase project.
 */
export interface AuthClientConfig {
  /** Project URL without trailing slash (e.g., "https://abc.supabase.co") */
  projectUrl: string;
  /** Anon or service-role API key, sent as the `apikey` header */
  apiKey: string;
  /** Secret used to verify access-token signatures */
  jwtSecret: string;
}

/** Environment variable names read by loadConfigFromEnv(). */
export const ENV_KEYS = {
  projectUrl: "SUPABASE_URL",
  apiKey: "SUPABASE_API_KEY",
  jwtSecret: "SUPABASE_JWT_SECRET",
} as const;

type Env = Record<string, string | undefined>;

/** A required environment variable is unset or empty. */
export class EnvVarError extends Error {
  override name = "EnvVarError";
  constructor(public readonly variable: string) {
    super(`Environment variable ${variable} is not set`);
  }
}

/** @throws EnvVarError when the variable is unset or empty. */
export function readEnv(name: string, env: Env = process.env): string {
  const value = env[name];
  if (value === undefined || value === "") {
    throw new EnvVarError(name);
  }
  return value;
}

/**
 * Build an AuthClientConfig from SUPABASE_URL, SUPABASE_API_KEY and
 * SUPABASE_JWT_SECRET.
 *
 * @throws AuthError (InvalidEnvironmentVariable or ParseUrlError)
 */
export function loadConfigFromEnv(env: Env = process.env): AuthClientConfig {
  const projectUrl = readEnvOrLift(ENV_KEYS.projectUrl, env);
  const apiKey = readEnvOrLift(ENV_KEYS.apiKey, env);
  const jwtSecret = readEnvOrLift(ENV_KEYS.jwtSecret, env);

  // Throws ParseUrlError for anything that isn't an absolute URL
  resolveEndpoint(projectUrl, "");

  return { projectUrl: projectUrl.replace(/\/+$/, ""), apiKey, jwtSecret };
}

function readEnvOrLift(name: string, env: Env): string {
  try {
    return readEnv(name, env);
  } catch (err) {
    if (err instanceof EnvVarError) throw AuthError.environment(err);
    throw err;
  }
}
