/**
 * supabase-auth-errors — error taxonomy for Supabase Auth clients.
 *
 * Usage:
 *   import { AuthError, errorFromResponse } from "supabase-auth-errors";
 *
 *   if (!response.ok) throw await errorFromResponse(response);
 */

export * from "./auth/index.js";
