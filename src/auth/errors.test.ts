import { describe, it, expect } from "vitest";
import {
  AuthError,
  describeAuthError,
  isAuthError,
  type AuthErrorVariant,
} from "./errors.js";
import { EnvVarError } from "./config.js";
import { JsonShapeError } from "./remote-error.js";

describe("describeAuthError", () => {
  const cases: Array<[AuthErrorVariant, string]> = [
    [{ kind: "AlreadySignedUp" }, "User Already Exists"],
    [{ kind: "WrongCredentials" }, "Invalid Credentials"],
    [{ kind: "UserNotFound" }, "User Not Found"],
    [{ kind: "NotAuthenticated" }, "Supabase Client not Authenticated"],
    [{ kind: "MissingRefreshToken" }, "Missing Refresh Token"],
    [{ kind: "WrongToken" }, "JWT Is Invalid"],
    [{ kind: "InternalError" }, "Internal Error"],
    [{ kind: "ParseUrlError" }, "Failed to parse URL"],
  ];

  it.each(cases)("renders %o", (variant, expected) => {
    expect(describeAuthError(variant)).toBe(expected);
    expect(new AuthError(variant).message).toBe(expected);
  });

  it("renders a status/message pair", () => {
    const err = AuthError.status(404, "not found");
    expect(err.message).toBe("Error: 404: not found");
  });

  it("renders a Supabase payload verbatim", () => {
    const err = AuthError.supabase({
      code: 400,
      errorCode: "invalid_grant",
      message: "Bad request",
    });
    expect(err.message).toBe(
      "Status Code 400 (invalid_grant)\nMessage: Bad request",
    );
  });

  it("renders fixed text for wrapping variants regardless of cause", () => {
    expect(AuthError.network(new TypeError("fetch failed")).message).toBe(
      "Network Error",
    );
    expect(AuthError.parse(new SyntaxError("Unexpected token")).message).toBe(
      "Failed to Parse",
    );
    expect(AuthError.header(new TypeError("invalid header")).message).toBe(
      "Header Value is Invalid",
    );
    expect(
      AuthError.environment(new EnvVarError("SUPABASE_URL")).message,
    ).toBe("Environment Variable Unreadable");
  });
});

describe("AuthError lifting", () => {
  it("keeps the transport error instance as cause", () => {
    const dnsFailure = new Error("getaddrinfo ENOTFOUND example.invalid");
    const original = new TypeError("fetch failed", { cause: dnsFailure });
    const err = AuthError.network(original);

    expect(err.kind).toBe("NetworkError");
    expect(err.cause).toBe(original);
    if (err.variant.kind !== "NetworkError") throw new Error("wrong variant");
    expect(err.variant.cause).toBe(original);
    expect(err.variant.cause.name).toBe("TypeError");
    expect(err.variant.cause.message).toBe("fetch failed");
    expect(err.variant.cause.cause).toBe(dnsFailure);
  });

  it("keeps JSON errors, including shape errors", () => {
    const shape = new JsonShapeError("Invalid error payload: expected object");
    const err = AuthError.parse(shape);
    expect(err.cause).toBe(shape);
    expect(err.cause).toBeInstanceOf(SyntaxError);
  });

  it("keeps the environment error and its variable name", () => {
    const original = new EnvVarError("SUPABASE_API_KEY");
    const err = AuthError.environment(original);
    if (err.variant.kind !== "InvalidEnvironmentVariable") {
      throw new Error("wrong variant");
    }
    expect(err.variant.cause.variable).toBe("SUPABASE_API_KEY");
    expect(err.cause).toBe(original);
  });

  it("sets no cause on variants without one", () => {
    expect(new AuthError({ kind: "WrongToken" }).cause).toBeUndefined();
    expect(AuthError.urlParse().cause).toBeUndefined();
  });
});

describe("AuthError", () => {
  it("is an Error named AuthError", () => {
    const err = new AuthError({ kind: "UserNotFound" });
    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe("AuthError");
    expect(String(err)).toBe("AuthError: User Not Found");
  });

  it("exposes status and message of the status variant", () => {
    const err = AuthError.status(422, "weak password");
    expect(err.variant).toEqual({
      kind: "AuthError",
      status: 422,
      message: "weak password",
    });
  });

  it("isAuthError narrows only AuthError instances", () => {
    expect(isAuthError(AuthError.urlParse())).toBe(true);
    expect(isAuthError(new Error("Failed to parse URL"))).toBe(false);
    expect(isAuthError({ kind: "ParseUrlError" })).toBe(false);
  });
});
