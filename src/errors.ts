import { format } from "node:util";

/** Base error of every failure raised by this package */
export class WgError extends Error {
  override name = "WgError";
}

export type ValidationReason = "MissingRequiredField" | "InvalidValue" | "InvalidAmneziaSetting";

/**
 * Raised by `build()` when a builder holds a missing or malformed field.
 */
export class ValidationError extends WgError {
  override name = "ValidationError";

  constructor(readonly reason: ValidationReason, readonly field: string, options?: ErrorOptions) {
    super(format(reason === "MissingRequiredField" ? "missing required field: %s" : reason === "InvalidValue" ? "invalid value for field: %s" : "invalid amnezia setting: %s", field), options);
  }
}

export type DerivationReason = "MissingPrivateKey" | "ServerKeyUnavailable";

/**
 * Raised when a client interface cannot be derived from a peer and its server.
 */
export class DerivationError extends WgError {
  override name = "DerivationError";

  constructor(readonly reason: DerivationReason) {
    super(reason === "MissingPrivateKey" ? "peer holds only a public key, no private key provided" : "server interface has no private key to derive its public key from");
  }
}

export type KeyReason = "InvalidPrivateKey" | "InvalidPublicKey" | "InvalidPresharedKey";

export class KeyError extends WgError {
  override name = "KeyError";

  constructor(readonly reason: KeyReason) {
    super(reason === "InvalidPrivateKey" ? "invalid private key" : reason === "InvalidPublicKey" ? "invalid public key" : "invalid preshared key");
  }
}

/** Outcome of a `safe*` call: the value, or the error `*` would have thrown. */
export type Result<T, E extends Error = WgError> = { ok: true, value: T } | { ok: false, error: E };

/**
 * Run `fn` and capture errors of class `errorClass` as a failed Result, anything else is rethrown.
 */
export function capture<T, E extends Error>(errorClass: abstract new (...args: never[]) => E, fn: () => T): Result<T, E> {
  try {
    return { ok: true, value: fn() };
  } catch (err) {
    if (err instanceof errorClass) return { ok: false, error: err };
    throw err;
  }
}
