import { x25519 } from "@noble/curves/ed25519";
import crypto from "node:crypto";
import { KeyError, type KeyReason } from "./errors.js";

export const constants = Object.freeze({
  WG_KEY_LENGTH: 32,
  B64_WG_KEY_LENGTH: 44,
});

const B64Key = /^[A-Za-z0-9+/]{43}=$/;

function clamp(z: Uint8Array) {
  z[31] = (z[31] & 127) | 64;
  z[0] &= 248;
}

export function keyToBase64(key: Uint8Array): string {
  return Buffer.from(key).toString("base64");
}

function base64ToKey(keyInput: string, reason: KeyReason): Uint8Array {
  if (typeof keyInput !== "string" || !B64Key.test(keyInput)) throw new KeyError(reason);
  const key = new Uint8Array(Buffer.from(keyInput, "base64"));
  if (key.length !== constants.WG_KEY_LENGTH) throw new KeyError(reason);
  return key;
}

function copyKey(keyInput: Uint8Array, reason: KeyReason): Uint8Array {
  if (!(keyInput instanceof Uint8Array) || keyInput.length !== constants.WG_KEY_LENGTH) throw new KeyError(reason);
  return Uint8Array.from(keyInput);
}

export abstract class Key {
  protected constructor(protected readonly bytes: Uint8Array) {}

  /** Copy of the raw 32 bytes */
  toBytes(): Uint8Array {
    return Uint8Array.from(this.bytes);
  }

  /** Key in Wireguard's base64 form */
  toString(): string {
    return keyToBase64(this.bytes);
  }

  toJSON(): string {
    return this.toString();
  }

  equals(other: Key): boolean {
    return other.constructor === this.constructor && Buffer.compare(this.bytes, other.bytes) === 0;
  }
}

/**
 * Curve25519 private key.
 *
 * @example
 * ```ts
 * const privateKey = PrivateKey.random();
 * const imported = PrivateKey.fromBase64(privateKey.toString());
 * imported.publicKey().toString(); // 44 chars base64
 * ```
 */
export class PrivateKey extends Key {
  private constructor(bytes: Uint8Array) {
    super(bytes);
  }

  /** Generate new private key, clamped like `wg genkey` */
  static random(): PrivateKey {
    const key = crypto.randomBytes(constants.WG_KEY_LENGTH);
    clamp(key);
    return new PrivateKey(new Uint8Array(key));
  }

  static fromBase64(keyInput: string): PrivateKey {
    return new PrivateKey(base64ToKey(keyInput, "InvalidPrivateKey"));
  }

  static fromBytes(keyInput: Uint8Array): PrivateKey {
    return new PrivateKey(copyKey(keyInput, "InvalidPrivateKey"));
  }

  /** Get public key from this private key */
  publicKey(): PublicKey {
    return PublicKey.fromBytes(x25519.getPublicKey(this.bytes));
  }
}

export class PublicKey extends Key {
  private constructor(bytes: Uint8Array) {
    super(bytes);
  }

  static fromBase64(keyInput: string): PublicKey {
    return new PublicKey(base64ToKey(keyInput, "InvalidPublicKey"));
  }

  static fromBytes(keyInput: Uint8Array): PublicKey {
    return new PublicKey(copyKey(keyInput, "InvalidPublicKey"));
  }
}

/** Symmetric key mixed into the handshake of a single peer */
export class PresharedKey extends Key {
  private constructor(bytes: Uint8Array) {
    super(bytes);
  }

  static random(): PresharedKey {
    return new PresharedKey(new Uint8Array(crypto.randomBytes(constants.WG_KEY_LENGTH)));
  }

  static fromBase64(keyInput: string): PresharedKey {
    return new PresharedKey(base64ToKey(keyInput, "InvalidPresharedKey"));
  }

  static fromBytes(keyInput: Uint8Array): PresharedKey {
    return new PresharedKey(copyKey(keyInput, "InvalidPresharedKey"));
  }
}
