import assert from "node:assert";
import test from "node:test";
import { KeyError } from "./errors.js";
import { constants, PresharedKey, PrivateKey, PublicKey } from "./key.js";

const max = 100, keysArray = Array(max).fill(null);

test("Wireguard keys", async t => {
  const PrivateKeyB64 = "yI7j4HI5kBKp+uDIsiKTGYdZooeyzF9i49yKRbmq1n8=";

  await t.test("Get public key", () => {
    assert.strictEqual(PrivateKey.fromBase64(PrivateKeyB64).publicKey().toString(), "utkYO/qP/pxLaRCoPsZnpPx5G9hz/9DnBc3OTmk8uX0=");
  });

  await t.test("Import and export keeps base64", () => {
    assert.strictEqual(PrivateKey.fromBase64(PrivateKeyB64).toString(), PrivateKeyB64);
    assert.strictEqual(PrivateKey.fromBase64(PrivateKeyB64).toJSON(), PrivateKeyB64);
  });

  await t.test("Random private key is clamped", () => {
    const bytes = PrivateKey.random().toBytes();
    assert.strictEqual(bytes.length, constants.WG_KEY_LENGTH);
    assert.strictEqual(bytes[0] & 7, 0);
    assert.strictEqual(bytes[31] & 192, 64);
  });

  await t.test(`Generate key ${max}`, () => {
    const generated = new Set(keysArray.map(() => PrivateKey.random().toString()));
    assert.strictEqual(generated.size, max);
    for (const key of generated) assert.strictEqual(key.length, constants.B64_WG_KEY_LENGTH);
  });

  await t.test("Preshared keys are random 32 bytes", () => {
    const first = PresharedKey.random(), second = PresharedKey.random();
    assert.strictEqual(first.toBytes().length, 32);
    assert.ok(!first.equals(second));
    assert.ok(PresharedKey.fromBase64(first.toString()).equals(first));
  });

  await t.test("Reject invalid base64", () => {
    assert.throws(() => PrivateKey.fromBase64("ThisWillBeErrored"), { name: "KeyError", reason: "InvalidPrivateKey", message: "invalid private key" });
    assert.throws(() => PublicKey.fromBase64(PrivateKeyB64.slice(1)), { reason: "InvalidPublicKey" });
    assert.throws(() => PresharedKey.fromBase64("!".repeat(43).concat("=")), { reason: "InvalidPresharedKey" });
  });

  await t.test("Reject wrong byte length", () => {
    assert.throws(() => PublicKey.fromBytes(new Uint8Array(31)), (err: unknown) => err instanceof KeyError && err.reason === "InvalidPublicKey");
  });

  await t.test("Keys from bytes", () => {
    const bytes = new Uint8Array(32).fill(7);
    const publicKey = PublicKey.fromBytes(bytes);
    assert.strictEqual(publicKey.toString(), Buffer.from(bytes).toString("base64"));
    bytes[0] = 0;
    assert.strictEqual(publicKey.toBytes()[0], 7);
    publicKey.toBytes()[1] = 0;
    assert.strictEqual(publicKey.toBytes()[1], 7);
  });

  await t.test("Equality compares bytes and key kind", () => {
    const bytes = new Uint8Array(32).fill(9);
    assert.ok(PublicKey.fromBytes(bytes).equals(PublicKey.fromBytes(bytes)));
    assert.ok(!PublicKey.fromBytes(bytes).equals(PresharedKey.fromBytes(bytes)));
    assert.deepStrictEqual(PublicKey.fromBytes(bytes), PublicKey.fromBytes(bytes));
  });
});
