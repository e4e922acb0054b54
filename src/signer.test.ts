/**
 * Tests for assertion signing
 */

import { test, describe, before, after } from "node:test";
import * as assert from "node:assert";
import * as crypto from "crypto";
import * as fs from "fs";
import * as path from "path";
import * as os from "os";
import { KeyFileSigner, decodeAssertion, verifyAssertion } from "./signer.js";
import { CredentialError, type ErrorKind } from "./errors.js";
import type { Identity } from "./types.js";

const NOW = 1_700_000_000_000;
const fixedClock = { now: () => NOW };

function isKind(kind: ErrorKind) {
  return (error: unknown) => error instanceof CredentialError && error.kind === kind;
}

describe("KeyFileSigner", () => {
  let tempDir: string;
  let rsaKeyPath: string;
  let rsaPublicKey: crypto.KeyObject;
  let rsaPem: string;

  before(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "fpga-jit-signer-test-"));

    const rsa = crypto.generateKeyPairSync("rsa", { modulusLength: 2048 });
    rsaPem = rsa.privateKey.export({ type: "pkcs8", format: "pem" }).toString();
    rsaKeyPath = path.join(tempDir, "app.pem");
    fs.writeFileSync(rsaKeyPath, rsaPem, { mode: 0o600 });
    rsaPublicKey = rsa.publicKey;
  });

  after(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  function identity(overrides: Partial<Identity> = {}): Identity {
    return { privateKeyPath: rsaKeyPath, issuer: "app-123", ...overrides };
  }

  test("expiry equals issued-at plus TTL", async () => {
    const signer = new KeyFileSigner({ clock: fixedClock });
    const assertion = await signer.sign(identity(), 300);

    assert.strictEqual(assertion.payload.iat, 1_700_000_000);
    assert.strictEqual(assertion.payload.exp, 1_700_000_300);
    assert.strictEqual(assertion.payload.iss, "app-123");
    assert.strictEqual(assertion.payload.aud, undefined);
    assert.strictEqual(assertion.algorithm, "RS256");
  });

  test("signing the same identity twice yields different nonces", async () => {
    const signer = new KeyFileSigner({ clock: fixedClock });
    const first = await signer.sign(identity(), 300);
    const second = await signer.sign(identity(), 300);

    assert.notStrictEqual(first.payload.jti, second.payload.jti);
    assert.notStrictEqual(first.encoded, second.encoded);
  });

  test("produces a compact JWT that verifies with the public key", async () => {
    const signer = new KeyFileSigner({ clock: fixedClock });
    const assertion = await signer.sign(identity({ audience: "installation-42" }), 60);

    const parts = assertion.encoded.split(".");
    assert.strictEqual(parts.length, 3);
    assert.deepStrictEqual(JSON.parse(Buffer.from(parts[0], "base64url").toString()), {
      alg: "RS256",
      typ: "JWT",
    });
    assert.strictEqual(parts[2], assertion.signature);
    assert.deepStrictEqual(decodeAssertion(assertion.encoded), assertion.payload);
    assert.strictEqual(assertion.payload.aud, "installation-42");
    assert.strictEqual(verifyAssertion(assertion.encoded, rsaPublicKey), true);
  });

  test("tampered payload does not verify", async () => {
    const signer = new KeyFileSigner({ clock: fixedClock });
    const assertion = await signer.sign(identity(), 60);
    const [header, , signature] = assertion.encoded.split(".");
    const forged = Buffer.from(JSON.stringify({ ...assertion.payload, iss: "app-999" })).toString(
      "base64url"
    );

    assert.strictEqual(verifyAssertion(`${header}.${forged}.${signature}`, rsaPublicKey), false);
  });

  test("signs ES256 with a P-256 key", async () => {
    const ec = crypto.generateKeyPairSync("ec", { namedCurve: "prime256v1" });
    const ecPath = path.join(tempDir, "ec.pem");
    fs.writeFileSync(ecPath, ec.privateKey.export({ type: "pkcs8", format: "pem" }));

    const signer = new KeyFileSigner({ clock: fixedClock });
    const assertion = await signer.sign(identity({ privateKeyPath: ecPath }), 60);

    assert.strictEqual(assertion.algorithm, "ES256");
    assert.strictEqual(verifyAssertion(assertion.encoded, ec.publicKey), true);
  });

  test("missing key file is KeyUnavailable", async () => {
    const signer = new KeyFileSigner();
    await assert.rejects(
      signer.sign(identity({ privateKeyPath: path.join(tempDir, "missing.pem") }), 60),
      isKind("KeyUnavailable")
    );
  });

  test("undecodable key is KeyUnavailable", async () => {
    const badPath = path.join(tempDir, "bad.pem");
    fs.writeFileSync(badPath, "not a key");

    const signer = new KeyFileSigner();
    await assert.rejects(signer.sign(identity({ privateKeyPath: badPath }), 60), (error: unknown) => {
      assert.ok(error instanceof CredentialError);
      assert.strictEqual(error.kind, "KeyUnavailable");
      assert.strictEqual(error.stage, "signing");
      return true;
    });
  });

  test("unsupported key type is SigningFailure", async () => {
    const ed = crypto.generateKeyPairSync("ed25519");
    const edPath = path.join(tempDir, "ed.pem");
    fs.writeFileSync(edPath, ed.privateKey.export({ type: "pkcs8", format: "pem" }));

    const signer = new KeyFileSigner();
    await assert.rejects(signer.sign(identity({ privateKeyPath: edPath }), 60), isKind("SigningFailure"));
  });

  test("rejects TTLs outside 1..600 seconds", async () => {
    const signer = new KeyFileSigner();
    await assert.rejects(signer.sign(identity(), 0), isKind("InvalidConfiguration"));
    await assert.rejects(signer.sign(identity(), 601), isKind("InvalidConfiguration"));
    await assert.rejects(signer.sign(identity(), 1.5), isKind("InvalidConfiguration"));
  });

  test("error messages never contain key material", async () => {
    const truncated = path.join(tempDir, "truncated.pem");
    fs.writeFileSync(truncated, rsaPem.slice(0, 200));

    const signer = new KeyFileSigner();
    await assert.rejects(signer.sign(identity({ privateKeyPath: truncated }), 60), (error: unknown) => {
      assert.ok(error instanceof CredentialError);
      const body = rsaPem.split("\n")[1];
      assert.ok(!error.message.includes(body));
      return true;
    });
  });

  test("aborted signal cancels the key read", async () => {
    const controller = new AbortController();
    controller.abort();

    const signer = new KeyFileSigner();
    await assert.rejects(signer.sign(identity(), 60, controller.signal), isKind("Cancelled"));
  });
});

describe("decodeAssertion", () => {
  test("returns null for malformed input", () => {
    assert.strictEqual(decodeAssertion("only.two"), null);
    assert.strictEqual(decodeAssertion("a.b.c"), null);

    const noJti = Buffer.from(JSON.stringify({ iss: "1", iat: 1, exp: 2 })).toString("base64url");
    assert.strictEqual(decodeAssertion(`h.${noJti}.s`), null);
  });
});
