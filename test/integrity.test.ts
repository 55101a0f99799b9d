import assert from "node:assert/strict";
import { createHash } from "crypto";
import { Readable } from "stream";
import test from "node:test";

import { IntegrityError } from "../src/errors";
import { computeDigest, parseChecksum, verifyIntegrity } from "../src/integrity";

const payload = Buffer.from("source archive bytes\n");
const sha256 = createHash("sha256").update(payload).digest("hex");

test("integrity: parseChecksum splits algorithm and digest", () => {
  assert.deepEqual(parseChecksum("sha256:abc123"), { algorithm: "sha256", digest: "abc123" });
  assert.throws(() => parseChecksum("abc123"), IntegrityError);
  assert.throws(() => parseChecksum("sha256:"), IntegrityError);
});

test("integrity: computeDigest hashes every chunk", async () => {
  const chunks = [payload.subarray(0, 5), payload.subarray(5)];
  assert.equal(await computeDigest(Readable.from(chunks), "sha256"), sha256);
});

test("integrity: matching checksum verifies", async () => {
  const result = await verifyIntegrity(() => Readable.from([payload]), `sha256:${sha256}`);
  assert.deepEqual(result, { verified: true, digest: sha256 });
});

test("integrity: mismatch names both digests", async () => {
  const expected = "0".repeat(64);
  await assert.rejects(
    verifyIntegrity(() => Readable.from([payload]), `sha256:${expected}`, { label: "zlib" }),
    (err: unknown) =>
      err instanceof IntegrityError &&
      err.message ===
        "Could not verify data integrity of 'zlib': invalid checksum\n" +
          `  expected: sha256:${expected}\n` +
          `  got:      sha256:${sha256}`,
  );
});

test("integrity: digests compare case-sensitively", async () => {
  await assert.rejects(
    verifyIntegrity(() => Readable.from([payload]), `sha256:${sha256.toUpperCase()}`),
    IntegrityError,
  );
});

test("integrity: missing checksum warns and proceeds", async () => {
  const warnings: string[] = [];
  let opened = 0;
  const result = await verifyIntegrity(
    () => {
      opened++;
      return Readable.from([payload]);
    },
    undefined,
    { label: "zlib", warn: (message) => warnings.push(message) },
  );

  assert.deepEqual(result, { verified: false });
  assert.equal(opened, 0);
  assert.deepEqual(warnings, [
    "'zlib' has no source checksum specified... data integrity will not be verified",
  ]);
});

test("integrity: unsupported algorithm", async () => {
  await assert.rejects(
    verifyIntegrity(() => Readable.from([payload]), "nohash:abcd"),
    (err: unknown) =>
      err instanceof IntegrityError && err.message.startsWith("unsupported checksum algorithm 'nohash'"),
  );
});
