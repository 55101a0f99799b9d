import { createHash, type Hash } from "crypto";

import { IntegrityError } from "./errors";

export type Checksum = {
  /** digest algorithm name as understood by node:crypto (`sha256`, `sha512`, ...) */
  algorithm: string;
  /** expected hex digest, compared case-sensitively */
  digest: string;
};

export type VerifyResult = {
  /** false when no checksum was supplied */
  verified: boolean;
  /** computed hex digest (only when verified) */
  digest?: string;
};

export function parseChecksum(value: string): Checksum {
  const separator = value.indexOf(":");
  if (separator <= 0 || separator === value.length - 1) {
    throw new IntegrityError(`invalid checksum '${value}' (expected algorithm:hexdigest)`);
  }
  return {
    algorithm: value.slice(0, separator),
    digest: value.slice(separator + 1),
  };
}

function createDigest(algorithm: string): Hash {
  try {
    return createHash(algorithm);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new IntegrityError(`unsupported checksum algorithm '${algorithm}': ${message}`);
  }
}

/** Hash the full stream and return the hex digest. */
export async function computeDigest(
  stream: AsyncIterable<Uint8Array | string>,
  algorithm: string,
): Promise<string> {
  const hash = createDigest(algorithm);
  for await (const chunk of stream) {
    hash.update(chunk);
  }
  return hash.digest("hex");
}

/**
 * Verify a downloaded artifact against an optional `algorithm:hexdigest`.
 *
 * `open` is only called when there is a checksum to compare. Without one the
 * artifact cannot be verified; `warn` is called and the caller may proceed.
 */
export async function verifyIntegrity(
  open: () => AsyncIterable<Uint8Array | string>,
  checksum: string | undefined,
  options: { label?: string; warn?: (message: string) => void } = {},
): Promise<VerifyResult> {
  const label = options.label ?? "artifact";

  if (checksum === undefined) {
    options.warn?.(
      `'${label}' has no source checksum specified... data integrity will not be verified`,
    );
    return { verified: false };
  }

  const expected = parseChecksum(checksum);
  const actual = await computeDigest(open(), expected.algorithm);
  if (actual !== expected.digest) {
    throw new IntegrityError(
      `Could not verify data integrity of '${label}': invalid checksum\n` +
        `  expected: ${expected.algorithm}:${expected.digest}\n` +
        `  got:      ${expected.algorithm}:${actual}`,
    );
  }
  return { verified: true, digest: actual };
}
