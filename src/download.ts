import fs from "fs";
import path from "path";
import { Readable } from "stream";
import { pipeline } from "stream/promises";
import { fetch as undiciFetch } from "undici";

import { DownloadError, UnsupportedMethodError } from "./errors";

export type DownloadRequestInit = {
  headers: Record<string, string>;
  redirect: "follow";
};

/** the subset of a fetch Response used for downloads */
export type DownloadResponse = {
  ok: boolean;
  status: number;
  statusText: string;
  headers: { get(name: string): string | null };
  body: AsyncIterable<Uint8Array> | null;
};

export type DownloadFetch = (url: string, init: DownloadRequestInit) => Promise<DownloadResponse>;

export const defaultFetch: DownloadFetch = (url, init) => undiciFetch(url, init);

export type DownloadOptions = {
  /** fetch implementation (defaults to undici) */
  fetch?: DownloadFetch;
  /** called once the response headers are in, with the announced size */
  onStart?: (totalBytes: number | null) => void;
};

/** Derive a local file name from the last url path segment. */
export function archiveFileName(url: string): string {
  let base = "";
  try {
    base = path.posix.basename(new URL(url).pathname);
  } catch {
    base = "";
  }
  const safe = base.replace(/[^a-zA-Z0-9._-]+/g, "-").replace(/^[-.]+/, "");
  return safe.length > 0 ? safe : "source.tar";
}

export function assertHttpUrl(url: string): URL {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new UnsupportedMethodError(url, `Invalid source url '${url}'`);
  }
  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new UnsupportedMethodError(
      parsed.protocol,
      `Unsupported url scheme '${parsed.protocol}' for tarball source ${url} (expected http or https)`,
    );
  }
  return parsed;
}

/**
 * Download `url` into `destDir` and return the local path.
 */
export async function downloadFile(
  url: string,
  destDir: string,
  options: DownloadOptions = {},
): Promise<string> {
  assertHttpUrl(url);
  const fetcher = options.fetch ?? defaultFetch;

  let response: DownloadResponse;
  try {
    response = await fetcher(url, {
      headers: { "User-Agent": "hearth-fetch" },
      redirect: "follow",
    });
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new DownloadError(url, `Failed to download ${url}: ${message}`, { cause: err });
  }

  if (!response.ok || !response.body) {
    throw new DownloadError(
      url,
      `Failed to download ${url}: HTTP ${response.status} ${response.statusText}`.trimEnd(),
      { status: response.status },
    );
  }

  const rawContentLength = response.headers.get("content-length");
  options.onStart?.(
    rawContentLength && /^\d+$/.test(rawContentLength) ? Number.parseInt(rawContentLength, 10) : null,
  );

  fs.mkdirSync(destDir, { recursive: true });
  const filePath = path.join(destDir, archiveFileName(url));

  try {
    await pipeline(Readable.from(response.body), fs.createWriteStream(filePath));
  } catch (err) {
    fs.rmSync(filePath, { force: true });
    const message = err instanceof Error ? err.message : String(err);
    throw new DownloadError(url, `Failed to download ${url}: ${message}`, { cause: err });
  }

  return filePath;
}
