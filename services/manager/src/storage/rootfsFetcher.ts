import fs from "node:fs";
import fsp from "node:fs/promises";
import path from "node:path";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import type { Logger } from "../logging/logger.js";
import { ConfigurationError, errorMessage } from "../errors/vmmErrors.js";
import type { RootfsFetcher } from "../types/interfaces.js";

const MAX_REDIRECTS = 5;

export interface HttpRootfsFetcherOptions {
  logger: Logger;
  /** How long to wait for response headers; the body may take as long as it needs. */
  timeoutMs?: number;
}

/**
 * Streams a rootfs image over HTTP(S) to disk. The local file is named after the last
 * path segment of the URL.
 */
export class HttpRootfsFetcher implements RootfsFetcher {
  constructor(private readonly options: HttpRootfsFetcherOptions) {}

  async fetch(url: string, destDir: string): Promise<string> {
    const parsed = parseRootfsUrl(url);
    const filename = path.posix.basename(parsed.pathname);
    if (!filename) {
      throw new ConfigurationError(`Rootfs URL has no file name: ${url}`, { field: "rootfsUrl" });
    }
    const dest = path.join(destDir, filename);
    await fsp.mkdir(destDir, { recursive: true });

    this.options.logger.info({ url, dest }, "downloading rootfs");
    try {
      const body = await this.open(parsed);
      await pipeline(Readable.fromWeb(body), fs.createWriteStream(dest, { mode: 0o644 }));
    } catch (err) {
      await fsp.rm(dest, { force: true });
      if (err instanceof ConfigurationError) throw err;
      throw new ConfigurationError(`Failed to download rootfs from ${url}: ${describeFetchError(err)}`, {
        field: "rootfsUrl",
        cause: err
      });
    }
    return dest;
  }

  /** Follows redirects by hand so the hop count and every target's scheme are checked. */
  private async open(url: URL): Promise<NonNullable<Response["body"]>> {
    let current = url;
    for (let redirects = 0; ; redirects++) {
      const response = await this.request(current);
      const location = response.headers.get("location");
      if (response.status >= 300 && response.status < 400 && location) {
        await response.body?.cancel();
        if (redirects >= MAX_REDIRECTS) {
          throw new ConfigurationError(`Too many redirects fetching ${url.href}`, { field: "rootfsUrl" });
        }
        current = parseRootfsUrl(new URL(location, current).href);
        continue;
      }
      if (!response.ok || !response.body) {
        await response.body?.cancel();
        throw new ConfigurationError(`Failed to download rootfs from ${current.href}: HTTP ${response.status}`, {
          field: "rootfsUrl"
        });
      }
      return response.body;
    }
  }

  private async request(url: URL): Promise<Response> {
    const controller = new AbortController();
    const t = setTimeout(() => controller.abort(), this.options.timeoutMs ?? 10_000);
    try {
      return await fetch(url, { redirect: "manual", signal: controller.signal });
    } finally {
      clearTimeout(t);
    }
  }
}

function describeFetchError(err: unknown): string {
  // fetch reports transport failures as "fetch failed" with the reason in `cause`.
  if (err instanceof Error && err.cause instanceof Error) return `${err.message}: ${err.cause.message}`;
  return errorMessage(err);
}

export function parseRootfsUrl(raw: string): URL {
  let url: URL;
  try {
    url = new URL(raw);
  } catch {
    throw new ConfigurationError(`Invalid URL: ${raw}`, { field: "rootfsUrl" });
  }
  if (url.protocol !== "http:" && url.protocol !== "https:") {
    throw new ConfigurationError(`Invalid URL: ${raw}`, { field: "rootfsUrl" });
  }
  return url;
}
