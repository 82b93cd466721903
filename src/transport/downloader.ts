import fs from "node:fs";
import path from "node:path";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import { setTimeout as delay } from "node:timers/promises";
import { Agent, fetch, type Dispatcher, type Response } from "undici";
import { InstallerError } from "../core/errors.js";
import type { Reporter } from "../output/reporter.js";
import type { NetworkConfig } from "../types/config.js";
import { checkTransport } from "./transport-policy.js";

export const MAX_REDIRECTS = 10;
export const USER_AGENT = "fps-tracker-installer";

const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);
const RETRYABLE_STATUSES = new Set([408, 429]);

export type DownloaderOptions = {
  network: NetworkConfig;
  allowInsecureHttp: boolean;
  reporter?: Reporter;
  /**
   * Custom undici dispatcher. By default an Agent pinned to TLS 1.2+ whose
   * connect, headers and body timeouts are all `network.timeout_ms`.
   */
  dispatcher?: Dispatcher;
  sleep?: (ms: number) => Promise<unknown>;
};

type Attempt<T> =
  | { ok: true; value: T }
  | { ok: false; transient: boolean; error: InstallerError };

function describe(e: unknown): string {
  if (e instanceof Error) {
    const cause = e.cause instanceof Error ? ` (${e.cause.message})` : "";
    return `${e.message}${cause}`;
  }
  return String(e);
}

function ioError(message: string, e: unknown): InstallerError {
  return new InstallerError("IO_ERROR", `${message}: ${describe(e)}`, { cause: e });
}

function resolveLocation(location: string, base: URL): URL | null {
  try {
    return new URL(location, base);
  } catch {
    // malformed Location header
    return null;
  }
}

/**
 * HTTP(S) downloader enforcing the transport policy on every hop, with
 * idle timeouts and bounded fixed-delay retry for transient failures.
 * `timeout_ms` bounds connecting, waiting for headers and each gap between
 * body chunks, never the whole transfer.
 */
export class Downloader {
  private readonly network: NetworkConfig;
  private readonly allowInsecureHttp: boolean;
  private readonly reporter?: Reporter;
  private readonly dispatcher: Dispatcher;
  private readonly ownsDispatcher: boolean;
  private readonly sleep: (ms: number) => Promise<unknown>;

  constructor(opts: DownloaderOptions) {
    this.network = opts.network;
    this.allowInsecureHttp = opts.allowInsecureHttp;
    this.reporter = opts.reporter;
    this.ownsDispatcher = opts.dispatcher === undefined;
    this.dispatcher =
      opts.dispatcher ??
      new Agent({
        connect: { minVersion: "TLSv1.2", timeout: opts.network.timeout_ms },
        headersTimeout: opts.network.timeout_ms,
        bodyTimeout: opts.network.timeout_ms,
      });
    this.sleep = opts.sleep ?? ((ms) => delay(ms));
  }

  /**
   * Stream `url` into `dest`. The body lands in a sibling `.part` file that is
   * renamed into place once complete, so `dest` never holds a partial download.
   */
  async download(url: string, dest: string): Promise<void> {
    try {
      fs.mkdirSync(path.dirname(dest), { recursive: true });
    } catch (e) {
      throw ioError(`Could not create ${path.dirname(dest)}`, e);
    }

    const partial = `${dest}.${process.pid}.part`;
    await this.fetchWithRetry(url, (response) => this.writeBody(response, partial));

    try {
      fs.renameSync(partial, dest);
    } catch (e) {
      fs.rmSync(partial, { force: true });
      throw ioError(`Could not write ${dest}`, e);
    }
  }

  async fetchText(url: string): Promise<string> {
    return this.fetchWithRetry(url, (response) => response.text());
  }

  /**
   * Download an optional asset. Returns false when it cannot be fetched;
   * trust failures such as a refused insecure URL are still thrown.
   */
  async tryDownload(url: string, dest: string): Promise<boolean> {
    try {
      await this.download(url, dest);
      return true;
    } catch (e) {
      if (e instanceof InstallerError && e.code === "DOWNLOAD_ERROR") return false;
      throw e;
    }
  }

  async close(): Promise<void> {
    if (this.ownsDispatcher) await this.dispatcher.close();
  }

  private async writeBody(response: Response, partial: string): Promise<void> {
    const file = fs.createWriteStream(partial);
    const failure: { write?: unknown } = {};
    file.on("error", (e) => {
      failure.write = e;
    });

    try {
      if (response.body) {
        await pipeline(Readable.fromWeb(response.body), file);
      } else {
        await pipeline(Readable.from([]), file);
      }
    } catch (e) {
      fs.rmSync(partial, { force: true });
      if (failure.write !== undefined) throw ioError(`Could not write ${partial}`, failure.write);
      throw e;
    }
  }

  private async fetchWithRetry<T>(url: string, consume: (response: Response) => Promise<T>): Promise<T> {
    const attempts = this.network.attempts;
    let lastError: InstallerError | null = null;

    for (let attempt = 1; attempt <= attempts; attempt++) {
      const result = await this.fetchOnce(url, consume);
      if (result.ok) return result.value;

      lastError = result.error;
      if (!result.transient || attempt === attempts) break;

      this.reporter?.warn(
        "DOWNLOAD_RETRY",
        `${result.error.message} (attempt ${attempt}/${attempts}); retrying in ${this.network.retry_delay_ms}ms`,
        { url },
      );
      await this.sleep(this.network.retry_delay_ms);
    }

    throw lastError ?? new InstallerError("DOWNLOAD_ERROR", `Download failed: ${url}`);
  }

  private async fetchOnce<T>(url: string, consume: (response: Response) => Promise<T>): Promise<Attempt<T>> {
    let current = checkTransport(url, this.allowInsecureHttp);

    for (let hop = 0; hop <= MAX_REDIRECTS; hop++) {
      let response: Response;
      try {
        response = await fetch(current, {
          dispatcher: this.dispatcher,
          redirect: "manual",
          headers: { "user-agent": USER_AGENT },
        });
      } catch (e) {
        return {
          ok: false,
          transient: true,
          error: new InstallerError("DOWNLOAD_ERROR", `Network error for ${current.href}: ${describe(e)}`, { cause: e }),
        };
      }

      if (REDIRECT_STATUSES.has(response.status)) {
        const location = response.headers.get("location");
        await response.body?.cancel();
        const next = location === null ? null : resolveLocation(location, current);
        if (!next) {
          return {
            ok: false,
            transient: false,
            error: new InstallerError(
              "DOWNLOAD_ERROR",
              `Redirect from ${current.href} has no usable location: ${location ?? "(none)"}`,
            ),
          };
        }
        // Each hop goes through the transport policy again.
        current = checkTransport(next.href, this.allowInsecureHttp);
        continue;
      }

      if (!response.ok) {
        await response.body?.cancel();
        const status = response.status;
        return {
          ok: false,
          transient: status >= 500 || RETRYABLE_STATUSES.has(status),
          error: new InstallerError("DOWNLOAD_ERROR", `HTTP ${status} for ${current.href}`, { statusCode: status }),
        };
      }

      try {
        return { ok: true, value: await consume(response) };
      } catch (e) {
        if (e instanceof InstallerError) throw e;
        return {
          ok: false,
          transient: true,
          error: new InstallerError("DOWNLOAD_ERROR", `Interrupted download from ${current.href}: ${describe(e)}`, {
            cause: e,
          }),
        };
      }
    }

    return {
      ok: false,
      transient: false,
      error: new InstallerError("DOWNLOAD_ERROR", `Too many redirects for ${url}`),
    };
  }
}
