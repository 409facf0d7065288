/**
 * Remote resource fetcher.
 *
 * A destination that already exists is a cache hit: no transport call is
 * made. Downloads land in `<destination>.part` and are renamed into place
 * only once complete, so an interrupted download never looks like a cached
 * file. A `.part` left by a killed process is overwritten by the next attempt.
 */

import { createWriteStream } from "node:fs";
import { mkdir, rename, rm } from "node:fs/promises";
import { basename, dirname } from "node:path";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import type { Artifact, RemoteResource } from "../types/index.js";
import { fileExists } from "../artifacts/index.js";
import { createSilentLogger, type Logger } from "../logging/index.js";

export class FetchError extends Error {
  public readonly url: string;
  public readonly status?: number;

  constructor(message: string, url: string, status?: number, options?: ErrorOptions) {
    super(message, options);
    this.name = "FetchError";
    this.url = url;
    this.status = status;
  }
}

export interface HttpResponse {
  readonly status: number;
  readonly statusText: string;
  readonly body: AsyncIterable<Uint8Array> | null;
  /** Release the body without reading it */
  discard(): Promise<void>;
}

/**
 * Minimal HTTP GET abstraction, so tests can count and stub requests.
 */
export interface HttpTransport {
  get(url: string): Promise<HttpResponse>;
}

/**
 * Transport backed by the global fetch of Node.js.
 */
export const fetchTransport: HttpTransport = {
  async get(url: string): Promise<HttpResponse> {
    const response = await fetch(url, { redirect: "follow" });
    return {
      status: response.status,
      statusText: response.statusText,
      body: response.body,
      discard: async () => {
        await response.body?.cancel();
      },
    };
  },
};

export interface FetcherOptions {
  transport?: HttpTransport;
  logger?: Logger;
}

export class Fetcher {
  private readonly transport: HttpTransport;
  private readonly logger: Logger;

  constructor(options: FetcherOptions = {}) {
    this.transport = options.transport ?? fetchTransport;
    this.logger = options.logger ?? createSilentLogger();
  }

  /**
   * Make `url` available at `destination`.
   *
   * @throws FetchError on a non-2xx response or an I/O failure
   */
  async fetch(url: string, destination: string): Promise<Artifact> {
    const artifact: Artifact = { name: basename(destination), path: destination };

    if (await fileExists(destination)) {
      this.logger.debug("Download cached", { url, destination });
      return artifact;
    }

    const tmpPath = `${destination}.part`;
    try {
      await mkdir(dirname(destination), { recursive: true });
    } catch (err) {
      throw new FetchError(`Cannot create directory for ${destination}`, url, undefined, {
        cause: err,
      });
    }

    this.logger.info("Downloading", { url, destination });

    let response: HttpResponse;
    try {
      response = await this.transport.get(url);
    } catch (err) {
      throw new FetchError(`Request failed for ${url}`, url, undefined, { cause: err });
    }

    if (response.status < 200 || response.status >= 300) {
      await this.discard(response, url);
      throw new FetchError(
        `Download of ${url} failed: ${response.status} ${response.statusText}`.trim(),
        url,
        response.status
      );
    }
    if (response.body === null) {
      await this.discard(response, url);
      throw new FetchError(`Download of ${url} returned no body`, url, response.status);
    }

    try {
      await pipeline(Readable.from(response.body), createWriteStream(tmpPath));
      await rename(tmpPath, destination);
    } catch (err) {
      await rm(tmpPath, { force: true });
      throw new FetchError(`Failed to write ${destination}`, url, response.status, {
        cause: err,
      });
    }

    this.logger.info("Download complete", { destination });
    return artifact;
  }

  fetchResource(resource: RemoteResource): Promise<Artifact> {
    return this.fetch(resource.url, resource.destination);
  }

  private async discard(response: HttpResponse, url: string): Promise<void> {
    try {
      await response.discard();
    } catch (err) {
      this.logger.debug("Could not release response body", {
        url,
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }
}
