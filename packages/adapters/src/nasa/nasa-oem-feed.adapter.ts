import { setTimeout as sleep } from 'node:timers/promises';
import { fetch } from 'undici';
import type { Dispatcher } from 'undici';
import type { TrajectoryDataset, TrajectorySourcePort } from '@iss-tracker/domain';
import { FeedFetchError } from '../errors.js';
import { parseOem } from '../oem/parse-oem.js';

export const NASA_ISS_OEM_XML_URL =
  'https://nasa-public-data.s3.amazonaws.com/iss-coords/current/ISS_OEM/ISS.OEM_J2K_EPH.xml';

export interface NasaOemFeedOptions {
  url?: string;
  /** Per-attempt timeout */
  timeoutMs?: number;
  /** Attempts after the first one */
  maxRetries?: number;
  /** Delay before retry n is n * retryDelayMs */
  retryDelayMs?: number;
  /** undici dispatcher; tests pass a MockAgent */
  dispatcher?: Dispatcher;
}

/**
 * Fetches the published ISS ephemeris and parses it (XML or KVN).
 * Transport failures and non-2xx responses are retried with linear backoff;
 * a document that fails to parse is not.
 */
export class NasaOemFeedAdapter implements TrajectorySourcePort {
  readonly description: string;
  private readonly url: string;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly dispatcher?: Dispatcher;

  constructor(opts: NasaOemFeedOptions = {}) {
    this.url = opts.url ?? NASA_ISS_OEM_XML_URL;
    this.timeoutMs = opts.timeoutMs ?? 15_000;
    this.maxRetries = opts.maxRetries ?? 3;
    this.retryDelayMs = opts.retryDelayMs ?? 2_000;
    this.dispatcher = opts.dispatcher;
    this.description = this.url;
  }

  async fetchDataset(): Promise<TrajectoryDataset> {
    const body = await this.fetchBody();
    const dataset = parseOem(body);
    console.log(`[oem-feed] parsed ${dataset.stateVectors.length} state vectors from ${this.url}`);
    return dataset;
  }

  private async fetchBody(): Promise<string> {
    const attempts = this.maxRetries + 1;
    let lastError: unknown;

    for (let attempt = 1; attempt <= attempts; attempt++) {
      try {
        const res = await fetch(this.url, {
          dispatcher: this.dispatcher,
          signal: AbortSignal.timeout(this.timeoutMs),
        });
        if (!res.ok) {
          // drain so the connection can be reused
          await res.text();
          throw new Error(`HTTP ${res.status} ${res.statusText}`.trim());
        }
        return await res.text();
      } catch (err) {
        lastError = err;
        console.warn(
          `[oem-feed] attempt ${attempt}/${attempts} failed:`,
          err instanceof Error ? err.message : err,
        );
        if (attempt < attempts && this.retryDelayMs > 0) {
          await sleep(this.retryDelayMs * attempt);
        }
      }
    }

    throw new FeedFetchError(this.url, attempts, { cause: lastError });
  }
}
