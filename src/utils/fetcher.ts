import { mkdir, readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { cacheFileName } from "../lib/canonicalId";
import { FetchError } from "../types/errors";
import { debug, info } from "./logger";

const RDF_ACCEPT = "text/turtle, application/rdf+xml, application/ld+json, */*";

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

interface FetchRequestOptions {
  minimal?: boolean;
  fetchFn?: FetchFn;
}

// The timer stays armed until `read` has consumed the response
async function timedFetch<T>(
  target: string,
  timeout: number,
  opts: FetchRequestOptions | undefined,
  read: (res: Response) => Promise<T>,
): Promise<T> {
  const fetchFn: FetchFn = opts?.fetchFn ?? fetch;
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeout);

  try {
    const res = await fetchFn(target, {
      signal: controller.signal,
      redirect: "follow",
      headers: { Accept: opts?.minimal ? "*/*" : RDF_ACCEPT },
    });
    if (!res.ok) throw new FetchError(target, `HTTP ${res.status} ${res.statusText}`.trim(), res.status);
    return await read(res);
  } catch (err) {
    if (err instanceof FetchError) throw err;
    throw new FetchError(target, err instanceof Error ? err.message : String(err));
  } finally {
    clearTimeout(timer);
  }
}

/**
 * doFetch - fetch wrapper with timeout and an RDF-friendly Accept header.
 * Network failures and non-OK responses become FetchError. The timeout only
 * covers the response headers; use fetchText to bound the body as well.
 */
export function doFetch(target: string, timeout: number, opts?: FetchRequestOptions): Promise<Response> {
  return timedFetch(target, timeout, opts, (res) => Promise.resolve(res));
}

/** Fetch and read the body under one timeout. */
export function fetchText(target: string, timeout: number, opts?: FetchRequestOptions): Promise<string> {
  return timedFetch(target, timeout, opts, (res) => res.text());
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export interface FetcherOptions {
  cacheDir: string;
  /** Wait between two uncached downloads. */
  delayMs: number;
  timeoutMs: number;
  fetchFn?: FetchFn;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Fetch-or-reuse for external vocabularies. A download is written to
 * `<cacheDir>/<cacheFileName(url)>` and every later request for the same URL reads
 * that file. Cached files are never refreshed.
 */
export class CachingFetcher {
  private readonly options: FetcherOptions;
  private downloaded = 0;

  constructor(options: FetcherOptions) {
    this.options = options;
  }

  cachePath(url: string): string {
    return join(this.options.cacheDir, cacheFileName(url));
  }

  get downloads(): number {
    return this.downloaded;
  }

  async fetchOrReuse(url: string): Promise<string> {
    const path = this.cachePath(url);
    try {
      const cached = await readFile(path, "utf-8");
      debug("fetch.cacheHit", { url, path });
      return cached;
    } catch (err) {
      if (!isMissingFile(err)) throw err;
    }

    if (this.downloaded > 0 && this.options.delayMs > 0) {
      await (this.options.sleep ?? defaultSleep)(this.options.delayMs);
    }
    const text = await fetchText(url, this.options.timeoutMs, { fetchFn: this.options.fetchFn });
    this.downloaded += 1;

    await mkdir(this.options.cacheDir, { recursive: true });
    await writeFile(path, text, "utf-8");
    info("fetch.downloaded", { url, path, bytes: text.length });
    return text;
  }
}
