import { z } from "zod";
import { CancelledError, ParseError, TransportError, getErrorCode, getErrorMessage } from "../shared/errors.js";
import type { Logger } from "../shared/logger.js";
import { isRawRecord } from "../shared/record.js";
import { assertPositiveInteger, mapWithConcurrency } from "./concurrency.js";

const USER_AGENT = "transit-ingest/0.1";
const DEFAULT_TIMEOUT_MS = 15_000;
const DEFAULT_MAX_PAGES = 100;
const BODY_EXCERPT_LENGTH = 200;

export type PaginationConfig =
  | { mode: "none" }
  | { mode: "offset"; offsetParam: string; limitParam: string; pageSize: number; maxPages?: number }
  | { mode: "cursor"; cursorParam: string; cursorField: string; maxPages?: number };

export type RetryPolicy = {
  // Total attempts per page, first one included
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
};

export const DEFAULT_RETRY: RetryPolicy = { maxAttempts: 4, baseDelayMs: 500, maxDelayMs: 8_000 };

export type SourceConfig = {
  baseUrl: string;
  endpoint: string;
  params?: Record<string, string | number>;
  headers?: Record<string, string>;
  // Envelope field holding the record array, e.g. { "Stops": [...] }
  recordsField?: string;
  timeoutMs?: number;
  pagination?: PaginationConfig;
  retry?: Partial<RetryPolicy>;
  // Offset pages fetched at once
  concurrency?: number;
};

export type ExtractDeps = {
  fetch?: typeof fetch;
  logger?: Logger;
  signal?: AbortSignal;
  sleep?: (ms: number) => Promise<void>;
};

export type ExtractResult = {
  records: unknown[];
  pages: number;
};

type Page = {
  records: unknown[];
  nextCursor: string | null;
};

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

const PayloadSchema = z.union([z.array(z.unknown()), z.record(z.string(), z.unknown())]);

const describeValue = (value: unknown): string => {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
};

const readPath = (payload: Record<string, unknown>, path: string): unknown => {
  let current: unknown = payload;
  for (const segment of path.split(".")) {
    if (!isRawRecord(current) || !Object.prototype.hasOwnProperty.call(current, segment)) return undefined;
    current = current[segment];
  }
  return current;
};

export const buildUrl = (source: SourceConfig, extraParams: Record<string, string | number> = {}): URL => {
  const base = source.baseUrl.replace(/\/+$/, "");
  const endpoint = source.endpoint.replace(/^\/+/, "");
  const url = new URL(endpoint ? `${base}/${endpoint}` : base);
  for (const [key, value] of Object.entries({ ...source.params, ...extraParams })) {
    url.searchParams.set(key, String(value));
  }
  return url;
};

export const parsePage = (body: string, source: SourceConfig, url: string): Page => {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch {
    throw new ParseError("a JSON body", `text starting ${JSON.stringify(body.slice(0, 40))}`, url);
  }

  const payload = PayloadSchema.safeParse(json);
  if (!payload.success) {
    throw new ParseError("an object or an array of objects", describeValue(json), url);
  }
  const data = payload.data;
  if (Array.isArray(data)) {
    return { records: data, nextCursor: null };
  }

  let records: unknown[] = [data];
  if (source.recordsField) {
    const inner = readPath(data, source.recordsField);
    if (!Array.isArray(inner)) {
      throw new ParseError(`an array at "${source.recordsField}"`, describeValue(inner), url);
    }
    records = inner;
  }

  let nextCursor: string | null = null;
  if (source.pagination?.mode === "cursor") {
    const cursor = readPath(data, source.pagination.cursorField);
    if (typeof cursor === "string" || typeof cursor === "number") {
      nextCursor = String(cursor) || null;
    }
  }
  return { records, nextCursor };
};

const requestOnce = async (url: string, source: SourceConfig, fetchImpl: typeof fetch): Promise<string> => {
  const timeoutMs = source.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);

  let status: number;
  let ok: boolean;
  let body: string;
  try {
    const response = await fetchImpl(url, {
      headers: {
        Accept: "application/json",
        "User-Agent": USER_AGENT,
        ...source.headers
      },
      signal: controller.signal
    });
    status = response.status;
    ok = response.ok;
    body = await response.text();
  } catch (error) {
    const timedOut = controller.signal.aborted;
    throw new TransportError(
      timedOut ? `GET ${url} timed out after ${timeoutMs}ms` : `GET ${url} failed: ${getErrorMessage(error)}`,
      { url, code: timedOut ? "ETIMEDOUT" : getErrorCode(error), retryable: true },
      error
    );
  } finally {
    clearTimeout(timeout);
  }

  if (!ok) {
    throw new TransportError(`GET ${url} failed (${status})`, {
      url,
      status,
      bodyExcerpt: body.slice(0, BODY_EXCERPT_LENGTH),
      // 4xx is final
      retryable: status >= 500
    });
  }
  return body;
};

export const fetchPage = async (url: string, source: SourceConfig, deps: ExtractDeps = {}): Promise<Page> => {
  const policy: RetryPolicy = { ...DEFAULT_RETRY, ...source.retry };
  const fetchImpl = deps.fetch ?? fetch;
  const wait = deps.sleep ?? sleep;
  const logger = deps.logger ?? console;

  for (let attempt = 1; ; attempt += 1) {
    try {
      const body = await requestOnce(url, source, fetchImpl);
      return parsePage(body, source, url);
    } catch (error) {
      if (!(error instanceof TransportError) || !error.retryable || attempt >= policy.maxAttempts) {
        throw error;
      }
      const delay = Math.min(policy.baseDelayMs * 2 ** (attempt - 1), policy.maxDelayMs);
      logger.warn(`[extract] Attempt ${attempt}/${policy.maxAttempts} failed: ${error.message}. Retrying in ${delay}ms`);
      await wait(delay);
    }
  }
};

const assertNotCancelled = (signal: AbortSignal | undefined, where: string) => {
  if (signal?.aborted) {
    throw new CancelledError(where);
  }
};

type PageOutcome = { page: Page } | { error: unknown };

const extractOffsetPages = async (
  source: SourceConfig,
  pagination: Extract<PaginationConfig, { mode: "offset" }>,
  deps: ExtractDeps
): Promise<Page[]> => {
  const maxPages = pagination.maxPages ?? DEFAULT_MAX_PAGES;
  const concurrency = source.concurrency ?? 1;
  assertPositiveInteger("Source concurrency", concurrency);
  const pages: Page[] = [];

  let nextIndex = 0;
  while (nextIndex < maxPages) {
    assertNotCancelled(deps.signal, `page ${nextIndex}`);
    const indexes: number[] = [];
    for (let index = nextIndex; index < Math.min(nextIndex + concurrency, maxPages); index += 1) {
      indexes.push(index);
    }
    const wave = await mapWithConcurrency(indexes, concurrency, (index) =>
      fetchPage(
        buildUrl(source, {
          [pagination.offsetParam]: index * pagination.pageSize,
          [pagination.limitParam]: pagination.pageSize
        }).toString(),
        source,
        deps
      ).then(
        (page): PageOutcome => ({ page }),
        (error: unknown): PageOutcome => ({ error })
      )
    );
    // A short page is the last one; pages fetched past it are dropped, failed or not.
    for (const outcome of wave) {
      if ("error" in outcome) throw outcome.error;
      pages.push(outcome.page);
      if (outcome.page.records.length < pagination.pageSize) return pages;
    }
    nextIndex += indexes.length;
  }

  (deps.logger ?? console).warn(`[extract] Stopped at the page ceiling (${maxPages}) for ${buildUrl(source)}`);
  return pages;
};

const extractCursorPages = async (
  source: SourceConfig,
  pagination: Extract<PaginationConfig, { mode: "cursor" }>,
  deps: ExtractDeps
): Promise<Page[]> => {
  const maxPages = pagination.maxPages ?? DEFAULT_MAX_PAGES;
  const pages: Page[] = [];
  const seen = new Set<string>();
  let cursor: string | null = null;

  while (pages.length < maxPages) {
    assertNotCancelled(deps.signal, `page ${pages.length}`);
    const url = buildUrl(source, cursor === null ? {} : { [pagination.cursorParam]: cursor }).toString();
    const page = await fetchPage(url, source, deps);
    pages.push(page);
    if (page.nextCursor === null) return pages;
    if (seen.has(page.nextCursor)) {
      throw new ParseError("a new pagination cursor", `repeated cursor ${JSON.stringify(page.nextCursor)}`, url);
    }
    seen.add(page.nextCursor);
    cursor = page.nextCursor;
  }

  (deps.logger ?? console).warn(`[extract] Stopped at the page ceiling (${maxPages}) for ${buildUrl(source)}`);
  return pages;
};

/**
 * Fetches every page of the source and returns the records in page order.
 * Any page that still fails after its retries fails the whole extraction.
 */
export const extract = async (source: SourceConfig, deps: ExtractDeps = {}): Promise<ExtractResult> => {
  const logger = deps.logger ?? console;
  const pagination = source.pagination ?? { mode: "none" };

  let pages: Page[];
  if (pagination.mode === "offset") {
    pages = await extractOffsetPages(source, pagination, deps);
  } else if (pagination.mode === "cursor") {
    pages = await extractCursorPages(source, pagination, deps);
  } else {
    assertNotCancelled(deps.signal, "page 0");
    pages = [await fetchPage(buildUrl(source).toString(), source, deps)];
  }

  const records = pages.flatMap((page) => page.records);
  logger.log(`[extract] ${records.length} records from ${pages.length} page(s) of ${buildUrl(source)}`);
  return { records, pages: pages.length };
};
