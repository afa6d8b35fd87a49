import { describe, it, expect } from "vitest";
import { CancelledError, ParseError, TransportError } from "../../shared/errors.js";
import { silentLogger } from "../../shared/logger.js";
import { buildUrl, extract, type SourceConfig } from "../extract.js";
import { fakeFetch, jsonResponse, recordSleeps } from "./fixtures.js";

const stopsSource: SourceConfig = {
  baseUrl: "https://api.test/Bus.svc/json/",
  endpoint: "jStops",
  recordsField: "Stops",
  headers: { api_key: "test-key" },
  retry: { maxAttempts: 3, baseDelayMs: 100, maxDelayMs: 1_000 }
};

const delay = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

describe("buildUrl", () => {
  it("joins base and endpoint and applies params", () => {
    expect(buildUrl({ ...stopsSource, params: { Radius: 500 } }, { page: 2 }).toString()).toBe(
      "https://api.test/Bus.svc/json/jStops?Radius=500&page=2"
    );
  });
});

describe("extract", () => {
  it("unwraps the records envelope and sends the configured headers", async () => {
    const api = fakeFetch(() => jsonResponse({ Stops: [{ StopID: "1" }, { StopID: "2" }] }));

    const result = await extract(stopsSource, { fetch: api.fetch, logger: silentLogger });

    expect(result).toEqual({ records: [{ StopID: "1" }, { StopID: "2" }], pages: 1 });
    expect(api.calls).toEqual(["https://api.test/Bus.svc/json/jStops"]);
    expect(new Headers(api.inits[0]?.headers).get("api_key")).toBe("test-key");
  });

  it("treats a bare object body as one record when no envelope is configured", async () => {
    const api = fakeFetch(() => jsonResponse({ StopID: "9" }));

    const result = await extract({ baseUrl: "https://api.test", endpoint: "stop" }, { fetch: api.fetch, logger: silentLogger });

    expect(result.records).toEqual([{ StopID: "9" }]);
  });

  it("succeeds when failures stay below the attempt ceiling", async () => {
    const api = fakeFetch((_url, call) => (call <= 2 ? jsonResponse({ error: "busy" }, 503) : jsonResponse({ Stops: [] })));
    const sleeps = recordSleeps();

    const result = await extract(stopsSource, { fetch: api.fetch, sleep: sleeps.sleep, logger: silentLogger });

    expect(result.records).toEqual([]);
    expect(api.calls).toHaveLength(3);
    expect(sleeps.delays).toEqual([100, 200]);
  });

  it("fails once failures reach the attempt ceiling", async () => {
    const api = fakeFetch(() => new Response("upstream down", { status: 503 }));
    const sleeps = recordSleeps();

    const error = await extract(stopsSource, { fetch: api.fetch, sleep: sleeps.sleep, logger: silentLogger }).catch(
      (caught: unknown) => caught
    );

    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({ status: 503, bodyExcerpt: "upstream down", retryable: true });
    expect(api.calls).toHaveLength(3);
  });

  it("never retries a client error", async () => {
    const api = fakeFetch(() => new Response("invalid key", { status: 401 }));
    const sleeps = recordSleeps();

    const error = await extract(stopsSource, { fetch: api.fetch, sleep: sleeps.sleep, logger: silentLogger }).catch(
      (caught: unknown) => caught
    );

    expect(error).toMatchObject({ status: 401, retryable: false, bodyExcerpt: "invalid key" });
    expect(api.calls).toHaveLength(1);
    expect(sleeps.delays).toEqual([]);
  });

  it("retries network failures", async () => {
    const api = fakeFetch((_url, call) => {
      if (call === 1) throw new TypeError("fetch failed");
      return jsonResponse({ Stops: [{ StopID: "1" }] });
    });
    const sleeps = recordSleeps();

    const result = await extract(stopsSource, { fetch: api.fetch, sleep: sleeps.sleep, logger: silentLogger });

    expect(result.records).toEqual([{ StopID: "1" }]);
    expect(sleeps.delays).toEqual([100]);
  });

  it("reports a timeout as a transport error", async () => {
    const api = fakeFetch(
      (_url, _call, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener("abort", () => reject(new Error("aborted")));
        })
    );

    const error = await extract(
      { ...stopsSource, timeoutMs: 10, retry: { maxAttempts: 1 } },
      { fetch: api.fetch, logger: silentLogger }
    ).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({ code: "ETIMEDOUT", retryable: true });
  });

  it("fails without retrying when the body is not JSON", async () => {
    const api = fakeFetch(() => new Response("<html>maintenance</html>", { status: 200 }));

    const error = await extract(stopsSource, { fetch: api.fetch, logger: silentLogger }).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ParseError);
    expect(error).toMatchObject({ expected: "a JSON body" });
    expect(api.calls).toHaveLength(1);
  });

  it("fails when the envelope field is missing", async () => {
    const api = fakeFetch(() => jsonResponse({ Message: "Access denied" }));

    const error = await extract(stopsSource, { fetch: api.fetch, logger: silentLogger }).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ParseError);
    expect(error).toMatchObject({ expected: 'an array at "Stops"', found: "undefined" });
  });

  it("fails when the body is a scalar", async () => {
    const api = fakeFetch(() => jsonResponse(42));

    const error = await extract({ baseUrl: "https://api.test", endpoint: "x" }, { fetch: api.fetch, logger: silentLogger }).catch(
      (caught: unknown) => caught
    );

    expect(error).toMatchObject({ expected: "an object or an array of objects", found: "number" });
  });

  it("reassembles concurrently fetched offset pages in page order", async () => {
    const pages: Record<string, { ms: number; rows: string[] }> = {
      "0": { ms: 30, rows: ["a", "b"] },
      "2": { ms: 10, rows: ["c", "d"] },
      "4": { ms: 0, rows: ["e"] }
    };
    const api = fakeFetch(async (url) => {
      const page = pages[url.searchParams.get("offset") ?? ""];
      await delay(page.ms);
      return jsonResponse(page.rows.map((id) => ({ id })));
    });

    const result = await extract(
      {
        baseUrl: "https://api.test",
        endpoint: "records",
        concurrency: 3,
        pagination: { mode: "offset", offsetParam: "offset", limitParam: "limit", pageSize: 2 }
      },
      { fetch: api.fetch, logger: silentLogger }
    );

    expect(result.pages).toBe(3);
    expect(result.records).toEqual([{ id: "a" }, { id: "b" }, { id: "c" }, { id: "d" }, { id: "e" }]);
  });

  it("drops pages fetched past the first short page", async () => {
    const rows: Record<string, string[]> = { "0": ["a", "b"], "2": ["c"], "4": ["stale"] };
    const api = fakeFetch((url) => jsonResponse((rows[url.searchParams.get("offset") ?? ""] ?? []).map((id) => ({ id }))));

    const result = await extract(
      {
        baseUrl: "https://api.test",
        endpoint: "records",
        concurrency: 3,
        pagination: { mode: "offset", offsetParam: "offset", limitParam: "limit", pageSize: 2 }
      },
      { fetch: api.fetch, logger: silentLogger }
    );

    expect(result.pages).toBe(2);
    expect(result.records).toEqual([{ id: "a" }, { id: "b" }, { id: "c" }]);
  });

  it("ignores an error from a page fetched past the last short page", async () => {
    const rows: Record<string, string[]> = { "0": ["a", "b"], "2": ["c"] };
    const api = fakeFetch((url) => {
      const page = rows[url.searchParams.get("offset") ?? ""];
      return page ? jsonResponse(page.map((id) => ({ id }))) : new Response("offset out of range", { status: 400 });
    });

    const result = await extract(
      {
        baseUrl: "https://api.test",
        endpoint: "records",
        concurrency: 3,
        pagination: { mode: "offset", offsetParam: "offset", limitParam: "limit", pageSize: 2 }
      },
      { fetch: api.fetch, logger: silentLogger }
    );

    expect(result).toEqual({ records: [{ id: "a" }, { id: "b" }, { id: "c" }], pages: 2 });
    expect(api.calls).toHaveLength(3);
  });

  it("fails when a page before the last one fails", async () => {
    const api = fakeFetch((url) =>
      url.searchParams.get("offset") === "2"
        ? new Response("bad request", { status: 400 })
        : jsonResponse([{ id: "a" }, { id: "b" }])
    );

    const error = await extract(
      {
        baseUrl: "https://api.test",
        endpoint: "records",
        concurrency: 3,
        pagination: { mode: "offset", offsetParam: "offset", limitParam: "limit", pageSize: 2, maxPages: 3 }
      },
      { fetch: api.fetch, logger: silentLogger }
    ).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({ status: 400 });
  });

  it("refuses a source concurrency that is not a positive integer", async () => {
    const api = fakeFetch(() => jsonResponse([]));

    await expect(
      extract(
        {
          baseUrl: "https://api.test",
          endpoint: "records",
          concurrency: Number.NaN,
          pagination: { mode: "offset", offsetParam: "offset", limitParam: "limit", pageSize: 2 }
        },
        { fetch: api.fetch, logger: silentLogger }
      )
    ).rejects.toThrow("Source concurrency must be a positive integer (got NaN)");
    expect(api.calls).toEqual([]);
  });

  it("follows a cursor until the API stops returning one", async () => {
    const api = fakeFetch((url) =>
      url.searchParams.get("cursor") === "abc"
        ? jsonResponse({ data: [{ id: 3 }], meta: { next: null } })
        : jsonResponse({ data: [{ id: 1 }, { id: 2 }], meta: { next: "abc" } })
    );

    const result = await extract(
      {
        baseUrl: "https://api.test",
        endpoint: "records",
        recordsField: "data",
        pagination: { mode: "cursor", cursorParam: "cursor", cursorField: "meta.next" }
      },
      { fetch: api.fetch, logger: silentLogger }
    );

    expect(result.records).toEqual([{ id: 1 }, { id: 2 }, { id: 3 }]);
    expect(api.calls).toEqual(["https://api.test/records", "https://api.test/records?cursor=abc"]);
  });

  it("fails when the API hands back a cursor it already gave", async () => {
    const api = fakeFetch(() => jsonResponse({ data: [{ id: 1 }], next: "same" }));

    const error = await extract(
      {
        baseUrl: "https://api.test",
        endpoint: "records",
        recordsField: "data",
        pagination: { mode: "cursor", cursorParam: "cursor", cursorField: "next" }
      },
      { fetch: api.fetch, logger: silentLogger }
    ).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ParseError);
    expect(error).toMatchObject({ expected: "a new pagination cursor", found: 'repeated cursor "same"' });
    expect(api.calls).toEqual(["https://api.test/records", "https://api.test/records?cursor=same"]);
  });

  it("stops at the page ceiling", async () => {
    const api = fakeFetch((_url, call) => jsonResponse({ data: [{ id: call }], next: `c${call}` }));

    const result = await extract(
      {
        baseUrl: "https://api.test",
        endpoint: "records",
        recordsField: "data",
        pagination: { mode: "cursor", cursorParam: "cursor", cursorField: "next", maxPages: 2 }
      },
      { fetch: api.fetch, logger: silentLogger }
    );

    expect(result).toEqual({ records: [{ id: 1 }, { id: 2 }], pages: 2 });
  });

  it("does not start when already cancelled", async () => {
    const api = fakeFetch(() => jsonResponse([]));
    const controller = new AbortController();
    controller.abort();

    await expect(extract(stopsSource, { fetch: api.fetch, signal: controller.signal, logger: silentLogger })).rejects.toBeInstanceOf(
      CancelledError
    );
    expect(api.calls).toEqual([]);
  });
});
