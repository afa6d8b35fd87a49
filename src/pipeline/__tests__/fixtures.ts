import { defineContract } from "../../shared/record.js";

export const sampleContract = defineContract({
  name: "samples",
  table: "samples",
  naturalKey: ["id"],
  fields: [
    { name: "id", source: "id", type: "integer", required: true },
    { name: "value", source: "value", type: "integer", required: true, rules: { min: 0 } }
  ]
});

export const jsonResponse = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), { status, headers: { "content-type": "application/json" } });

type Handler = (url: URL, call: number, init?: RequestInit) => Response | Promise<Response>;

// Records each requested URL and answers from `handler`.
export const fakeFetch = (handler: Handler) => {
  const calls: string[] = [];
  const inits: Array<RequestInit | undefined> = [];
  const fetchImpl: typeof fetch = async (input, init) => {
    const url = new URL(input instanceof Request ? input.url : String(input));
    calls.push(url.toString());
    inits.push(init);
    return handler(url, calls.length, init);
  };
  return { fetch: fetchImpl, calls, inits };
};

export const recordSleeps = () => {
  const delays: number[] = [];
  const sleep = async (ms: number) => {
    delays.push(ms);
  };
  return { sleep, delays };
};
