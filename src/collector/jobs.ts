import { busPositions, busStopRoutes, busStops } from "../shared/contracts.js";
import type { SourceConfig } from "../pipeline/extract.js";
import type { PipelineJob } from "../pipeline/orchestrator.js";

export const JOB_NAMES = ["stops", "stop-routes", "positions"] as const;

export type JobName = (typeof JOB_NAMES)[number];

export type JobSettings = {
  apiBaseUrl: string;
  apiKey: string;
  apiKeyHeader: string;
  timeoutMs: number;
  maxAttempts: number;
  batchSize: number;
  failFast: boolean;
};

export const isJobName = (value: string): value is JobName => JOB_NAMES.some((name) => name === value);

const source = (settings: JobSettings, endpoint: string, recordsField: string): SourceConfig => ({
  baseUrl: settings.apiBaseUrl,
  endpoint,
  recordsField,
  headers: settings.apiKey ? { [settings.apiKeyHeader]: settings.apiKey } : {},
  timeoutMs: settings.timeoutMs,
  retry: { maxAttempts: settings.maxAttempts }
});

// Both feeds return their full set in a single response.
export const buildJob = (name: JobName, settings: JobSettings): PipelineJob => {
  const load = { batchSize: settings.batchSize, failFast: settings.failFast };
  switch (name) {
    case "stops":
      return { name, source: source(settings, "jStops", "Stops"), contract: busStops, load };
    case "stop-routes":
      return {
        name,
        source: source(settings, "jStops", "Stops"),
        contract: busStopRoutes,
        explode: { keyFields: ["StopID"], listField: "Routes" },
        load
      };
    case "positions":
      return { name, source: source(settings, "jBusPositions", "BusPositions"), contract: busPositions, load };
  }
};
