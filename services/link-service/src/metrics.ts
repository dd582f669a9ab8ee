import client from "prom-client";

export const registry = new client.Registry();

client.collectDefaultMetrics({ register: registry });

export const httpRequestsTotal = new client.Counter({
  name: "http_requests_total",
  help: "Total number of HTTP requests",
  labelNames: ["method", "route", "status_code"] as const,
  registers: [registry],
});

export const httpRequestDurationSeconds = new client.Histogram({
  name: "http_request_duration_seconds",
  help: "HTTP request duration in seconds",
  labelNames: ["method", "route", "status_code"] as const,
  buckets: [0.001, 0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10],
  registers: [registry],
});

export const shortLinksCreatedTotal = new client.Counter({
  name: "short_links_created_total",
  help: "Short links written to the store",
  registers: [registry],
});

// hit = redirected, miss = 404
export const shortLinkLookupsTotal = new client.Counter({
  name: "short_link_lookups_total",
  help: "Short code lookups by outcome",
  labelNames: ["result"] as const,
  registers: [registry],
});
