import http from "http";
import type { SourceStats } from "./application/admission/AdmissionController";

export type StatsPayload = {
  source: string;
  limit: number;
  active: number;
  success_count: number;
  error_count: number;
  error_rate_percent: number;
};

export const toStatsPayload = (stats: SourceStats): StatsPayload => ({
  source: stats.source,
  limit: stats.limit,
  active: stats.active,
  success_count: stats.successCount,
  error_count: stats.errorCount,
  error_rate_percent: stats.errorRatePercent
});

const sendJson = (res: http.ServerResponse, status: number, body: unknown) => {
  res.writeHead(status, { "content-type": "application/json" });
  res.end(JSON.stringify(body));
};

/**
 * Read-only view of the per-source admission state for dashboards.
 */
export const createServer = (deps: { listStats: () => Promise<SourceStats[]> }) => {
  return http.createServer((req, res) => {
    const pathname = new URL(req.url ?? "/", "http://localhost").pathname;

    if (req.method !== "GET") {
      sendJson(res, 405, { error: "method_not_allowed" });
      return;
    }
    if (pathname === "/health") {
      sendJson(res, 200, { ok: true });
      return;
    }
    if (pathname !== "/stats") {
      sendJson(res, 404, { error: "not_found" });
      return;
    }

    deps
      .listStats()
      .then((stats) => sendJson(res, 200, stats.map(toStatsPayload)))
      .catch((err: unknown) => {
        console.error(JSON.stringify({
          event: "stats.failed",
          message: err instanceof Error ? err.message : String(err)
        }));
        sendJson(res, 503, { error: "stats_unavailable" });
      });
  });
};
