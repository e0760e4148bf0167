// src/routes/health.ts

import type { FastifyInstance } from "fastify";

import type { UploadStateStore } from "../state/upload.state.store.js";
import type { VirusScanner } from "../services/scan/scanner.js";

export interface HealthRouteOptions {
  state: UploadStateStore;
  scanner: VirusScanner;
}

export default async function healthRoute(app: FastifyInstance, opts: HealthRouteOptions) {
  const { state, scanner } = opts;

  app.get("/health", async (req, reply) => {
    const timestamp = new Date().toISOString();

    const stateStart = Date.now();
    let stateOk = false;
    let stateLatencyMs: number | null = null;

    try {
      await state.ping();
      stateOk = true;
      stateLatencyMs = Date.now() - stateStart;
    } catch (err) {
      req.log.error({ err }, "State backend health check failed");
    }

    // An unreachable scanner degrades the service; uploads still complete unscanned.
    const scannerOk = await scanner.ping().catch((err: unknown) => {
      req.log.warn({ err }, "Scanner health check failed");
      return false;
    });

    const status = !stateOk ? "DOWN" : scannerOk ? "UP" : "DEGRADED";

    return reply.status(stateOk ? 200 : 503).send({
      status,
      ready: stateOk,
      timestamp,
      checks: {
        state: {
          ok: stateOk,
          latencyMs: stateLatencyMs,
        },
        scanner: {
          ok: scannerOk,
          name: scanner.name,
        },
      },
    });
  });
}
