import Fastify, { type FastifyInstance, type FastifyRequest } from "fastify";
import { FixedClock } from "./adapters/inmemory/fixed-clock.js";
import { TimeOfDayService } from "./application/time-of-day.js";
import { normalizeUtcOffsetMinutes, readQueryParam } from "./api/validators.js";
import { AppError } from "./infra/app-error.js";
import { SystemClock, type ClockPort } from "./infra/clock.js";
import { loadRuntimeConfig, type RuntimeConfig } from "./infra/config.js";
import { ClockMetricsRegistry, UNMATCHED_ROUTE } from "./infra/metrics.js";

export type ClockSourceLabel = "system" | "fixed" | "custom";

export interface AppDependencies {
  clock?: ClockPort;
  metrics?: ClockMetricsRegistry;
}

function resolveClock(config: RuntimeConfig, deps: AppDependencies): ClockPort {
  if (deps.clock) {
    return deps.clock;
  }
  if (config.clockSource === "fixed") {
    if (!config.fixedInstant) {
      throw new AppError(500, "invalid_runtime_config", "Fixed clock requested without a fixed instant.");
    }
    return new FixedClock(config.fixedInstant);
  }
  return new SystemClock();
}

export function clockSourceLabel(clock: ClockPort): ClockSourceLabel {
  if (clock instanceof FixedClock) {
    return "fixed";
  }
  if (clock instanceof SystemClock) {
    return "system";
  }
  return "custom";
}

export function buildApp(
  config: RuntimeConfig = loadRuntimeConfig(),
  deps: AppDependencies = {},
): FastifyInstance {
  const app = Fastify({ logger: { level: config.logLevel } });
  const metrics = deps.metrics ?? new ClockMetricsRegistry();
  const requestStartNs = new WeakMap<FastifyRequest, bigint>();

  const clock = resolveClock(config, deps);
  const source = clockSourceLabel(clock);
  const timeOfDay = new TimeOfDayService(clock, { utcOffsetMinutes: config.utcOffsetMinutes });

  app.get("/health/live", async (_, reply) => {
    return reply.status(200).send({ status: "ok" });
  });

  app.get("/health/ready", async (_, reply) => {
    return reply.status(200).send({ status: "ready" });
  });

  app.addHook("onRequest", async (request, reply) => {
    requestStartNs.set(request, process.hrtime.bigint());
    if (request.url.startsWith("/v1/")) {
      reply.header("X-Request-Id", request.id);
    }
  });

  app.addHook("onResponse", async (request, reply) => {
    if (!config.metricsEnabled) {
      return;
    }
    const startNs = requestStartNs.get(request);
    if (startNs === undefined) {
      return;
    }
    const durationSeconds = Number(process.hrtime.bigint() - startNs) / 1_000_000_000;
    const route = request.is404 ? UNMATCHED_ROUTE : request.routeOptions.url ?? UNMATCHED_ROUTE;
    metrics.recordHttpRequest(request.method, route, reply.statusCode, durationSeconds);
  });

  app.get("/v1/clock/now", async (_, reply) => {
    const now = clock.now();
    return reply.status(200).send({
      now: now.toIsoString(),
      epoch_ms: now.epochMilliseconds,
      source,
    });
  });

  app.get("/v1/time-of-day", async (request, reply) => {
    const utcOffsetMinutes = normalizeUtcOffsetMinutes(
      readQueryParam(request.query, "utc_offset_minutes"),
      config.utcOffsetMinutes,
    );
    const snapshot = timeOfDay.withUtcOffset(utcOffsetMinutes).snapshot();
    if (config.metricsEnabled) {
      metrics.recordTimeOfDayRead(snapshot.period);
    }
    return reply.status(200).send({
      instant: snapshot.instant.toIsoString(),
      hour: snapshot.hour,
      period: snapshot.period,
      utc_offset_minutes: snapshot.utcOffsetMinutes,
    });
  });

  if (config.metricsEnabled) {
    app.get("/metrics", async (_request, reply) => {
      const payload = metrics.renderPrometheus();
      return reply
        .header("Content-Type", "text/plain; version=0.0.4; charset=utf-8")
        .status(200)
        .send(payload);
    });
  }

  app.setNotFoundHandler(async (_, reply) => {
    return reply.status(404).send({
      error: {
        code: "resource_not_found",
        message: "Route not found.",
      },
    });
  });

  app.setErrorHandler(async (error, request, reply) => {
    if (error instanceof AppError) {
      return reply.status(error.statusCode).send({
        error: {
          code: error.code,
          message: error.message,
          request_id: request.id,
        },
      });
    }
    request.log.error({ err: error }, "Unhandled error");
    return reply.status(500).send({
      error: {
        code: "internal_server_error",
        message: "Unexpected error.",
        request_id: request.id,
      },
    });
  });

  return app;
}
