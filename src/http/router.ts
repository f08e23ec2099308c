import { HttpRouter, HttpServerRequest, HttpServerResponse } from "@effect/platform";
import { Effect } from "effect";
import { calculateDailyPerformanceMetrics, DailyPerformanceMetricsListSchema } from "../performance-metrics/index.js";
import { InvalidRequestError, formatParseError, metricsOutOfRangeError } from "./errors.js";
import { ErrorResponseSchema, PerformanceMetricsQuerySchema } from "./schema.js";

export const PERFORMANCE_METRICS_PATH = "/api/performance_metrics";

const errorResponse = (detail: string, status: number) =>
  HttpServerResponse.schemaJson(ErrorResponseSchema)({ detail }, { status });

const performanceMetrics = Effect.gen(function* () {
  const query = yield* HttpServerRequest.schemaSearchParams(PerformanceMetricsQuerySchema).pipe(
    Effect.mapError((error) => new InvalidRequestError({ message: formatParseError(error) })),
  );

  const days = yield* calculateDailyPerformanceMetrics({
    hourlyConsumption: query.hourly_consumption,
    dayTariff: query.day_tariff,
    nightTariff: query.night_tariff,
    source: query.source,
  });

  yield* Effect.logDebug(`Computed performance metrics for ${days.length} day(s) from ${query.hourly_consumption.length} hourly values`);

  // encoding rejects metrics that overflowed to Infinity
  return yield* HttpServerResponse.schemaJson(DailyPerformanceMetricsListSchema)(days).pipe(
    Effect.catchTag('HttpBodyError', () => Effect.fail(metricsOutOfRangeError())),
  );
}).pipe(
  Effect.catchTags({
    // empty series or unknown energy source
    InvalidInput: (error) => errorResponse(error.message, 400),
    // missing or malformed query parameter, or metrics out of range
    InvalidRequest: (error) => errorResponse(error.message, 422),
  }),
);

// GET and POST take the same query parameters
export const PerformanceMetricsRouter = HttpRouter.empty.pipe(
  HttpRouter.get(PERFORMANCE_METRICS_PATH, performanceMetrics),
  HttpRouter.post(PERFORMANCE_METRICS_PATH, performanceMetrics),
);
