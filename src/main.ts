import { NodeRuntime } from "@effect/platform-node";
import { Effect, Layer, Logger, LogLevel } from "effect";
import { AppConfig } from "./config.js";
import { initErrorReporting } from "./error-reporting/index.js";
import { HttpServerLive } from "./layers.js";

const program = Effect.gen(function* () {
  const environment = yield* AppConfig.environment;
  const isProd = environment === 'production';

  yield* initErrorReporting(yield* AppConfig.sentry.dsn);

  yield* Effect.log(`Starting energy metrics API (${environment})`);

  return yield* Layer.launch(HttpServerLive).pipe(
    Logger.withMinimumLogLevel(isProd ? LogLevel.Info : LogLevel.Debug),
  );
});

NodeRuntime.runMain(program);

process.on('unhandledRejection', (reason, promise) => {
  console.error('Unhandled Rejection at:', promise, 'reason:', reason);
  process.exit(1);
});
