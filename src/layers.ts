import { HttpMiddleware, HttpServer } from "@effect/platform";
import { NodeHttpServer } from "@effect/platform-node";
import { Effect, Layer } from "effect";
import { createServer } from "node:http";
import { AppConfig } from "./config.js";
import { reportDefects } from "./error-reporting/index.js";
import { PerformanceMetricsRouter } from "./http/router.js";

export const HttpServerLive = Layer.unwrapEffect(
  Effect.gen(function* () {
    const host = yield* AppConfig.server.host;
    const port = yield* AppConfig.server.port;

    return PerformanceMetricsRouter.pipe(
      reportDefects,
      HttpServer.serve(HttpMiddleware.logger),
      HttpServer.withLogAddress,
      Layer.provide(NodeHttpServer.layer(createServer, { host, port })),
    );
  })
);
