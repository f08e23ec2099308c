import * as Sentry from "@sentry/node";
import type { HttpApp } from "@effect/platform";
import { Cause, Effect, Option } from "effect";

export const initErrorReporting = (dsn: Option.Option<string>) => Effect.sync(() => {
  Sentry.init({
    dsn: Option.getOrUndefined(dsn),
  });
});

// Typed failures are answered by the routes; only defects reach Sentry.
export const reportDefects = <E, R>(httpApp: HttpApp.Default<E, R>): HttpApp.Default<E, R> =>
  httpApp.pipe(
    Effect.tapDefect((cause) => Effect.sync(() => {
      Sentry.captureException(Cause.squash(cause));
    })),
  );
