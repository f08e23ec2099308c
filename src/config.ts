import { Config as EffectConfig } from "effect";


export const AppConfig = {
  environment: EffectConfig.string("NODE_ENV").pipe(
    EffectConfig.withDefault("development")
  ),

  server: {
    host: EffectConfig.string("HOST").pipe(EffectConfig.withDefault("0.0.0.0")),
    port: EffectConfig.integer("PORT").pipe(EffectConfig.withDefault(8002)),
  },

  sentry: {
    dsn: EffectConfig.option(EffectConfig.string("SENTRY_DSN")),
  },
};
