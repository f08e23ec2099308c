import { Schema } from "effect";

// Plain decimal notation: 1, -0.5, .25, 1e3
const DecimalString = Schema.String.pipe(
  Schema.pattern(/^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/, { message: () => "must be a decimal number" })
);

const FiniteFromString = Schema.compose(DecimalString, Schema.NumberFromString).pipe(Schema.finite());

// A query key given once arrives as a string, given several times as an array
const RepeatedFiniteFromString = Schema.transform(
  Schema.Union(Schema.String, Schema.Array(Schema.String)),
  Schema.Array(FiniteFromString),
  {
    strict: true,
    decode: (value) => typeof value === "string" ? [value] : value,
    encode: (values) => values,
  }
);

export const PerformanceMetricsQuerySchema = Schema.Struct({
  hourly_consumption: Schema.optionalWith(RepeatedFiniteFromString, { default: () => [] }),
  day_tariff: FiniteFromString,
  night_tariff: FiniteFromString,
  source: Schema.String,
});

export type PerformanceMetricsQuery = typeof PerformanceMetricsQuerySchema.Type

export const ErrorResponseSchema = Schema.Struct({
  detail: Schema.String,
});

export type ErrorResponse = typeof ErrorResponseSchema.Type
