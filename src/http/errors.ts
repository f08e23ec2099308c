import { Data, ParseResult } from "effect";

export class InvalidRequestError extends Data.TaggedError('InvalidRequest')<{
  message: string;
}> {}

// One "path: problem" entry per issue, e.g. "day_tariff: is missing"
export const formatParseError = (error: ParseResult.ParseError): string =>
  ParseResult.ArrayFormatter.formatErrorSync(error)
    .map((issue) => issue.path.length > 0 ? `${issue.path.map(String).join(".")}: ${issue.message}` : issue.message)
    .join("; ");

export const metricsOutOfRangeError = () => new InvalidRequestError({
  message: 'Computed metrics are not finite numbers. Hourly consumption or tariff values are too large.',
});
