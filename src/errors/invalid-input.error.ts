import { Data } from "effect";

export type InvalidInputReason = 'EmptyConsumption' | 'UnknownSource';

export class InvalidInputError extends Data.TaggedError('InvalidInput')<{
  reason: InvalidInputReason;
  message: string;
}> {}

export const emptyConsumptionError = () => new InvalidInputError({
  reason: 'EmptyConsumption',
  message: 'Hourly consumption must contain at least one value.',
});
