import { Effect } from "effect";
import { emptyConsumptionError, type InvalidInputError } from "../errors/invalid-input.error.js";
import { resolveEmissionFactor } from "../emission-factor/index.js";
import { DAY_HOURS, NIGHT_HOURS, costOf, roundTo, splitIntoDays, sum, sumHours } from "./calculations.js";
import type { DailyPerformanceMetrics, PerformanceMetrics, TariffInput } from "./types.js";

/**
 * Metrics for a single day of hourly consumption.
 *
 * Total consumption covers every value given, while the day and night sums only
 * look at indices 0..23, so a series longer than a day reports a total larger
 * than day + night. Callers with more than 24 values should go through
 * {@link calculateDailyPerformanceMetrics}.
 */
export const calculatePerformanceMetrics = (
  input: TariffInput
): Effect.Effect<PerformanceMetrics, InvalidInputError> => Effect.gen(function* () {
  const { hourlyConsumption, dayTariff, nightTariff, source } = input;

  if (hourlyConsumption.length === 0) {
    return yield* emptyConsumptionError();
  }

  const { factor } = yield* resolveEmissionFactor(source);

  const daytimeConsumption = sumHours(hourlyConsumption, DAY_HOURS);
  const nighttimeConsumption = sumHours(hourlyConsumption, NIGHT_HOURS);
  const totalConsumption = sum(hourlyConsumption);

  const daytimeCost = costOf(daytimeConsumption, dayTariff);
  const nighttimeCost = costOf(nighttimeConsumption, nightTariff);
  const totalCost = daytimeCost + nighttimeCost;

  return {
    averageCostPerKWh: roundTo(totalConsumption > 0 ? totalCost / totalConsumption : 0, 2),
    totalDayConsumption: roundTo(daytimeConsumption, 2),
    totalNightConsumption: roundTo(nighttimeConsumption, 2),
    totalCO2Emissions: roundTo(totalConsumption * factor, 3),
    totalConsumption: roundTo(totalConsumption, 2),
    daytimeCost: roundTo(daytimeCost, 2),
    nighttimeCost: roundTo(nighttimeCost, 2),
    totalCost: roundTo(totalCost, 2),
  };
});

export const calculateDailyPerformanceMetrics = (
  input: TariffInput
): Effect.Effect<ReadonlyArray<DailyPerformanceMetrics>, InvalidInputError> => {
  if (input.hourlyConsumption.length === 0) {
    return Effect.fail(emptyConsumptionError());
  }

  return Effect.forEach(
    splitIntoDays(input.hourlyConsumption),
    (hourlyConsumption, dayIndex) => calculatePerformanceMetrics({ ...input, hourlyConsumption }).pipe(
      Effect.map((metrics) => ({ day: dayIndex + 1, metrics }))
    )
  );
};

export * from "./types.js";
