import { describe, it, expect } from "@effect/vitest";
import { Effect } from "effect";
import {
  calculateDailyPerformanceMetrics,
  calculatePerformanceMetrics,
  type TariffInput,
} from "../../../performance-metrics/index.js";
import { InvalidInputError } from "../../../errors/invalid-input.error.js";

const flatDay = (kwh: number, hours = 24) => Array.from({ length: hours }, () => kwh);

describe("performance-metrics", () => {
  const baseInput: TariffInput = {
    hourlyConsumption: flatDay(1),
    dayTariff: 0.10,
    nightTariff: 0.05,
    source: "coal",
  };

  describe("calculatePerformanceMetrics", () => {
    it.effect("should compute metrics for a flat day on coal", () => Effect.gen(function* () {
      const metrics = yield* calculatePerformanceMetrics(baseInput);

      expect(metrics).toEqual({
        averageCostPerKWh: 0.08,
        totalDayConsumption: 16,
        totalNightConsumption: 8,
        totalCO2Emissions: 21.6,
        totalConsumption: 24,
        daytimeCost: 1.6,
        nighttimeCost: 0.4,
        totalCost: 2,
      });
    }));

    it.effect("should split a partial day by hour index", () => Effect.gen(function* () {
      // hours 0-5 are night, 6-7 are day
      const metrics = yield* calculatePerformanceMetrics({
        hourlyConsumption: [0.5, 0.5, 0.5, 0.5, 0.5, 0.5, 2, 3],
        dayTariff: 0.25,
        nightTariff: 0.5,
        source: "Natural_Gas",
      });

      expect(metrics).toEqual({
        averageCostPerKWh: 0.34,
        totalDayConsumption: 5,
        totalNightConsumption: 3,
        totalCO2Emissions: 3.6,
        totalConsumption: 8,
        daytimeCost: 1.25,
        nighttimeCost: 1.5,
        totalCost: 2.75,
      });
    }));

    it.effect("should add up day and night consumption to the total for up to 24 values", () => Effect.gen(function* () {
      for (const length of [1, 6, 7, 22, 23, 24]) {
        const metrics = yield* calculatePerformanceMetrics({ ...baseInput, hourlyConsumption: flatDay(2, length) });

        expect(metrics.totalDayConsumption + metrics.totalNightConsumption).toBe(metrics.totalConsumption);
      }
    }));

    it.effect("should report zero average cost when nothing was consumed", () => Effect.gen(function* () {
      const metrics = yield* calculatePerformanceMetrics({
        ...baseInput,
        hourlyConsumption: flatDay(0),
        dayTariff: -0.1,
      });

      expect(metrics.averageCostPerKWh).toBe(0);
      expect(metrics.daytimeCost).toBe(0);
      expect(metrics.totalCost).toBe(0);
      expect(metrics.totalCO2Emissions).toBe(0);
    }));

    it.effect("should round emissions to three decimals", () => Effect.gen(function* () {
      // 1.5 kWh * 0.004 kg/kWh
      const metrics = yield* calculatePerformanceMetrics({
        ...baseInput,
        hourlyConsumption: [1.5],
        source: "nuclear",
      });

      expect(metrics.totalCO2Emissions).toBe(0.006);
      expect(metrics.totalNightConsumption).toBe(1.5);
    }));

    it.effect("should total every value but split only the first 24 when given more than a day", () => Effect.gen(function* () {
      const metrics = yield* calculatePerformanceMetrics({ ...baseInput, hourlyConsumption: flatDay(1, 25) });

      expect(metrics.totalConsumption).toBe(25);
      expect(metrics.totalDayConsumption).toBe(16);
      expect(metrics.totalNightConsumption).toBe(8);
      expect(metrics.totalCO2Emissions).toBe(22.5);
      expect(metrics.totalCost).toBe(2);
    }));

    it.effect("should return identical results for identical input", () => Effect.gen(function* () {
      const first = yield* calculatePerformanceMetrics(baseInput);
      const second = yield* calculatePerformanceMetrics(baseInput);

      expect(second).toStrictEqual(first);
    }));

    it.effect("should fail with InvalidInputError for an empty series", () => Effect.gen(function* () {
      const error = yield* Effect.flip(calculatePerformanceMetrics({ ...baseInput, hourlyConsumption: [] }));

      expect(error).toBeInstanceOf(InvalidInputError);
      expect(error.reason).toBe("EmptyConsumption");
      expect(error.message).toBe("Hourly consumption must contain at least one value.");
    }));

    it.effect("should report an empty series before an unknown source", () => Effect.gen(function* () {
      const error = yield* Effect.flip(calculatePerformanceMetrics({ ...baseInput, hourlyConsumption: [], source: "wind" }));

      expect(error.reason).toBe("EmptyConsumption");
    }));

    it.effect("should fail with InvalidInputError for an unknown source", () => Effect.gen(function* () {
      const error = yield* Effect.flip(calculatePerformanceMetrics({ ...baseInput, source: "wind" }));

      expect(error.reason).toBe("UnknownSource");
      expect(error.message).toContain("coal, natural_gas, oil, nuclear, renewables, grid_mix");
    }));
  });

  describe("calculateDailyPerformanceMetrics", () => {
    it.effect("should compute one entry for a single day", () => Effect.gen(function* () {
      const days = yield* calculateDailyPerformanceMetrics(baseInput);

      expect(days).toHaveLength(1);
      expect(days[0]?.day).toBe(1);
      expect(days[0]?.metrics.totalCost).toBe(2);
    }));

    it.effect("should split 30 hourly values into two days", () => Effect.gen(function* () {
      // second day has hours 0-5 only, all of them night hours
      const days = yield* calculateDailyPerformanceMetrics({
        ...baseInput,
        hourlyConsumption: [...flatDay(1), ...flatDay(2, 6)],
      });

      expect(days.map((entry) => entry.day)).toEqual([1, 2]);
      expect(days[0]?.metrics.totalConsumption).toBe(24);
      expect(days[1]?.metrics).toEqual({
        averageCostPerKWh: 0.05,
        totalDayConsumption: 0,
        totalNightConsumption: 12,
        totalCO2Emissions: 10.8,
        totalConsumption: 12,
        daytimeCost: 0,
        nighttimeCost: 0.6,
        totalCost: 0.6,
      });
    }));

    it.effect("should keep day and night adding up to the total on every day", () => Effect.gen(function* () {
      const days = yield* calculateDailyPerformanceMetrics({ ...baseInput, hourlyConsumption: flatDay(1, 50) });

      expect(days).toHaveLength(3);
      for (const { metrics } of days) {
        expect(metrics.totalDayConsumption + metrics.totalNightConsumption).toBe(metrics.totalConsumption);
      }
    }));

    it.effect("should fail with InvalidInputError for an empty series", () => Effect.gen(function* () {
      const error = yield* Effect.flip(calculateDailyPerformanceMetrics({ ...baseInput, hourlyConsumption: [] }));

      expect(error.reason).toBe("EmptyConsumption");
    }));

    it.effect("should fail without partial results for an unknown source", () => Effect.gen(function* () {
      const error = yield* Effect.flip(calculateDailyPerformanceMetrics({
        ...baseInput,
        hourlyConsumption: flatDay(1, 48),
        source: "wind",
      }));

      expect(error.reason).toBe("UnknownSource");
    }));
  });
});
