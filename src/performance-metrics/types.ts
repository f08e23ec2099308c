import { Schema } from "effect";

export type PerformanceMetrics = {
  readonly averageCostPerKWh: number;
  readonly totalDayConsumption: number;
  readonly totalNightConsumption: number;
  readonly totalCO2Emissions: number; // kg
  readonly totalConsumption: number; // kWh
  readonly daytimeCost: number;
  readonly nighttimeCost: number;
  readonly totalCost: number;
};

export type DailyPerformanceMetrics = {
  readonly day: number; // 1-based
  readonly metrics: PerformanceMetrics;
};

export type TariffInput = {
  readonly hourlyConsumption: ReadonlyArray<number>; // kWh per hour
  readonly dayTariff: number; // per kWh
  readonly nightTariff: number; // per kWh
  readonly source: string;
};

const wireField = <K extends string>(key: K) =>
  Schema.propertySignature(Schema.Number.pipe(Schema.finite())).pipe(Schema.fromKey(key));

// Wire names are part of the public JSON contract
export const PerformanceMetricsSchema = Schema.Struct({
  averageCostPerKWh: wireField("Average Cost per kWh"),
  totalDayConsumption: wireField("Total Day Consumption"),
  totalNightConsumption: wireField("Total Night Consumption"),
  totalCO2Emissions: wireField("Total CO2 Emissions"),
  totalConsumption: wireField("Total Consumption"),
  daytimeCost: wireField("Daytime Cost"),
  nighttimeCost: wireField("Nighttime Cost"),
  totalCost: wireField("Total Cost"),
});

export const DailyPerformanceMetricsSchema = Schema.Struct({
  day: Schema.propertySignature(Schema.Int).pipe(Schema.fromKey("Day")),
  metrics: Schema.propertySignature(PerformanceMetricsSchema).pipe(Schema.fromKey("Metrics")),
});

export const DailyPerformanceMetricsListSchema = Schema.Array(DailyPerformanceMetricsSchema);
