// Pure helpers for the day/night split. Hour indices are positional within a
// chunk, not wall-clock hours.

export const HOURS_PER_DAY = 24;

export const DAY_HOURS: readonly number[] = Array.from({ length: 16 }, (_, i) => i + 6); // 6..21
export const NIGHT_HOURS: readonly number[] = [22, 23, 0, 1, 2, 3, 4, 5];

// Hours past the end of a short chunk are absent, not zero-filled.
export const sumHours = (consumption: ReadonlyArray<number>, hours: readonly number[]): number =>
  hours.reduce((total, hour) => total + (consumption[hour] ?? 0), 0);

export const sum = (values: ReadonlyArray<number>): number =>
  values.reduce((total, value) => total + value, 0);

export const costOf = (consumption: number, tariff: number): number =>
  consumption === 0 ? 0 : consumption * tariff;

export const roundTo = (value: number, decimals: number): number =>
  Number(value.toFixed(decimals));

export const splitIntoDays = <T>(values: ReadonlyArray<T>, hoursPerDay = HOURS_PER_DAY): ReadonlyArray<ReadonlyArray<T>> => {
  const numDays = Math.ceil(values.length / hoursPerDay);
  return Array.from({ length: numDays }, (_, dayIndex) =>
    values.slice(dayIndex * hoursPerDay, dayIndex * hoursPerDay + hoursPerDay)
  );
};
