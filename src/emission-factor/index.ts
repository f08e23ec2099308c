import { Effect, Option, Schema } from "effect";
import { InvalidInputError } from "../errors/invalid-input.error.js";

export const EnergySourceSchema = Schema.Literal(
  "coal",
  "natural_gas",
  "oil",
  "nuclear",
  "renewables",
  "grid_mix",
);

export type EnergySource = Schema.Schema.Type<typeof EnergySourceSchema>;

// kg CO2 per kWh
export const EMISSION_FACTORS: Readonly<Record<EnergySource, number>> = Object.freeze({
  coal: 0.9,
  natural_gas: 0.45,
  oil: 0.7,
  nuclear: 0.004,
  renewables: 0.03,
  grid_mix: 0.5,
});

export const VALID_ENERGY_SOURCES: ReadonlyArray<EnergySource> = EnergySourceSchema.literals;

export type EmissionFactor = {
  readonly source: EnergySource;
  readonly factor: number;
};

export const resolveEmissionFactor = (source: string): Effect.Effect<EmissionFactor, InvalidInputError> =>
  Schema.decodeUnknownOption(EnergySourceSchema)(source.toLowerCase()).pipe(
    Option.match({
      onNone: () => Effect.fail(new InvalidInputError({
        reason: 'UnknownSource',
        message: `Invalid energy source '${source}'. Valid options are: ${VALID_ENERGY_SOURCES.join(', ')}`,
      })),
      onSome: (energySource) => Effect.succeed({
        source: energySource,
        factor: EMISSION_FACTORS[energySource],
      }),
    }),
  );
