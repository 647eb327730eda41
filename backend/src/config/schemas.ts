import { z } from "zod";

import { Duration, PREDICTOR_GROUP_ORDER, tryParsePredictorGroup } from "@voltcast/domain";

const durationString = z
  .string()
  .refine((value) => Duration.tryParse(value) !== null, {message: "must be a resolution such as 15min, 1H or PT3H"});

const predictorGroupString = z
  .string()
  .refine((value) => tryParsePredictorGroup(value) !== null, {
    message: `must be one of ${PREDICTOR_GROUP_ORDER.join(", ")}`,
  });

export const influxConfigSchema = z.object({
  url: z.string().url(),
  username: z.string().optional(),
  password: z.string().optional(),
  timeout_ms: z.number().int().positive().default(15000),
});

export const sqlConfigSchema = z.object({
  path: z.string().min(1).default("../data/db/marketprices.sqlite"),
});

export const weatherConfigSchema = z.object({
  base_url: z.string().url(),
  source: z.string().min(1).default("optimum"),
  timeout_ms: z.number().int().positive().default(15000),
});

export const predictorsConfigSchema = z.object({
  default_groups: z.array(predictorGroupString).optional(),
  weather_native_cadence: durationString.default("3h"),
  load_profile_native_cadence: durationString.default("1h"),
});

export const configDocumentSchema = z.object({
  logging: z
    .object({
      level: z.string().optional(),
    })
    .optional(),
  influx: influxConfigSchema,
  sql: sqlConfigSchema.default({}),
  weather: weatherConfigSchema,
  predictors: predictorsConfigSchema.default({}),
});

export type InfluxConfig = z.infer<typeof influxConfigSchema>;
export type SqlConfig = z.infer<typeof sqlConfigSchema>;
export type WeatherConfig = z.infer<typeof weatherConfigSchema>;
export type PredictorsConfig = z.infer<typeof predictorsConfigSchema>;
export type ConfigDocument = z.infer<typeof configDocumentSchema>;

export function parseConfigDocument(raw: unknown): ConfigDocument {
  const result = configDocumentSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${issues}`);
  }
  return result.data;
}
