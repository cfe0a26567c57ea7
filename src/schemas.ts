import { z } from "zod";

const conditionSchema = z.object({
  id: z.number().int(),
  description: z.string()
});

export const currentWeatherPayloadSchema = z.object({
  name: z.string(),
  sys: z.object({ country: z.string() }),
  weather: z.array(conditionSchema).min(1),
  main: z.object({
    temp: z.number(),
    feels_like: z.number(),
    humidity: z.number()
  }),
  wind: z.object({ speed: z.number() })
});

export const forecastPayloadSchema = z.object({
  city: z.object({
    name: z.string(),
    country: z.string()
  }),
  list: z.array(
    z.object({
      dt_txt: z.string(),
      main: z.object({ temp: z.number() }),
      weather: z.array(conditionSchema).min(1)
    })
  )
});

export const reverseGeocodePayloadSchema = z.array(
  z.object({
    name: z.string(),
    country: z.string().optional(),
    lat: z.number(),
    lon: z.number()
  })
);

export const localeTableSchema = z.record(z.string(), z.string());

export type CurrentWeatherPayload = z.infer<typeof currentWeatherPayloadSchema>;
export type ForecastPayload = z.infer<typeof forecastPayloadSchema>;
