import { z } from "zod";

const WeatherEnvSchema = z.object({
  WEATHER_API_URL: z.string().url().default("https://wttr.in"),
  WEATHER_LOG_FILE: z.string().min(1).default("weather.txt"),
});

export interface WeatherSettings {
  apiUrl: string;
  logFile: string;
}

export function loadWeatherSettings(
  env: Record<string, string | undefined> = process.env
): WeatherSettings {
  const parsed = WeatherEnvSchema.parse(env);
  return {
    apiUrl: parsed.WEATHER_API_URL.replace(/\/+$/, ""),
    logFile: parsed.WEATHER_LOG_FILE,
  };
}
