import { logger } from "@armory/common";
import { action, observation, Tool } from "@armory/toolkit";
import { open } from "fs/promises";
import { z } from "zod";
import { loadWeatherSettings, WeatherSettings } from "./config";

export class WeatherLogger extends Tool {
  constructor(
    private readonly settings: WeatherSettings = loadWeatherSettings()
  ) {
    super({
      description: "Looks up the weather and keeps a log of findings",
      capabilities: [
        observation(WeatherLogger.prototype.weather, {
          doc: `Checks the current weather for a location.
            @param location - City or place name`,
          parameters: { location: z.string().min(1) },
          returns: z.promise(z.string()),
        }),
        action(WeatherLogger.prototype.log, {
          doc: `Appends a message to the log file.
            @param message - Text of the record`,
          parameters: { message: z.string() },
          returns: z.promise(z.void()),
        }),
      ],
    });
  }

  async weather({ location }: { location: string }): Promise<string> {
    const place = encodeURIComponent(location);
    const response = await fetch(
      `${this.settings.apiUrl}/${place}?format=%l:+%C+%t`
    );
    if (!response.ok) {
      throw new Error(
        `Weather lookup for ${location} failed: ${response.status} ${response.statusText}`
      );
    }
    return (await response.text()).trim();
  }

  async log({ message }: { message: string }): Promise<void> {
    const handle = await open(this.settings.logFile, "a");
    try {
      await handle.write(`***\n${message}\n`);
    } finally {
      await handle.close();
    }
    logger.debug("Appended weather log record", {
      class: this.constructor.name,
      method: "log",
      file: this.settings.logFile,
    });
  }
}
