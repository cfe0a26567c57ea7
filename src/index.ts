import "dotenv/config";
import path from "node:path";

import { ImageAssets } from "./assets.js";
import { createBot, runBot } from "./bot.js";
import { loadConfig, type AppConfig } from "./config.js";
import { ConversationEngine } from "./conversation/engine.js";
import { ResponseFormatter } from "./formatters/telegram.js";
import { LocaleStore } from "./locales.js";
import { createLogger, errMessage } from "./logging.js";
import { SessionStore } from "./sessions.js";
import { OpenWeatherClient } from "./weather/openweather.js";

async function main() {
  const logger = createLogger();

  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (error) {
    logger.error({ err_message: errMessage(error) }, "invalid configuration");
    process.exit(1);
  }
  logger.level = config.LOG_LEVEL;

  const locales = LocaleStore.load(path.resolve(process.cwd(), config.LANGUAGES_DIR), logger);
  const sessions = new SessionStore();
  const engine = new ConversationEngine({
    sessions,
    locales,
    formatter: new ResponseFormatter(locales),
    provider: new OpenWeatherClient({
      apiKey: config.OPENWEATHER_API_KEY,
      baseUrl: config.OPENWEATHER_BASE_URL,
      timeoutMs: config.WEATHER_TIMEOUT_MS,
      logger
    }),
    images: new ImageAssets(path.resolve(process.cwd(), config.IMAGES_DIR)),
    logger
  });

  const bot = createBot(config.TELEGRAM_BOT_TOKEN, engine, logger);
  await runBot(bot, logger, () => {
    logger.info({ sessions: sessions.size }, "meteo-bot shut down");
    sessions.clear();
  });
}

void main();
