import { createReadStream } from "node:fs";
import { Markup, Telegraf, type Context } from "telegraf";
import { message } from "telegraf/filters";

import {
  BOT_COMMANDS,
  type BotCommand,
  type ChatReplier,
  type ConversationEngine,
  type InboundEvent,
  type ReplyOptions
} from "./conversation/engine.js";
import { errMessage, type LoggerLike } from "./logging.js";
import { SUPPORTED_LANGUAGES } from "./types.js";

const COMMAND_DESCRIPTIONS: Record<BotCommand, string> = {
  start: "Start",
  help: "List of commands",
  about: "About this bot",
  setlanguage: "Change language",
  weather: "Current weather in a city",
  forecast: "Daily forecast for a city",
  location: "Weather at your location",
  cancel: "Cancel the current action"
};

const LANGUAGE_CALLBACK = new RegExp(`^(${SUPPORTED_LANGUAGES.join("|")})$`);

function replyMarkup(options?: ReplyOptions) {
  if (options?.choices && options.choices.length > 0) {
    return Markup.inlineKeyboard(options.choices.map((c) => [Markup.button.callback(c.label, c.data)])).reply_markup;
  }
  if (options?.forceReply) {
    return Markup.forceReply().selective().reply_markup;
  }
  return undefined;
}

/** Extracts "name" from "/name", "/name@bot" or "/name args"; undefined for plain text. */
export function parseCommand(text: string): string | undefined {
  const match = text.match(/^\/([A-Za-z0-9_]+)(?:@\w+)?(?:\s|$)/);
  return match?.[1]?.toLowerCase();
}

class TelegramReplier implements ChatReplier {
  public constructor(private readonly ctx: Context) {}

  public async text(text: string, options?: ReplyOptions): Promise<void> {
    await this.ctx.reply(text, { parse_mode: "HTML", reply_markup: replyMarkup(options) });
  }

  public async photo(imagePath: string, caption: string): Promise<void> {
    await this.ctx.replyWithPhoto({ source: createReadStream(imagePath) }, { caption, parse_mode: "HTML" });
  }

  public async editMessage(text: string): Promise<void> {
    await this.ctx.editMessageText(text, { parse_mode: "HTML" });
  }

  public async answerCallback(): Promise<void> {
    await this.ctx.answerCbQuery();
  }
}

export function createBot(token: string, engine: ConversationEngine, logger: LoggerLike): Telegraf {
  const bot = new Telegraf(token);

  const dispatch = async (ctx: Context, event: InboundEvent): Promise<void> => {
    if (!ctx.from) {
      logger.debug({ update_type: ctx.updateType }, "[BOT] update without sender skipped");
      return;
    }
    await engine.handle({ userId: ctx.from.id, firstName: ctx.from.first_name }, event, new TelegramReplier(ctx));
  };

  for (const name of BOT_COMMANDS) {
    bot.command(name, (ctx) => dispatch(ctx, { type: "command", name }));
  }

  bot.on(message("text"), (ctx) => {
    const text = ctx.message.text;
    const command = parseCommand(text);
    return dispatch(ctx, command === undefined ? { type: "text", text } : { type: "command", name: command });
  });

  bot.on(message("location"), (ctx) =>
    dispatch(ctx, {
      type: "location",
      latitude: ctx.message.location.latitude,
      longitude: ctx.message.location.longitude
    })
  );

  bot.action(LANGUAGE_CALLBACK, (ctx) => dispatch(ctx, { type: "callback", data: ctx.match[1] }));

  bot.catch((err, ctx) => {
    logger.error(
      {
        err_message: errMessage(err),
        update_type: ctx.updateType,
        chat_id: ctx.chat?.id
      },
      "[BOT] unhandled bot error"
    );
  });

  return bot;
}

/** Long polling; resolves when the bot is stopped. */
export async function startBot(bot: Telegraf, logger: LoggerLike): Promise<void> {
  try {
    await bot.telegram.setMyCommands(
      BOT_COMMANDS.map((command) => ({ command, description: COMMAND_DESCRIPTIONS[command] }))
    );
  } catch (err) {
    logger.warn({ err_message: errMessage(err) }, "[BOT] failed to register command menu");
  }

  process.once("SIGINT", () => bot.stop("SIGINT"));
  process.once("SIGTERM", () => bot.stop("SIGTERM"));

  logger.info("[BOT] polling started");
  await bot.launch();
  logger.info("[BOT] stopped");
}

/** Runs the bot until it stops; a failed start sets exit code 1. `onShutdown` runs either way. */
export async function runBot(bot: Telegraf, logger: LoggerLike, onShutdown: () => void): Promise<void> {
  try {
    await startBot(bot, logger);
  } catch (err) {
    logger.error({ err_message: errMessage(err) }, "[BOT] failed to start");
    process.exitCode = 1;
  } finally {
    onShutdown();
  }
}
