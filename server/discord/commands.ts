/**
 * Slash command definitions and registration.
 */

import { REST, Routes, SlashCommandBuilder, type RESTPostAPIChatInputApplicationCommandsJSONBody } from "discord.js";
import { SUMMARY_CONSTANTS } from "../config/constants";
import { logError, logInfo } from "../utils/logger";

function hoursCommand(name: string, description: string, verb: string): RESTPostAPIChatInputApplicationCommandsJSONBody {
  return new SlashCommandBuilder()
    .setName(name)
    .setDescription(description)
    .addIntegerOption((option) =>
      option
        .setName("hours")
        .setDescription(`Number of hours to ${verb} (1-${SUMMARY_CONSTANTS.MAX_HOURS})`)
        .setRequired(true)
        .setMinValue(1)
        .setMaxValue(SUMMARY_CONSTANTS.MAX_HOURS),
    )
    .toJSON();
}

export function buildCommands(): RESTPostAPIChatInputApplicationCommandsJSONBody[] {
  return [
    new SlashCommandBuilder()
      .setName("ask")
      .setDescription("Ask the bot a question")
      .addStringOption((option) =>
        option.setName("query").setDescription("Your question").setRequired(true).setMaxLength(2000),
      )
      .toJSON(),
    new SlashCommandBuilder()
      .setName("sum-day")
      .setDescription("Summarize this channel's messages from the past 24 hours")
      .toJSON(),
    hoursCommand("sum-hr", "Summarize this channel's messages from the past N hours", "summarize"),
    new SlashCommandBuilder()
      .setName("chart-day")
      .setDescription("Analyze this channel's messages from the past 24 hours with charts")
      .toJSON(),
    hoursCommand("chart-hr", "Analyze this channel's messages from the past N hours with charts", "analyze"),
  ];
}

export interface RegisterCommandsOptions {
  token: string;
  applicationId: string;
  /** Registers to one guild (instant) instead of globally. */
  guildId?: string;
}

export async function registerCommands(options: RegisterCommandsOptions): Promise<number> {
  const rest = new REST().setToken(options.token);
  const body = buildCommands();
  const route = options.guildId
    ? Routes.applicationGuildCommands(options.applicationId, options.guildId)
    : Routes.applicationCommands(options.applicationId);

  try {
    await rest.put(route, { body });
    logInfo(`[Commands] Registered ${body.length} slash commands`, { scope: options.guildId ?? "global" });
    return body.length;
  } catch (err) {
    logError("[Commands] Failed to register slash commands", {
      error: err instanceof Error ? err.message : String(err),
    });
    throw err;
  }
}
