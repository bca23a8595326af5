import TelegramBot from "node-telegram-bot-api";
import { errorMessage } from "./errors";
import { logger } from "./logger";
import { formatLocal } from "./time";
import { DiscrepancyRecord, ReadinessCriteria, ReadinessResult } from "./types";

const log = logger.child("telegram");

const CRITERIA_LABELS: Record<keyof ReadinessCriteria, string> = {
  crewCount: "Crew ≥ minimum",
  technicalRescue: "TTR present",
  largeGoodsVehicle: "LGV present",
  breathingApparatus: "BA (non-TTR) ≥ minimum",
  officerInCharge: "Officer with BA",
};

const CRITERIA_ORDER: Array<keyof ReadinessCriteria> = [
  "crewCount",
  "technicalRescue",
  "largeGoodsVehicle",
  "breathingApparatus",
  "officerInCharge",
];

function escapeHtml(text: string): string {
  return text.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

export function formatReadinessMessage(result: ReadinessResult): string {
  const lines: string[] = [];

  lines.push(`🚒 <b>${escapeHtml(result.unitId)}</b> ${result.ready ? "ready" : "NOT ready"}`);
  lines.push(`🕒 ${formatLocal(result.at)}`);
  lines.push("");

  for (const key of CRITERIA_ORDER) {
    lines.push(`${result.criteria[key] ? "✅" : "❌"} ${CRITERIA_LABELS[key]}`);
  }

  lines.push("");
  lines.push(`Crew available: ${result.counts.crew}`);
  lines.push(`Portal shows appliance ${result.applianceAvailable ? "on the run" : "off the run"}`);

  return lines.join("\n");
}

export function formatDiscrepancyMessage(records: readonly DiscrepancyRecord[]): string {
  const lines = [`⚠️ <b>${records.length} availability mismatch(es)</b>`, ""];
  for (const record of records) {
    lines.push(`• ${escapeHtml(record.explanation)}`);
  }
  return lines.join("\n");
}

export class TelegramService {
  private bot: TelegramBot | null = null;
  private chatId: string;

  constructor(botToken: string, chatId: string) {
    if (!botToken || !chatId) {
      throw new Error("TELEGRAM_BOT_TOKEN and TELEGRAM_CHAT_ID are required");
    }
    this.chatId = chatId;
    this.bot = new TelegramBot(botToken, { polling: false });
    log.info("TelegramService initialized");
  }

  async sendReadiness(result: ReadinessResult): Promise<boolean> {
    return this.sendMessage(formatReadinessMessage(result));
  }

  async sendDiscrepancies(records: readonly DiscrepancyRecord[]): Promise<boolean> {
    if (records.length === 0) {
      return true;
    }
    return this.sendMessage(formatDiscrepancyMessage(records));
  }

  async sendMessage(text: string): Promise<boolean> {
    if (!this.bot) {
      log.error("Telegram bot is not initialized");
      return false;
    }

    try {
      await this.bot.sendMessage(this.chatId, text, {
        parse_mode: "HTML",
        disable_web_page_preview: true,
      });

      log.info(`Successfully sent message to Telegram chat ${this.chatId}`);
      return true;
    } catch (error) {
      log.error(`Failed to send message to Telegram: ${errorMessage(error)}`, error);
      return false;
    }
  }
}
