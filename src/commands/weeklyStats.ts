import { ConfigError } from "../errors";
import { componentLogger } from "../logging/logger";
import { collectWeeklyStats, formatWeeklySummary } from "../report/weeklyStats";
import { calendarDate } from "../utils/time";
import { createPipelineContext } from "./context";

const log = componentLogger("weekly-stats");

export interface WeeklyStatsOptions {
  configPath: string;
  today?: string;
  send: boolean;
}

export async function runWeeklyStatsCommand(opts: WeeklyStatsOptions): Promise<string> {
  const context = await createPipelineContext(opts.configPath);
  const today = opts.today ?? calendarDate(new Date(), context.config.timezone);
  const summary = formatWeeklySummary(await collectWeeklyStats(context.store, today));

  if (!opts.send) {
    console.log(summary);
    return summary;
  }

  const notification = context.config.notification;
  if (!context.channel || !notification) {
    throw new ConfigError("weekly stats cannot be sent: notification or SMTP_HOST is not configured");
  }
  const sent = await context.channel.send({
    subject: `${notification.subject_prefix} weekly summary ${today}`,
    text: summary,
    attachments: []
  });
  if (!sent.ok) {
    throw new Error(`weekly summary not sent: ${sent.error}`);
  }
  log.info({ messageId: sent.messageId }, "weekly summary sent");
  return summary;
}
