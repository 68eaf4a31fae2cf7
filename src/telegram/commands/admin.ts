/**
 * /admin - runtime switches and stats (admin ids only)
 *
 * Switch changes reset the client pool so the next client built for each
 * account reads the new settings.
 */
import type { RuntimeSettings } from "../../config";
import type { Command, CommandContext } from "../context";

const ADMIN_USAGE = [
  "Usage: /admin <action>",
  "",
  "demo <on|off> - always serve demo data",
  "fallback <on|off> - demo data when the API is unreachable",
  "url <main|backup> - which base URL is primary",
  "stats - users, accounts, bookings, searches",
  "tick - run one monitor pass now",
].join("\n");

function formatSettings(settings: Readonly<RuntimeSettings>): string {
  return [
    `Force demo: ${settings.forceDemo ? "on" : "off"}`,
    `Demo fallback: ${settings.allowDemoFallback ? "on" : "off"}`,
    `Base URL: ${settings.useBackupUrl ? "backup" : "main"}`,
  ].join("\n");
}

/**
 * Map "/admin <action> <value>" to a settings patch
 */
export function parseAdminToggle(action: string, value: string | undefined): Partial<RuntimeSettings> | null {
  const on = value === "on";
  const validToggle = value === "on" || value === "off";

  switch (action) {
    case "demo":
      return validToggle ? { forceDemo: on } : null;
    case "fallback":
      return validToggle ? { allowDemoFallback: on } : null;
    case "url":
      return value === "main" || value === "backup" ? { useBackupUrl: value === "backup" } : null;
    default:
      return null;
  }
}

export const adminCommand: Command = {
  name: "admin",
  description: "Admin controls",
  adminOnly: true,
  async handle(ctx: CommandContext): Promise<void> {
    const { runtime, pool, store, finder, monitor } = ctx.services;
    const action = ctx.args[0]?.toLowerCase();
    const value = ctx.args[1]?.toLowerCase();

    if (!action) {
      await ctx.reply(`🛠 Runtime settings:\n${formatSettings(runtime.snapshot())}\n\n${ADMIN_USAGE}`);
      return;
    }

    if (action === "stats") {
      const stats = store.getStats();
      const monitorStatus = monitor.getStatus();
      await ctx.reply(
        [
          "📊 Stats",
          "",
          `Users: ${stats.users}`,
          `Accounts: ${stats.activeAccounts} active of ${stats.accounts}`,
          `Bookings: ${stats.bookings} (${stats.bookedToday} today)`,
          `Searches running: ${finder.listSessions().length}`,
          `Monitor: ${monitorStatus.running ? "running" : "stopped"}, ${monitorStatus.tickCount} ticks, ${monitorStatus.activeUsers} active users`,
        ].join("\n")
      );
      return;
    }

    if (action === "tick") {
      await monitor.tick();
      await ctx.reply("✅ Monitor pass finished.");
      return;
    }

    const patch = parseAdminToggle(action, value);
    if (!patch) {
      await ctx.reply(ADMIN_USAGE);
      return;
    }

    const settings = runtime.update(patch);
    pool.reset();
    await ctx.reply(`✅ Updated.\n${formatSettings(settings)}`);
  },
};
