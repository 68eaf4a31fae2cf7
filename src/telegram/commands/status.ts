/**
 * /status, /history, /warehouses
 */
import { DateTime } from "luxon";
import { errorMessage } from "../../logger";
import { formatDuration } from "../../services/supply-finder";
import type { Command, CommandContext } from "../context";

const MAX_WAREHOUSES_LISTED = 40;

export const statusCommand: Command = {
  name: "status",
  description: "Monitoring status",
  async handle(ctx: CommandContext): Promise<void> {
    const { store, finder, monitor } = ctx.services;
    const accounts = await store.getUserAccounts(ctx.user.id);
    const filters = await store.getFilters(ctx.user.id);
    const monitorStatus = monitor.getStatus();
    const session = finder.getSessionInfo(ctx.user.id);

    const lines = [
      "📡 Status",
      "",
      `Monitoring: ${monitorStatus.running ? "running" : "stopped"} (every ${Math.round(monitorStatus.intervalMs / 1000)}s)`,
      `Accounts: ${accounts.filter((a) => a.is_active).length} active of ${accounts.length}`,
      `Auto-booking: ${filters.auto_booking_enabled ? "on" : "off"}`,
    ];

    if (session) {
      const elapsed = formatDuration(Date.now() - session.startedAt.getTime());
      lines.push(
        `Search: supply ${session.supplyNumber} on account #${session.accountId}, ${session.attempts} attempts, ${elapsed}`
      );
    } else {
      lines.push("Search: none");
    }

    await ctx.reply(lines.join("\n"));
  },
};

export const historyCommand: Command = {
  name: "history",
  description: "Recent bookings",
  async handle(ctx: CommandContext): Promise<void> {
    const bookings = await ctx.services.store.getBookedSlots(ctx.user.id, 10);
    if (bookings.length === 0) {
      await ctx.reply("No bookings yet.");
      return;
    }

    const lines = bookings.map((b) => {
      const when = DateTime.fromJSDate(b.booked_at).toFormat("yyyy-MM-dd HH:mm");
      const mode = b.auto_booked ? "🤖" : "👆";
      const supply = b.supply_number ? `, supply ${b.supply_number}` : "";
      return `${mode} ${b.warehouse_name}, ${b.supply_date} ${b.time_slot}, k=${b.coefficient} (${b.status}${supply}) - ${when}`;
    });

    await ctx.reply(`📋 Recent bookings:\n\n${lines.join("\n")}`);
  },
};

export const warehousesCommand: Command = {
  name: "warehouses",
  description: "List warehouses",
  async handle(ctx: CommandContext): Promise<void> {
    const { store, pool } = ctx.services;
    const account = (await store.getUserAccounts(ctx.user.id)).find((a) => a.is_active);
    if (!account) {
      await ctx.reply("Add an account first with /add_account.");
      return;
    }

    const client = pool.forAccount(account);

    try {
      const warehouses = (await client.listWarehouses()).filter((w) => w.isActive);
      const shown = warehouses.slice(0, MAX_WAREHOUSES_LISTED);
      const lines = shown.map((w) => `${w.id} - ${w.name}${w.region ? ` (${w.region})` : ""}`);
      const more = warehouses.length > shown.length ? `\n…and ${warehouses.length - shown.length} more` : "";
      const demo = client.isDegraded() ? "\n\n⚠️ Demo data" : "";

      await ctx.reply(`🏭 Warehouses:\n\n${lines.join("\n")}${more}${demo}\n\nUse /set warehouses <id,id> to filter.`);
    } catch (error) {
      await ctx.reply(`⚠️ Could not load warehouses: ${errorMessage(error)}`);
    }
  },
};
