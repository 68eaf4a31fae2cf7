/**
 * /start and /help
 */
import type { Command, CommandContext } from "../context";

const HELP_TEXT = [
  "📦 Supply slot bot",
  "",
  "Accounts:",
  "/add_account <api_key> [name] - add a marketplace account",
  "/accounts - list your accounts",
  "/remove_account <id> - delete an account",
  "",
  "Filters:",
  "/filters - show your filters",
  "/set <field> <value> - change a filter (send /set for the list)",
  "/warehouses - list warehouses and their ids",
  "",
  "Booking:",
  "/search <supply_number> [account_id] - search until a slot is booked",
  "/stop_search - stop the running search",
  "/history - recent bookings",
  "/status - monitoring status",
].join("\n");

export const startCommand: Command = {
  name: "start",
  description: "Register and show help",
  async handle(ctx: CommandContext): Promise<void> {
    const name = ctx.user.first_name ?? ctx.user.username ?? "there";
    const accounts = await ctx.services.store.getUserAccounts(ctx.user.id);

    const intro =
      accounts.length === 0
        ? `👋 Hi, ${name}! Add a marketplace API key with /add_account to start monitoring slots.`
        : `👋 Welcome back, ${name}! You have ${accounts.length} account(s).`;

    await ctx.reply(`${intro}\n\n${HELP_TEXT}`);
  },
};

export const helpCommand: Command = {
  name: "help",
  description: "List commands",
  async handle(ctx: CommandContext): Promise<void> {
    await ctx.reply(HELP_TEXT);
  },
};
