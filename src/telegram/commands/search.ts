/**
 * /search and /stop_search
 */
import { z } from "zod";
import type { Command, CommandContext } from "../context";

const SearchArgsSchema = z.tuple([
  z.string().regex(/^[A-Za-z0-9-]{3,40}$/, "Supply number may contain letters, digits and dashes"),
  z.coerce.number().int().positive().optional(),
]);

export const searchCommand: Command = {
  name: "search",
  description: "Search until a slot is booked for a supply",
  async handle(ctx: CommandContext): Promise<void> {
    const parsed = SearchArgsSchema.safeParse([ctx.args[0], ctx.args[1]]);
    if (!parsed.success) {
      await ctx.reply(
        `Usage: /search <supply_number> [account_id]\n${parsed.error.issues[0]?.message ?? ""}`.trim()
      );
      return;
    }

    const [supplyNumber, requestedAccountId] = parsed.data;
    const { store, finder } = ctx.services;

    const accounts = (await store.getUserAccounts(ctx.user.id)).filter((a) => a.is_active);
    const account =
      requestedAccountId === undefined
        ? accounts[0]
        : accounts.find((a) => a.id === requestedAccountId);

    if (!account) {
      await ctx.reply(
        requestedAccountId === undefined
          ? "You have no active accounts. Add one with /add_account."
          : `Account #${requestedAccountId} not found or disabled.`
      );
      return;
    }

    const started = await finder.start(ctx.user.id, account.id, supplyNumber);
    if (!started) {
      await ctx.reply("❌ Could not start the search.");
    }
  },
};

export const stopSearchCommand: Command = {
  name: "stop_search",
  description: "Stop the running search",
  async handle(ctx: CommandContext): Promise<void> {
    const stopped = await ctx.services.finder.stop(ctx.user.id);
    if (!stopped) {
      await ctx.reply("No search is running.");
    }
  },
};
