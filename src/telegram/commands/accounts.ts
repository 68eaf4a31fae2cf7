/**
 * /add_account, /accounts, /remove_account
 */
import { DateTime } from "luxon";
import { z } from "zod";
import { errorMessage, logger } from "../../logger";
import type { Command, CommandContext } from "../context";

const AddAccountArgsSchema = z.tuple([
  z.string().min(8, "API key looks too short"),
  z.string().max(64).optional(),
]);

const AccountIdSchema = z.coerce.number().int().positive();

export const addAccountCommand: Command = {
  name: "add_account",
  description: "Add a marketplace account",
  async handle(ctx: CommandContext): Promise<void> {
    const [credential, ...nameParts] = ctx.args;
    const parsed = AddAccountArgsSchema.safeParse([credential, nameParts.join(" ") || undefined]);
    if (!parsed.success) {
      await ctx.reply(
        `Usage: /add_account <api_key> [name]\n${parsed.error.issues[0]?.message ?? ""}`.trim()
      );
      return;
    }

    const { store, pool, maxAccountsPerUser } = ctx.services;
    const accounts = await store.getUserAccounts(ctx.user.id);
    if (accounts.length >= maxAccountsPerUser) {
      await ctx.reply(`You already have ${accounts.length} accounts (limit ${maxAccountsPerUser}).`);
      return;
    }

    const [key, name] = parsed.data;
    const client = pool.create(key);

    let valid: boolean;
    try {
      valid = await client.validateCredential();
    } catch (error) {
      logger.warn({ userId: ctx.user.id, error: errorMessage(error) }, "Credential check failed");
      await ctx.reply(`⚠️ Could not verify the API key: ${errorMessage(error)}`);
      return;
    }

    if (!valid) {
      await ctx.reply("❌ Invalid API key - the marketplace rejected it.");
      return;
    }

    const account = await store.addAccount(ctx.user.id, key, name ?? `Account ${accounts.length + 1}`);
    const demoNote = client.isDegraded()
      ? "\n\n⚠️ The marketplace API is unreachable right now; demo data is being served."
      : "";

    await ctx.reply(`✅ Account "${account.name}" added (id ${account.id}).${demoNote}`);
  },
};

export const accountsCommand: Command = {
  name: "accounts",
  description: "List your accounts",
  async handle(ctx: CommandContext): Promise<void> {
    const accounts = await ctx.services.store.getUserAccounts(ctx.user.id);
    if (accounts.length === 0) {
      await ctx.reply("You have no accounts yet. Use /add_account <api_key> [name].");
      return;
    }

    const lines = accounts.map((a) => {
      const status = a.is_active ? "🟢 active" : "🔴 disabled";
      const checked = a.last_check
        ? DateTime.fromJSDate(a.last_check).toFormat("yyyy-MM-dd HH:mm")
        : "never";
      return `#${a.id} ${a.name} - ${status}, last check: ${checked}`;
    });

    await ctx.reply(`👤 Your accounts:\n\n${lines.join("\n")}`);
  },
};

export const removeAccountCommand: Command = {
  name: "remove_account",
  description: "Delete an account",
  async handle(ctx: CommandContext): Promise<void> {
    const parsed = AccountIdSchema.safeParse(ctx.args[0]);
    if (!parsed.success) {
      await ctx.reply("Usage: /remove_account <id> (see /accounts)");
      return;
    }

    const { store, pool, finder } = ctx.services;
    const accountId = parsed.data;

    if (finder.getSessionInfo(ctx.user.id)?.accountId === accountId) {
      await finder.stop(ctx.user.id);
    }

    if (!(await store.deleteAccount(ctx.user.id, accountId))) {
      await ctx.reply(`Account #${accountId} not found.`);
      return;
    }

    pool.evict(accountId);
    await ctx.reply(`🗑 Account #${accountId} removed.`);
  },
};
