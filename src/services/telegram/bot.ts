import { Bot, type Context } from 'grammy';
import type { User } from '../../types/expense';
import type { OutgoingMessage } from '../../types/edit';
import type { UserStore } from '../../types/stores';
import type { CategoryAdminService } from '../category/admin';
import type { EditFlowController } from '../edit/flow';
import type { ExpenseCaptureService } from '../expense/capture';
import type { ExpenseCommandService } from '../expense/commands';
import { extractCommandArgs } from '../expense/parser';
import { messages } from '../feedback/messages';
import { CurrencyCodeSchema, validateInput } from '../validation/schemas';
import { errorMessage } from '../../utils/errors';
import { deliver } from './message-manager';

export interface BotDeps {
  token: string;
  edits: EditFlowController;
  capture: ExpenseCaptureService;
  commands: ExpenseCommandService;
  categoryAdmin: CategoryAdminService;
  users: UserStore;
  defaultCurrency: string;
}

function getUser(ctx: Context): User | null {
  if (!ctx.from) {
    return null;
  }
  return { id: ctx.from.id, username: ctx.from.username, firstName: ctx.from.first_name };
}

/**
 * A pending edit consumes any text in the chat, unknown /commands included.
 * Otherwise plain text is tried as a new expense.
 */
export async function routeText(
  deps: Pick<BotDeps, 'edits' | 'capture'>,
  user: User,
  chatId: number,
  text: string,
): Promise<OutgoingMessage[]> {
  const editReplies = await deps.edits.handleText(chatId, user.id, text);
  if (editReplies) {
    return editReplies;
  }
  if (text.startsWith('/')) {
    return [];
  }

  const captured = await deps.capture.captureFreeText(user, text);
  return captured ?? [{ kind: 'send', text: messages.info.unrecognized }];
}

export function createBot(deps: BotDeps): Bot {
  const bot = new Bot(deps.token);

  // Runs `handler` with the sender and the text after "/name", then delivers its replies
  const command = (
    name: string,
    handler: (user: User, chatId: number, args: string) => Promise<OutgoingMessage[]>,
  ): void => {
    bot.command(name, async (ctx) => {
      const user = getUser(ctx);
      const chatId = ctx.chat?.id;
      if (!user || chatId === undefined) {
        return;
      }
      const args = extractCommandArgs(ctx.message?.text ?? '', `/${name}`);
      await deliver(ctx.api, chatId, await handler(user, chatId, args));
    });
  };

  bot.command('start', async (ctx) => {
    const user = getUser(ctx);
    if (user) {
      try {
        await deps.users.ensure(user);
      } catch (error) {
        console.error('[Bot] Failed to register user:', errorMessage(error));
      }
    }
    await ctx.reply(messages.info.welcome(user?.firstName));
  });

  bot.command('help', async (ctx) => {
    await ctx.reply(messages.info.help);
  });

  bot.command('add', async (ctx) => {
    const user = getUser(ctx);
    const chatId = ctx.chat?.id;
    if (!user || chatId === undefined) {
      return;
    }
    const replies = await deps.capture.captureCommand(user, ctx.message?.text ?? '');
    await deliver(ctx.api, chatId, replies);
  });

  command('list', (user) => deps.commands.listRecent(user.id));
  command('today', (user) => deps.commands.listToday(user.id));
  command('week', (user) => deps.commands.listWeek(user.id));
  command('delete', (user, chatId, args) => deps.commands.deleteExpense(chatId, user.id, args));
  command('tag', (user, _chatId, args) => deps.commands.tagExpense(user.id, args));
  command('untag', (user, _chatId, args) => deps.commands.untagExpense(user.id, args));
  command('tags', (user, _chatId, args) => deps.commands.listTags(user.id, args));

  command('categories', () => deps.categoryAdmin.list());
  command('addcategory', (_user, _chatId, args) => deps.categoryAdmin.add(args));
  command('renamecategory', (_user, _chatId, args) => deps.categoryAdmin.rename(args));
  command('deletecategory', (_user, _chatId, args) => deps.categoryAdmin.remove(args));

  bot.command('currency', async (ctx) => {
    const user = getUser(ctx);
    if (!user) {
      return;
    }
    const args = extractCommandArgs(ctx.message?.text ?? '', '/currency');

    try {
      if (!args) {
        const current = (await deps.users.getDefaultCurrency(user.id)) ?? deps.defaultCurrency;
        await ctx.reply(messages.info.currencyList(current));
        return;
      }

      const result = validateInput(CurrencyCodeSchema, args);
      if (!result.valid) {
        await ctx.reply(messages.error.unknownCurrency(args.toUpperCase()));
        return;
      }
      await deps.users.ensure(user);
      await deps.users.setDefaultCurrency(user.id, result.data);
      await ctx.reply(messages.success.currencySet(result.data));
    } catch (error) {
      console.error('[Bot] Failed to update currency:', errorMessage(error));
      await ctx.reply(messages.error.currencyUpdateFailed);
    }
  });

  bot.on('callback_query:data', async (ctx) => {
    await ctx.answerCallbackQuery();

    const chatId = ctx.chat?.id;
    const messageId = ctx.callbackQuery.message?.message_id;
    if (chatId === undefined || messageId === undefined) {
      return;
    }

    const replies = await deps.edits.handleAction(chatId, ctx.from.id, messageId, ctx.callbackQuery.data);
    await deliver(ctx.api, chatId, replies);
  });

  bot.on('message:text', async (ctx) => {
    const user = getUser(ctx);
    if (!user) {
      return;
    }
    const chatId = ctx.chat.id;
    await deliver(ctx.api, chatId, await routeText(deps, user, chatId, ctx.message.text));
  });

  bot.catch((err) => {
    console.error('[Bot] Error while handling update', err.ctx.update.update_id, errorMessage(err.error));
  });

  console.log('[Bot] Commands registered');
  return bot;
}

export async function startBot(bot: Bot): Promise<void> {
  await bot.start({
    onStart: (info) => console.log(`[Bot] Running as @${info.username}`),
  });
}
