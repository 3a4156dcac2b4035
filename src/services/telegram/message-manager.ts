import type { Api } from 'grammy';
import type { OutgoingMessage } from '../../types/edit';
import { errorMessage } from '../../utils/errors';

export type MessageApi = Pick<Api, 'sendMessage' | 'editMessageText'>;

/**
 * Deliver replies produced by the edit flow and capture service, in order.
 * A failed delivery is logged and the rest are still attempted.
 */
export async function deliver(api: MessageApi, chatId: number, outgoing: readonly OutgoingMessage[]): Promise<void> {
  for (const message of outgoing) {
    const options = message.keyboard ? { reply_markup: message.keyboard } : undefined;
    try {
      if (message.kind === 'send') {
        await api.sendMessage(chatId, message.text, options);
      } else {
        await api.editMessageText(chatId, message.messageId, message.text, options);
      }
    } catch (error) {
      console.error(`[MessageManager] Failed to ${message.kind} message:`, errorMessage(error));
    }
  }
}
