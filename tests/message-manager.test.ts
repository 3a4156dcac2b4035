import { describe, it, expect, vi } from 'vitest';
import { InlineKeyboard } from 'grammy';
import { deliver } from '../src/services/telegram/message-manager';

describe('Message Manager', () => {
  it('should send and edit in order', async () => {
    const api = { sendMessage: vi.fn().mockResolvedValue({}), editMessageText: vi.fn().mockResolvedValue({}) };
    const keyboard = new InlineKeyboard().text('Done', 'done__1');

    await deliver(api, 500, [
      { kind: 'edit', messageId: 42, text: 'updated', keyboard },
      { kind: 'send', text: 'hello' },
    ]);

    expect(api.editMessageText).toHaveBeenCalledWith(500, 42, 'updated', { reply_markup: keyboard });
    expect(api.sendMessage).toHaveBeenCalledWith(500, 'hello', undefined);
  });

  it('should keep going after a failed delivery', async () => {
    const api = {
      sendMessage: vi.fn().mockResolvedValue({}),
      editMessageText: vi.fn().mockRejectedValue(new Error('message is not modified')),
    };
    const errors = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    await deliver(api, 500, [
      { kind: 'edit', messageId: 42, text: 'same' },
      { kind: 'send', text: 'next' },
    ]);

    expect(api.sendMessage).toHaveBeenCalledTimes(1);
    expect(errors).toHaveBeenCalledWith('[MessageManager] Failed to edit message:', 'message is not modified');
    errors.mockRestore();
  });
});
