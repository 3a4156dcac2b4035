import type { PendingEdit } from '../../types/edit';

/**
 * Per-chat storage for the single in-flight edit of each chat.
 */
export interface PendingEditStore {
  get(chatId: number): PendingEdit | null;
  /** Replaces any edit already pending for the chat. */
  set(chatId: number, edit: PendingEdit): void;
  clear(chatId: number): void;
  /** Remove and return the chat's pending edit. */
  take(chatId: number): PendingEdit | null;
  size(): number;
}

/**
 * Map-backed store. Every method runs to completion without awaiting, so
 * concurrent update handlers never observe a half-applied change. Callers get
 * copies and must not hold a reference across I/O.
 */
export class InMemoryPendingEditStore implements PendingEditStore {
  private readonly edits = new Map<number, PendingEdit>();

  get(chatId: number): PendingEdit | null {
    const edit = this.edits.get(chatId);
    return edit ? { ...edit } : null;
  }

  set(chatId: number, edit: PendingEdit): void {
    this.edits.set(chatId, { ...edit });
  }

  clear(chatId: number): void {
    this.edits.delete(chatId);
  }

  take(chatId: number): PendingEdit | null {
    const edit = this.edits.get(chatId);
    if (!edit) {
      return null;
    }
    this.edits.delete(chatId);
    return { ...edit };
  }

  size(): number {
    return this.edits.size;
  }
}
