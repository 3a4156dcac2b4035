import { describe, it, expect } from 'vitest';
import { getHealthStatus } from '../src/services/health/server';
import { InMemoryPendingEditStore } from '../src/services/state/pending-edits';

describe('Health Status', () => {
  it('should report the number of pending edits', () => {
    const pendingEdits = new InMemoryPendingEditStore();
    pendingEdits.set(1, { expenseId: 7, field: 'amount', promptMessageId: 3 });
    pendingEdits.set(2, { expenseId: 8, field: 'merchant', promptMessageId: 4 });

    const status = getHealthStatus(pendingEdits, new Date('2024-01-01T00:00:00.000Z'));

    expect(status).toMatchObject({
      status: 'ok',
      service: 'expense-capture-bot',
      timestamp: '2024-01-01T00:00:00.000Z',
      pendingEdits: 2,
    });
    expect(status.uptimeSeconds).toBeGreaterThanOrEqual(0);
  });
});
