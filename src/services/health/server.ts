import http from 'http';
import type { PendingEditStore } from '../state/pending-edits';

export interface HealthStatus {
  status: 'ok';
  service: string;
  timestamp: string;
  uptimeSeconds: number;
  pendingEdits: number;
}

export function getHealthStatus(pendingEdits: PendingEditStore, now: Date = new Date()): HealthStatus {
  return {
    status: 'ok',
    service: 'expense-capture-bot',
    timestamp: now.toISOString(),
    uptimeSeconds: Math.floor(process.uptime()),
    pendingEdits: pendingEdits.size(),
  };
}

/**
 * Liveness endpoint: any GET answers with the current status as JSON.
 */
export function startHealthServer(port: number, pendingEdits: PendingEditStore): http.Server {
  const server = http.createServer((req, res) => {
    if (req.method !== 'GET') {
      res.writeHead(405, { Allow: 'GET' });
      res.end();
      return;
    }
    res.writeHead(200, { 'Content-Type': 'application/json' });
    res.end(JSON.stringify(getHealthStatus(pendingEdits)));
  });

  server.listen(port, () => {
    console.log(`[Health] Server running on port ${port}`);
  });

  return server;
}
