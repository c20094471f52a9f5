import { WebSocketServer, WebSocket } from 'ws';
import type { Server } from 'node:http';
import { toAlertJson } from '@hearthwatch/shared';
import type { Alert, SafetyStatus, WsMessage } from '@hearthwatch/shared';
import type { AlertSink } from '../services/alertSink.js';

export function createAlertWSS(server: Server): {
  sink: AlertSink;
  close: () => void;
} {
  const wss = new WebSocketServer({ server, path: '/ws' });
  const clients = new Set<WebSocket>();

  wss.on('connection', (ws) => {
    clients.add(ws);
    ws.on('close', () => clients.delete(ws));
    ws.on('error', () => clients.delete(ws));
  });

  const broadcast = (message: WsMessage) => {
    const data = JSON.stringify(message);
    for (const client of clients) {
      if (client.readyState === WebSocket.OPEN) {
        client.send(data);
      }
    }
  };

  const sink: AlertSink = {
    name: 'websocket',
    async deliver(alerts: readonly Alert[], status: SafetyStatus) {
      if (alerts.length === 0) return;
      broadcast({
        type: 'alerts:batch',
        frameNumber: alerts[0]?.frameNumber ?? 'unknown',
        data: { alerts: alerts.map(toAlertJson), status },
      });
    },
  };

  return { sink, close: () => wss.close() };
}
