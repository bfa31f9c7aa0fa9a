import { WebSocketServer, WebSocket } from 'ws';
import type { Server } from 'http';
import type { WSMessage } from '../types/index.js';

const HEARTBEAT_MS = 30000;

export function initWebSocket(server: Server): WebSocketServer {
  const wss = new WebSocketServer({ server, path: '/ws' });

  wss.on('connection', (ws) => {
    ws.on('error', (err) => {
      console.error('[WS] Client error:', err);
    });

    ws.send(JSON.stringify({ type: 'connected', payload: { timestamp: new Date().toISOString() } }));
  });

  // Heartbeat to keep connections alive
  const heartbeat = setInterval(() => {
    broadcast(wss, { type: 'heartbeat', payload: { timestamp: new Date().toISOString() } });
  }, HEARTBEAT_MS);

  wss.on('close', () => {
    clearInterval(heartbeat);
  });

  return wss;
}

export function broadcast(wss: WebSocketServer, message: WSMessage): void {
  const data = JSON.stringify(message);
  wss.clients.forEach((client) => {
    if (client.readyState === WebSocket.OPEN) {
      client.send(data);
    }
  });
}
