import { IncomingMessage } from 'http';
import { Duplex } from 'stream';
import WebSocket, { WebSocketServer } from 'ws';
import { BeaconEventSink } from '../session/sessionContext';
import { BeaconScanEvent } from '../types/protocol';

/** Pushes every beacon / ignition event to connected dashboard clients. */
export class EventWebSocketServer implements BeaconEventSink {
  readonly name = 'event-websocket';
  private wss: WebSocketServer;
  private clients = new Set<WebSocket>();
  private pingTimer: NodeJS.Timeout;

  constructor(private readonly path = '/ws/events') {
    this.wss = new WebSocketServer({ noServer: true });

    this.wss.on('connection', (ws) => {
      this.clients.add(ws);
      ws.on('close', () => this.clients.delete(ws));
      ws.on('error', (err) => console.error('[WS:events] client error:', err.message));
    });

    // keepalive
    this.pingTimer = setInterval(() => {
      for (const ws of this.clients) {
        if (ws.readyState === WebSocket.OPEN) ws.ping();
      }
    }, 25000);
    this.pingTimer.unref();
  }

  getPath(): string {
    return this.path;
  }

  handleUpgrade(request: IncomingMessage, socket: Duplex, head: Buffer): void {
    this.wss.handleUpgrade(request, socket, head, (ws) => {
      this.wss.emit('connection', ws, request);
    });
  }

  write(event: BeaconScanEvent): void {
    if (this.clients.size === 0) return;
    const message = JSON.stringify({ type: 'beacon-event', event });
    for (const ws of this.clients) {
      if (ws.readyState !== WebSocket.OPEN) continue;
      ws.send(message, (err) => {
        if (err) console.error('[WS:events] send failed:', err.message);
      });
    }
  }

  getClientCount(): number {
    return this.clients.size;
  }

  close(): void {
    clearInterval(this.pingTimer);
    for (const ws of this.clients) {
      ws.terminate();
    }
    this.wss.close();
  }
}
