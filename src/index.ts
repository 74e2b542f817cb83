import express from 'express';
import * as path from 'path';
import { env } from './config/env';
import { TrackerTCPServer } from './tcp/server';
import { FrameDispatcher } from './tcp/dispatcher';
import { TargetPrefixSet } from './protocol/macResolver';
import { SessionContext } from './session/sessionContext';
import { DailyEventLog } from './logging/dailyEventLog';
import { EventWebSocketServer } from './api/eventWebsocket';
import { createRoutes } from './api/routes';

async function startServer() {
  console.log('Starting BLE beacon telemetry gateway...');

  const targets = TargetPrefixSet.fromList(env.TARGET_MAC_PREFIXES);
  const context = new SessionContext({
    rawReportCapacity: env.RAW_REPORT_CAPACITY,
    beaconEventCapacity: env.BEACON_EVENT_CAPACITY,
    maxTrackedMacs: env.MAX_TRACKED_MACS
  });

  const eventLog = env.EVENT_LOG_ENABLED ? new DailyEventLog(env.LOG_DIR) : null;
  if (eventLog) context.addSink(eventLog);

  const eventSocket = new EventWebSocketServer();
  context.addSink(eventSocket);

  const tcpServer = new TrackerTCPServer(env.TCP_PORT, context, new FrameDispatcher(targets), {
    host: env.TCP_HOST,
    idleTimeoutMs: env.IDLE_TIMEOUT_MS
  });
  await tcpServer.start();

  const app = express();
  app.use(express.static(path.join(__dirname, '..', 'public')));
  app.get('/table.index', (req, res) => {
    res.sendFile(path.join(__dirname, '..', 'public', 'table.html'));
  });

  app.use('/api', createRoutes(context, tcpServer, eventLog));

  app.get('/health', (req, res) => {
    res.json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      services: {
        tcp: `listening on port ${env.TCP_PORT}`,
        api: `listening on port ${env.API_PORT}`,
        websocket: eventSocket.getPath()
      }
    });
  });

  const httpServer = app.listen(env.API_PORT, () => {
    console.log(`[API] REST API listening on port ${env.API_PORT}`);
  });

  httpServer.on('upgrade', (request, socket, head) => {
    const pathname = new URL(request.url ?? '/', 'http://localhost').pathname;
    if (pathname === eventSocket.getPath()) {
      eventSocket.handleUpgrade(request, socket, head);
    } else {
      socket.destroy();
    }
  });

  console.log('\n=== BLE Beacon Telemetry Gateway Started ===');
  console.log(`TCP (tracker frames): ${env.TCP_PORT}`);
  console.log(`REST API: ${env.API_PORT}`);
  console.log(`Target prefixes: ${targets.prefixes.join(', ')}`);
  console.log(`Event log: ${eventLog ? env.LOG_DIR : 'disabled'}`);
  console.log('============================================\n');

  let stopping = false;
  const shutdown = (signal: string) => {
    if (stopping) return;
    stopping = true;
    console.log(`\n${signal} received, shutting down...`);

    eventSocket.close();
    httpServer.close();
    tcpServer
      .stop()
      .then(() => process.exit(0))
      .catch((error) => {
        console.error('Error while stopping TCP server:', error);
        process.exit(1);
      });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

startServer().catch((error) => {
  console.error('Failed to start server:', error);
  process.exit(1);
});
