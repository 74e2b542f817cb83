import express from 'express';
import { DailyEventLog } from '../logging/dailyEventLog';
import { SessionContext } from '../session/sessionContext';
import { TrackerTCPServer } from '../tcp/server';
import { serializeReport, serializeSession } from './serialize';

export function createRoutes(
  context: SessionContext,
  tcpServer: TrackerTCPServer,
  eventLog: DailyEventLog | null
): express.Router {
  const router = express.Router();

  router.use((req, res, next) => {
    res.setHeader('Access-Control-Allow-Origin', '*');
    next();
  });

  // Decoded reports, oldest first
  router.get('/messages', (req, res) => {
    res.json(context.snapshotReports().map(serializeReport));
  });

  // Beacon sightings and ignition changes
  router.get('/beacon-scans', (req, res) => {
    res.json(context.snapshotEvents());
  });

  router.get('/session', (req, res) => {
    res.json(serializeSession(context.currentSessionState()));
  });

  router.get('/logs', (req, res) => {
    res.json({ enabled: eventLog !== null, days: eventLog ? eventLog.listDays() : [] });
  });

  router.get('/logs/:day', (req, res) => {
    const { day } = req.params;
    if (!DailyEventLog.isDay(day)) {
      return res.status(400).json({ success: false, message: `Invalid day "${day}", expected YYYY-MM-DD` });
    }

    const events = eventLog ? eventLog.readDay(day) : null;
    if (!events) {
      return res.status(404).json({ success: false, message: `No event log for ${day}` });
    }
    res.json(events);
  });

  router.get('/stats', (req, res) => {
    res.json({ success: true, data: tcpServer.getStats() });
  });

  return router;
}
