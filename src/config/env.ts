import * as dotenv from 'dotenv';
import * as path from 'path';
import { DEFAULT_TARGET_PREFIXES } from '../protocol/macResolver';

dotenv.config();

const positiveInt = (value: string | undefined, fallback: number): number => {
  const parsed = Number(value);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
};

const flag = (value: string | undefined, fallback: boolean): boolean => {
  if (value === undefined || value === '') return fallback;
  return !['0', 'false', 'no', 'off'].includes(value.trim().toLowerCase());
};

export const env = {
  TCP_HOST: process.env.TCP_HOST || '0.0.0.0',
  TCP_PORT: positiveInt(process.env.TCP_PORT, 18160),
  API_PORT: positiveInt(process.env.API_PORT, 8080),
  IDLE_TIMEOUT_MS: positiveInt(process.env.IDLE_TIMEOUT_MS, 60_000),

  RAW_REPORT_CAPACITY: positiveInt(process.env.RAW_REPORT_CAPACITY, 1000),
  BEACON_EVENT_CAPACITY: positiveInt(process.env.BEACON_EVENT_CAPACITY, 10_000),
  MAX_TRACKED_MACS: positiveInt(process.env.MAX_TRACKED_MACS, 5000),

  TARGET_MAC_PREFIXES: process.env.TARGET_MAC_PREFIXES || DEFAULT_TARGET_PREFIXES.join(','),

  EVENT_LOG_ENABLED: flag(process.env.EVENT_LOG_ENABLED, true),
  LOG_DIR: path.resolve(process.env.LOG_DIR || 'logs')
};
