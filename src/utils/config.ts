import 'dotenv/config';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export function parseLogLevel(value: string | undefined, fallback: LogLevel = 'info'): LogLevel {
  const normalized = (value || '').trim().toLowerCase();
  return LOG_LEVELS.find(level => level === normalized) || fallback;
}

export const config = {
  rateLimit: {
    minIntervalSeconds: Number(process.env.RATE_LIMIT_INTERVAL_SECONDS || 1.0),
    errorWindowSeconds: Number(process.env.RATE_LIMIT_WINDOW_SECONDS || 60),
    penaltyPerErrorSeconds: 0.5,
    maxPenaltySeconds: 5.0,
    severeErrorCount: 10,
  },
  workflow: {
    defaultInstructions: process.env.WORKFLOW_DEFAULT_INSTRUCTIONS || 'You are a helpful assistant.',
    maxSteps: Number(process.env.WORKFLOW_MAX_STEPS || 1000),
    rejectCycles: process.env.WORKFLOW_REJECT_CYCLES === 'true',
  },
  logging: {
    level: parseLogLevel(process.env.LOG_LEVEL),
  },
};
