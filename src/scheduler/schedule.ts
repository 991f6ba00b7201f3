// Timeframe schedules
// A run fires once per timeframe bar, `offsetSeconds` after the bar opens,
// so the source has finished reacting to the new bar before it is copied.

import cron from 'node-cron';
import { Timeframe } from '../shared/types';

export const TIMEFRAME_SECONDS: Record<Timeframe, number> = {
  M1: 60,
  M5: 300,
  M15: 900,
  M30: 1800,
  H1: 3600,
  H4: 14400,
  D1: 86400,
};

/**
 * Six-field (seconds first) node-cron expression for a timeframe and offset.
 * Offsets longer than the timeframe wrap around it.
 *
 * @example timeframeToCron('M5', 60) === '0 1-59/5 * * * *'
 */
export function timeframeToCron(timeframe: Timeframe, offsetSeconds: number): string {
  if (!Number.isInteger(offsetSeconds) || offsetSeconds < 0) {
    throw new RangeError(`offsetSeconds must be a non-negative integer, got ${offsetSeconds}`);
  }

  const offset = offsetSeconds % TIMEFRAME_SECONDS[timeframe];
  const second = offset % 60;
  const minute = Math.floor(offset / 60) % 60;
  const hour = Math.floor(offset / 3600);

  const expression = buildExpression(timeframe, second, minute, hour);

  if (!cron.validate(expression)) {
    throw new Error(`Generated invalid cron expression "${expression}" for ${timeframe}+${offsetSeconds}s`);
  }
  return expression;
}

function buildExpression(timeframe: Timeframe, second: number, minute: number, hour: number): string {
  switch (timeframe) {
    case 'M1':
      return `${second} * * * * *`;
    case 'M5':
    case 'M15':
    case 'M30':
      return `${second} ${minute}-59/${TIMEFRAME_SECONDS[timeframe] / 60} * * * *`;
    case 'H1':
      return `${second} ${minute} * * * *`;
    case 'H4':
      return `${second} ${minute} ${hour}-23/4 * * *`;
    case 'D1':
      return `${second} ${minute} ${hour} * * *`;
  }
}
