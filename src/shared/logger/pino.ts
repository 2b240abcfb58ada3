import pino, { type Logger } from 'pino';

import { loadEnvironment } from '../config/env.js';

let rootLogger: Logger | undefined;

function getRootLogger(): Logger {
  if (!rootLogger) {
    const { LOG_LEVEL } = loadEnvironment();
    // stdout is reserved for the per-file progress lines
    rootLogger = pino(
      {
        name: 'video-container-builder',
        level: LOG_LEVEL,
        base: { pid: process.pid },
      },
      pino.destination(2),
    );
  }

  return rootLogger;
}

export function createChildLogger(bindings: Record<string, unknown>): Logger {
  return getRootLogger().child(bindings);
}
