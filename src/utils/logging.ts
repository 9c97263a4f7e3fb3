import pino, { DestinationStream } from 'pino';
import { Writable } from 'stream';
import { loadConfig } from '../config/index.js';

let loggerInstance: pino.Logger | null = null;
let collected: string[] | null = null;

function collectorSink(logs: string[]): DestinationStream {
  return new Writable({
    write(chunk: Buffer | string, _enc, cb) {
      logs.push(chunk.toString());
      cb();
    },
  });
}

export function getLogger(): pino.Logger {
  if (!loggerInstance) {
    const cfg = loadConfig();
    if (process.env.TEST_LOG_COLLECTOR === '1') {
      collected = [];
      loggerInstance = pino({ level: cfg.logging.level }, collectorSink(collected));
    } else {
      loggerInstance = pino({
        level: cfg.logging.level,
        transport: cfg.logging.json ? undefined : { target: 'pino-pretty' },
      });
    }
  }
  return loggerInstance;
}

// Test-only helper to reset singleton (not exported in production docs)
export function __resetLoggerForTests() {
  loggerInstance = null;
  collected = null;
}

// Force-enable in-memory log collection for tests regardless of env timing
export function __enableTestLogCollector(level: pino.Level = 'debug'): string[] {
  collected = [];
  loggerInstance = pino({ level }, collectorSink(collected));
  return collected;
}

export function __collectedLogs(): string[] {
  return collected ?? [];
}
