import { mkdtempSync } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterAll, describe, it, expect } from 'vitest';
import * as winston from 'winston';
import { configureLogger, LOG_FILE_NAME, logger } from './logger.js';

const fileTransports = () => logger.transports.filter((t) => t instanceof winston.transports.File);

describe('configureLogger', () => {
  const dir = mkdtempSync(path.join(os.tmpdir(), 'risk-sim-log-'));

  afterAll(() => {
    configureLogger({ logLevel: 'info' });
  });

  it('logLevel をロガーに反映する', () => {
    configureLogger({ logLevel: 'debug' });
    expect(logger.level).toBe('debug');
    expect(fileTransports()).toHaveLength(0);
  });

  it('logDir があれば mcp.jsonl へのファイル出力を足す', () => {
    configureLogger({ logLevel: 'warn', logDir: dir });
    expect(logger.level).toBe('warn');
    const files = logger.transports.flatMap((t) => (t instanceof winston.transports.File ? [t] : []));
    expect(files).toHaveLength(1);
    expect(files[0].dirname).toBe(dir);
    expect(files[0].filename).toBe(LOG_FILE_NAME);
  });

  it('呼び直してもファイル出力は 1 つ', () => {
    configureLogger({ logLevel: 'info', logDir: dir });
    configureLogger({ logLevel: 'info', logDir: dir });
    expect(fileTransports()).toHaveLength(1);
  });

  it('logDir を外すとファイル出力も外れる', () => {
    configureLogger({ logLevel: 'info' });
    expect(fileTransports()).toHaveLength(0);
    // コンソール出力は残る
    expect(logger.transports).toHaveLength(1);
  });
});
