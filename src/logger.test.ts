import { describe, expect, it } from 'vitest';
import * as log from './logger';

describe('loggerOptions', () => {
  it('prints bare coloured messages in the cli format', () => {
    expect(log.loggerOptions('cli', 'info').transport).toEqual({
      target: 'pino-pretty',
      options: { colorize: true, ignore: 'pid,hostname,service,env,time' },
    });
  });

  it('writes JSON lines in the formatted format', () => {
    expect(log.loggerOptions('formatted', 'debug')).toMatchObject({
      level: 'debug',
      transport: undefined,
    });
  });
});

describe('setLogFormat', () => {
  it('replaces the shared logger and keeps its level', () => {
    const before = log.logger;
    before.level = 'warn';

    log.setLogFormat('formatted');

    expect(log.logger).not.toBe(before);
    expect(log.logger.level).toBe('warn');
  });
});
