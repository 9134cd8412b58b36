import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { Logger } from './logger.service';

const mockWriteStream = vi.hoisted(() => ({
  write: vi.fn(),
  on: vi.fn(),
}));

vi.mock('node:fs', () => ({
  existsSync: vi.fn(() => true),
  mkdirSync: vi.fn(),
  createWriteStream: vi.fn(() => mockWriteStream),
}));

type CircularTestObject = Record<string, unknown>;

describe('Logger', () => {
  let logSpy: ReturnType<typeof vi.spyOn>;
  let warnSpy: ReturnType<typeof vi.spyOn>;
  let errorSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    vi.clearAllMocks();
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('drops entries below the configured level', () => {
    const logger = new Logger('test', { level: 'warn', prettyPrint: true, writeFile: false });

    logger.info('hidden');
    logger.debug('hidden');
    logger.warn('shown');

    expect(logSpy).not.toHaveBeenCalled();
    expect(warnSpy).toHaveBeenCalledTimes(1);
  });

  it('pretty-prints the component and extra context', () => {
    const logger = new Logger('registry', { level: 'info', prettyPrint: true, writeFile: false });

    logger.info('Connection bound', { threadId: 't-1' });

    const line = String(logSpy.mock.calls[0]?.[0]);
    expect(line).toContain('[registry] Connection bound');
    expect(line).toContain('{"threadId":"t-1"}');
  });

  it('prefixes child components with the parent name', () => {
    const logger = new Logger('gateway', { level: 'info', prettyPrint: true, writeFile: false });

    logger.child('frames').info('hello');

    expect(String(logSpy.mock.calls[0]?.[0])).toContain('[gateway:frames] hello');
  });

  it('writes JSON lines to the log file in production mode and echoes only errors', () => {
    const logger = new Logger('server', {
      level: 'info',
      prettyPrint: false,
      writeFile: true,
      serviceName: 'crewline-test',
    });

    logger.info('started', { port: 3001 });
    logger.error('failed', new Error('boom'));

    expect(mockWriteStream.write).toHaveBeenCalledTimes(2);
    const firstLine = String(mockWriteStream.write.mock.calls[0]?.[0]);
    const parsed = JSON.parse(firstLine) as {
      level: string;
      message: string;
      context: Record<string, unknown>;
    };
    expect(parsed.level).toBe('info');
    expect(parsed.message).toBe('started');
    expect(parsed.context).toEqual({ port: 3001, service: 'crewline-test', component: 'server' });

    expect(errorSpy).toHaveBeenCalledTimes(1);
    const errorLine = JSON.parse(String(errorSpy.mock.calls[0]?.[0])) as {
      error: { name: string; message: string };
    };
    expect(errorLine.error.message).toBe('boom');
  });

  it('does not crash on circular context', () => {
    const logger = new Logger('test', { level: 'debug', prettyPrint: true, writeFile: false });
    const circular: CircularTestObject = { foo: 'bar' };
    circular.self = circular;

    expect(() => logger.debug('Test circular', circular)).not.toThrow();
    expect(String(logSpy.mock.calls[0]?.[0])).toContain('"self":"[Circular]"');
  });
});
