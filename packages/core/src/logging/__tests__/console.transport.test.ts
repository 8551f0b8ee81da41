import winston from 'winston';
import { consoleTransport } from '../transports/console.transport';

describe('consoleTransport', () => {
  const logging = {
    level: 'warn' as const,
    format: 'pretty' as const,
    directory: './logs',
    maxFiles: 1,
    maxSize: '1m',
    toFile: false,
  };

  it('should log at the configured level to stderr', () => {
    const transport = consoleTransport({ environment: 'development', logging });

    expect(transport).toBeInstanceOf(winston.transports.Console);
    expect(transport.level).toBe('warn');
    expect(transport.stderrLevels).toEqual(
      Object.fromEntries(
        ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'].map(level => [level, true])
      )
    );
  });
});
