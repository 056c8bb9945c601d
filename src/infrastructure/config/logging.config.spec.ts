import { buildLoggingConfig } from './logging.config';

describe('logging config', () => {
  it('should default to warnings on the console only', () => {
    expect(buildLoggingConfig({})).toEqual({
      level: 'warn',
      dir: 'logs',
      appName: 'pidbox-ping',
      enableConsole: true,
      enableFiles: false,
      maxSize: '20m',
      maxFiles: '14d',
    });
  });

  it('should honour LOG_LEVEL and ignore unknown levels', () => {
    expect(buildLoggingConfig({ LOG_LEVEL: 'info' }).level).toBe('info');
    expect(buildLoggingConfig({ LOG_LEVEL: 'loud' }).level).toBe('warn');
  });

  it('should switch to debug when VERBOSE is set', () => {
    expect(buildLoggingConfig({ VERBOSE: 'true', LOG_LEVEL: 'error' }).level).toBe('debug');
  });

  it('should enable file logging on request', () => {
    const config = buildLoggingConfig({ LOG_ENABLE_FILES: 'true', LOG_DIR: '/tmp/pidbox' });
    expect(config.enableFiles).toBe(true);
    expect(config.dir).toBe('/tmp/pidbox');
  });
});
