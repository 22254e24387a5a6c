import path from 'path';
import { ConfigError, loadConfig } from '../src/config';
import { LogLevel } from '../src/utils/logger';

describe('loadConfig', () => {
  test('falls back to defaults', () => {
    expect(loadConfig({})).toEqual({
      nodeEnv: 'development',
      logLevel: LogLevel.WARN,
      cafeName: 'Cafe',
      currencySymbol: '£',
      staffName: 'Duty Manager',
      menuDataPath: path.join(__dirname, '../menu_data/cafe.json')
    });
  });

  test('reads overrides from the environment', () => {
    const config = loadConfig({
      NODE_ENV: 'test',
      LOG_LEVEL: 'DEBUG',
      CAFE_NAME: 'Corner Cafe',
      CURRENCY_SYMBOL: '€',
      MENU_DATA_PATH: '/srv/menus/corner.json'
    });

    expect(config).toMatchObject({
      nodeEnv: 'test',
      logLevel: LogLevel.DEBUG,
      cafeName: 'Corner Cafe',
      currencySymbol: '€',
      menuDataPath: '/srv/menus/corner.json'
    });
  });

  test('rejects an unknown log level', () => {
    expect(() => loadConfig({ LOG_LEVEL: 'LOUD' })).toThrow(ConfigError);
    expect(() => loadConfig({ LOG_LEVEL: 'LOUD' })).toThrow(/^Invalid configuration: LOG_LEVEL: /);
  });

  test('rejects an unknown environment', () => {
    expect(() => loadConfig({ NODE_ENV: 'staging' })).toThrow(ConfigError);
  });
});
