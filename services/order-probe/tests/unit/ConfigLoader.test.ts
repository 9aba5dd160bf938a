import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  DEFAULT_CONFIG_PATH,
  loadCredentials,
  loadProbeConfig,
  parseProbeConfig,
  resolveConfigPath,
} from '../../src/config/ConfigLoader';
import { ConfigError } from '../../src/utils/errors';

const validConfig = {
  side: 'sell',
  instrumentName: 'ETH-PERPETUAL',
  orderAmount: 1,
  basePrice: 3000,
  priceOffsetPercent: 3,
  editOffsetStepPercent: 0.5,
  numIterations: 5,
  sleepBetweenRequestsSecs: 0.1,
  outputLatencyCsv: 'out/samples.csv',
};

function configError(run: () => unknown): ConfigError {
  try {
    run();
  } catch (error) {
    if (error instanceof ConfigError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected a ConfigError');
}

describe('ConfigLoader', () => {
  describe('parseProbeConfig', () => {
    it('should apply defaults for optional switches', () => {
      const config = parseProbeConfig(validConfig);

      expect(config).toEqual({
        ...validConfig,
        testnet: true,
        subscribeRawBook: true,
        printSummary: true,
      });
      expect(Object.isFrozen(config)).toBe(true);
    });

    it('should keep explicit switches', () => {
      const config = parseProbeConfig({ ...validConfig, testnet: false, printSummary: false });

      expect(config.testnet).toBe(false);
      expect(config.printSummary).toBe(false);
    });

    it('should name the offending field', () => {
      const error = configError(() => parseProbeConfig({ ...validConfig, side: 'hold' }));

      expect(error.field).toBe('side');
      expect(error.message).toMatch(/^Configuration error: .* \(field: side\)$/);
    });

    it.each([
      ['numIterations', 1.5],
      ['numIterations', -1],
      ['orderAmount', 0],
      ['priceOffsetPercent', 101],
      ['sleepBetweenRequestsSecs', -0.5],
      ['instrumentName', ''],
    ])('should reject %s = %p', (field, value) => {
      const error = configError(() => parseProbeConfig({ ...validConfig, [field]: value }));

      expect(error.field).toBe(field);
    });

    it('should reject a missing required field', () => {
      const { outputLatencyCsv: _omitted, ...rest } = validConfig;

      expect(configError(() => parseProbeConfig(rest)).field).toBe('outputLatencyCsv');
    });
  });

  describe('loadProbeConfig', () => {
    let dir: string;

    beforeEach(() => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), 'probe-config-'));
    });

    afterEach(() => {
      fs.rmSync(dir, { recursive: true, force: true });
    });

    it('should load the shipped sample config', () => {
      const config = loadProbeConfig(path.join(__dirname, '../../config/order-probe.json'));

      expect(config.instrumentName).toBe('BTC-PERPETUAL');
      expect(config.side).toBe('buy');
      expect(config.numIterations).toBe(20);
    });

    it('should report a missing file', () => {
      const missing = path.join(dir, 'absent.json');

      expect(() => loadProbeConfig(missing)).toThrow(`config file not found at '${missing}'`);
    });

    it('should report unparseable JSON', () => {
      const file = path.join(dir, 'broken.json');
      fs.writeFileSync(file, '{ "side": ');

      expect(() => loadProbeConfig(file)).toThrow(`failed to parse config file at '${file}'`);
    });
  });

  describe('resolveConfigPath', () => {
    it('should default to the service config directory', () => {
      expect(resolveConfigPath({})).toBe(DEFAULT_CONFIG_PATH);
      expect(DEFAULT_CONFIG_PATH).toBe(path.join('config', 'order-probe.json'));
    });

    it('should honour ORDER_PROBE_CONFIG', () => {
      expect(resolveConfigPath({ ORDER_PROBE_CONFIG: '/etc/probe.json' })).toBe('/etc/probe.json');
    });
  });

  describe('loadCredentials', () => {
    it('should trim both values', () => {
      const credentials = loadCredentials({
        DERIBIT_CLIENT_ID: ' test-client ',
        DERIBIT_CLIENT_SECRET: 'test-secret\n',
      });

      expect(credentials).toEqual({ clientId: 'test-client', clientSecret: 'test-secret' });
    });

    it('should name the missing secret', () => {
      const error = configError(() => loadCredentials({ DERIBIT_CLIENT_ID: 'test-client' }));

      expect(error.field).toBe('DERIBIT_CLIENT_SECRET');
      expect(error.message).toBe(
        'Configuration error: exchange credentials must be set and non-empty (field: DERIBIT_CLIENT_SECRET)',
      );
    });

    it('should treat a blank id as missing', () => {
      const error = configError(() =>
        loadCredentials({ DERIBIT_CLIENT_ID: '   ', DERIBIT_CLIENT_SECRET: 'test-secret' }),
      );

      expect(error.field).toBe('DERIBIT_CLIENT_ID');
    });
  });
});
