import { describe, expect, it } from 'vitest';
import { loadConfig } from './config';
import type { PayloadCipher } from './drive/types';
import { createTestLogger } from './testing/helpers';
import { TransferHook } from './sync/transferHook';
import { buildServices } from './wiring';

const NO_CIPHER_WARNING = '[Resolver] No payload cipher configured, app download requests go out unencrypted';

describe('buildServices', () => {
  const base = { API_KEY: 'test-key', HISTORY_DB_PATH: ':memory:' };

  it('warns when app downloads go out without a payload cipher', async () => {
    const logger = createTestLogger();
    const services = await buildServices(loadConfig(base), logger);

    expect(logger.warn).toHaveBeenCalledWith(NO_CIPHER_WARNING);
    expect(services.transfer).toBeNull();
    await services.history?.close();
  });

  it('stays quiet when a cipher is supplied', async () => {
    const logger = createTestLogger();
    const cipher: PayloadCipher = { encrypt: (plain) => `enc:${plain}`, decrypt: (data) => data };
    const services = await buildServices(loadConfig(base), logger, cipher);

    expect(logger.warn).not.toHaveBeenCalledWith(NO_CIPHER_WARNING);
    await services.history?.close();
  });

  it('builds the transfer hook when transfer monitoring is enabled', async () => {
    const logger = createTestLogger();
    const services = await buildServices(
      loadConfig({
        ...base,
        SERVER_ADDRESS: 'http://mp:3000',
        TRANSFER_MONITOR_ENABLED: 'true',
        TRANSFER_MONITOR_PATHS: '/strm#/Media',
      }),
      logger,
    );

    expect(services.transfer).toBeInstanceOf(TransferHook);
    await services.history?.close();
  });

  it('explains an enabled transfer monitor without mappings', async () => {
    const logger = createTestLogger();
    const services = await buildServices(loadConfig({ ...base, TRANSFER_MONITOR_ENABLED: 'true' }), logger);

    expect(services.transfer).toBeNull();
    expect(logger.warn).toHaveBeenCalledWith('[Transfer] Enabled but TRANSFER_MONITOR_PATHS or SERVER_ADDRESS is missing');
    await services.history?.close();
  });
});
