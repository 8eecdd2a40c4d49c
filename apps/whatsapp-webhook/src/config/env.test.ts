import { describe, expect, it } from 'vitest';

import { loadConfig } from './env';

const required = {
  WHATSAPP_SERVICE_API_KEY: 'test-api-key',
  META_BUSINESS_PHONE_NUMBER_ID: '1234567890',
  META_ACCESS_TOKEN_FROM_SYS_USER: 'test-token',
  META_WEBHOOK_VERIFY_TOKEN: 'verify-token',
  META_APP_SECRETS: 'test-secret',
};

describe('loadConfig', () => {
  it('applies defaults', () => {
    const config = loadConfig({ ...required, NODE_ENV: 'test' });

    expect(config.port).toBe(8001);
    expect(config.deploymentType).toBe('local');
    expect(config.backend).toEqual({
      baseUrl: 'http://localhost:8000',
      apiKey: 'test-api-key',
      timeoutMs: 60_000,
      simulated: false,
      simulatedErrorRate: 0,
    });
    expect(config.meta.alwaysReturnOk).toBe(true);
    expect(config.meta.apiVersion).toBe('v22.0');
    expect(config.whatsapp).toEqual({
      underMaintenance: false,
      retentionHours: 3,
      messageAgeThresholdSeconds: 86_400,
      devFilterPrefix: '!d ',
      typingIntervalSeconds: 26,
      typingMaxSeconds: 300,
      processingTimeoutSeconds: 300,
    });
    expect(config.deliveries).toEqual({ driver: 'memory', redisUrl: undefined });
  });

  it('splits and trims the app secrets', () => {
    const config = loadConfig({ ...required, META_APP_SECRETS: ' first , ,second ' });

    expect(config.meta.appSecrets).toEqual(['first', 'second']);
  });

  it('reads boolean flags in several spellings', () => {
    const config = loadConfig({
      ...required,
      WHATSAPP_UNDER_MAINTENANCE: 'YES',
      ALWAYS_RETURN_OK_TO_META: '0',
      MOCK_BACKEND_CLIENT: 'True',
    });

    expect(config.whatsapp.underMaintenance).toBe(true);
    expect(config.meta.alwaysReturnOk).toBe(false);
    expect(config.backend.simulated).toBe(true);
  });

  it('normalises the deployment type', () => {
    expect(loadConfig({ ...required, DEPLOYMENT_TYPE: 'Staging' }).deploymentType).toBe('staging');
  });

  it('reports the first missing secret', () => {
    const { META_APP_SECRETS: _secrets, ...rest } = required;

    expect(() => loadConfig(rest)).toThrow('META_APP_SECRETS is required');
  });

  it('rejects an invalid flag value', () => {
    expect(() => loadConfig({ ...required, WHATSAPP_UNDER_MAINTENANCE: 'maybe' })).toThrow(
      'Invalid WHATSAPP_UNDER_MAINTENANCE value: maybe',
    );
  });

  it('rejects an error rate outside 0-1', () => {
    expect(() => loadConfig({ ...required, MOCK_ERROR_RATE: '1.5' })).toThrow(
      'MOCK_ERROR_RATE must be between 0 and 1',
    );
  });

  it('requires a Redis URL for the redis delivery store', () => {
    expect(() => loadConfig({ ...required, DELIVERY_STORE_DRIVER: 'redis' })).toThrow(
      'DELIVERY_STORE_DRIVER=redis requires REDIS_URL environment variable',
    );
  });
});
