import {
  hookwardenConfigFromEnvironment,
  parseSecrets,
  validateEnvironment,
} from '../../src';

describe('Environment validation', () => {
  it('should convert numeric and boolean variables', () => {
    const env = validateEnvironment({
      WEBHOOK_SECRETS: 'whsec_current,whsec_previous',
      WEBHOOK_TOLERANCE_SECONDS: '120',
      WEBHOOK_STALE_PROCESSING_SECONDS: '90',
      WEBHOOK_RETENTION_AUTO_CLEANUP: 'true',
      WEBHOOK_PROCESSING_MODE: 'deferred',
      PORT: '8080',
    });

    expect(env.WEBHOOK_TOLERANCE_SECONDS).toBe(120);
    expect(env.WEBHOOK_STALE_PROCESSING_SECONDS).toBe(90);
    expect(env.WEBHOOK_RETENTION_AUTO_CLEANUP).toBe(true);
    expect(env.WEBHOOK_PROCESSING_MODE).toBe('deferred');
    expect(env.PORT).toBe(8080);
  });

  it('should require signing secrets', () => {
    expect(() => validateEnvironment({})).toThrow(/WEBHOOK_SECRETS/);
  });

  it('should reject an unknown processing mode', () => {
    expect(() =>
      validateEnvironment({
        WEBHOOK_SECRETS: 'whsec_test_secret',
        WEBHOOK_PROCESSING_MODE: 'eventually',
      }),
    ).toThrow(/WEBHOOK_PROCESSING_MODE/);
  });

  it('should reject a non-numeric tolerance', () => {
    expect(() =>
      validateEnvironment({
        WEBHOOK_SECRETS: 'whsec_test_secret',
        WEBHOOK_TOLERANCE_SECONDS: 'five minutes',
      }),
    ).toThrow(/WEBHOOK_TOLERANCE_SECONDS/);
  });

  it('should build module configuration', () => {
    const config = hookwardenConfigFromEnvironment(
      validateEnvironment({
        WEBHOOK_SECRETS: ' whsec_current , whsec_previous ',
        WEBHOOK_SIGNATURE_HEADER: 'x-signature',
        WEBHOOK_RETENTION_DAYS: '14',
        STORAGE_TYPE: 'typeorm',
      }),
    );

    expect(config.storage).toEqual({ type: 'typeorm' });
    expect(config.verification.secrets).toEqual(['whsec_current', 'whsec_previous']);
    expect(config.verification.signatureHeader).toBe('x-signature');
    expect(config.retention?.retentionDays).toBe(14);
    expect(config.processingMode).toBeUndefined();
  });

  it('should drop empty entries from the secret list', () => {
    expect(parseSecrets('a,,b, ')).toEqual(['a', 'b']);
  });
});
