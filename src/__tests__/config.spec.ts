import { loadApiCredentials, loadBucketTarget, loadEnvironment } from '../config';
import { ConfigurationError } from '../errors';

describe('config', () => {
  const fullEnv = {
    CF_API_KEY: 'test-api-key',
    R2_ACCESS_KEY_ID: 'test-access-key-id',
    R2_SECRET_ACCESS_KEY: 'test-secret',
    CF_ACCOUNT_ID: 'test-account',
    BUCKET_NAME: 'test-bucket'
  };

  describe('loadEnvironment', () => {
    it('should return every value when all variables are set', () => {
      const env = loadEnvironment(fullEnv);

      expect(env).toEqual({
        apiKey: 'test-api-key',
        accessKeyId: 'test-access-key-id',
        secretAccessKey: 'test-secret',
        accountId: 'test-account',
        bucketName: 'test-bucket'
      });
      expect(Object.isFrozen(env)).toBe(true);
    });

    it('should report all missing variables at once, in order', () => {
      let caught: unknown;
      try {
        loadEnvironment({});
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(ConfigurationError);
      if (!(caught instanceof ConfigurationError)) return;
      expect(caught.missing).toEqual([
        'CF_API_KEY',
        'R2_ACCESS_KEY_ID',
        'R2_SECRET_ACCESS_KEY',
        'CF_ACCOUNT_ID',
        'BUCKET_NAME'
      ]);
      expect(caught.message).toBe(
        'CF_API_KEY is not set\n' +
        'R2_ACCESS_KEY_ID is not set\n' +
        'R2_SECRET_ACCESS_KEY is not set\n' +
        'CF_ACCOUNT_ID is not set\n' +
        'BUCKET_NAME is not set'
      );
    });

    it('should treat empty values as missing', () => {
      expect(() => loadEnvironment({ ...fullEnv, BUCKET_NAME: '' })).toThrow('BUCKET_NAME is not set');
    });

    it('should pick up the optional API base URL', () => {
      const env = loadEnvironment({ ...fullEnv, CF_API_BASE_URL: 'http://127.0.0.1:8787' });
      expect(env.apiBaseUrl).toBe('http://127.0.0.1:8787');
    });

    it('should not require the API base URL', () => {
      expect(loadEnvironment(fullEnv).apiBaseUrl).toBeUndefined();
    });
  });

  describe('loadApiCredentials', () => {
    it('should only look at the credential variables', () => {
      expect(loadApiCredentials({
        CF_API_KEY: 'test-api-key',
        R2_ACCESS_KEY_ID: 'test-access-key-id',
        R2_SECRET_ACCESS_KEY: 'test-secret'
      })).toEqual({
        apiKey: 'test-api-key',
        accessKeyId: 'test-access-key-id',
        secretAccessKey: 'test-secret'
      });
    });

    it('should list each missing credential', () => {
      expect(() => loadApiCredentials({ R2_ACCESS_KEY_ID: 'test-access-key-id' }))
        .toThrow('CF_API_KEY is not set\nR2_SECRET_ACCESS_KEY is not set');
    });
  });

  describe('loadBucketTarget', () => {
    it('should read the account and bucket', () => {
      expect(loadBucketTarget({ CF_ACCOUNT_ID: 'test-account', BUCKET_NAME: 'test-bucket' }))
        .toEqual({ accountId: 'test-account', bucketName: 'test-bucket' });
    });

    it('should fail when both are missing', () => {
      expect(() => loadBucketTarget({ CF_API_KEY: 'test-api-key' }))
        .toThrow(new ConfigurationError(['CF_ACCOUNT_ID', 'BUCKET_NAME']));
    });
  });
});
