import { describe, it, expect } from 'vitest';
import {
  OAuthClientSecretSchema,
  ServiceAccountKeySchema,
  StoredTokenSchema,
  formatValidationErrors,
  safeValidateConfig,
  validateConfig,
} from '../schemas/index.js';

/**
 * Collect formatted error messages for an invalid config
 */
function configErrors(data: unknown): string[] {
  const result = safeValidateConfig(data);
  if (result.success) {
    throw new Error('Expected config to be invalid');
  }
  return formatValidationErrors(result.error);
}

describe('Config Validation', () => {
  describe('defaults', () => {
    it('should accept an empty config', () => {
      const config = validateConfig({});

      expect(config.worksheet).toBe('PT-CZW');
      expect(config.strategy).toBe('columns');
      expect(config.layout.dateRow).toBe(5);
      expect(config.layout.dayColumns).toHaveLength(7);
      expect(config.layout.dayColumns[0]).toEqual(['A', 'B']);
      expect(config.layout.dayColumns[6]).toEqual(['M', 'N']);
      expect(config.layout.sections).toEqual([
        { label: 'customer-service', startRow: 7, endRow: 15 },
        { label: 'ticket-agent', startRow: 24, endRow: 31 },
      ]);
      expect(config.layout.annotationTags).toEqual(['PLAKATY']);
    });

    it('should default event settings', () => {
      expect(validateConfig({}).event).toEqual({
        summary: 'Workshift',
        location: '',
        timeZone: 'Europe/Warsaw',
        reminderMinutes: 15,
        calendarId: 'primary',
      });
    });

    it('should default to OAuth credentials in the working directory', () => {
      expect(validateConfig({}).auth).toEqual({
        mode: 'oauth',
        clientSecretPath: 'client_secret.json',
        tokenPath: 'token.json',
      });
    });

    it('should fill in defaults next to partial sections', () => {
      const config = validateConfig({ layout: { dateRow: 3 }, event: { summary: 'Info desk' } });

      expect(config.layout.dateRow).toBe(3);
      expect(config.layout.dayColumns).toHaveLength(7);
      expect(config.event.summary).toBe('Info desk');
      expect(config.event.timeZone).toBe('Europe/Warsaw');
    });

    it('should accept service-account credentials', () => {
      const config = validateConfig({ auth: { mode: 'service-account', subject: 'me@example.com' } });

      expect(config.auth).toEqual({
        mode: 'service-account',
        keyFilePath: 'service_account.json',
        subject: 'me@example.com',
      });
    });
  });

  describe('errors', () => {
    it('should reject sections ending before they start', () => {
      expect(
        configErrors({ layout: { sections: [{ label: 'x', startRow: 10, endRow: 5 }] } })
      ).toEqual(['layout.sections.0.endRow: endRow must not be before startRow']);
    });

    it('should reject lower-case column letters', () => {
      expect(configErrors({ layout: { dayColumns: [['a', 'B']] } })).toEqual([
        'layout.dayColumns.0.0: Column must be upper-case A1 letters (e.g., "B")',
      ]);
    });

    it('should reject unknown strategies', () => {
      const errors = configErrors({ strategy: 'fuzzy' });

      expect(errors).toHaveLength(1);
      expect(errors[0].startsWith('strategy: ')).toBe(true);
    });

    it('should reject unknown auth modes', () => {
      const errors = configErrors({ auth: { mode: 'api-key' } });

      expect(errors).toHaveLength(1);
      expect(errors[0].startsWith('auth.mode: ')).toBe(true);
    });
  });
});

describe('Credential file schemas', () => {
  it('should pick the installed client section', () => {
    expect(
      OAuthClientSecretSchema.parse({ installed: { client_id: 'test-client', client_secret: 'test-secret' } })
    ).toEqual({ client_id: 'test-client', client_secret: 'test-secret', redirect_uris: [] });
  });

  it('should accept a web client section', () => {
    const client = OAuthClientSecretSchema.parse({
      web: { client_id: 'web-client', client_secret: 'test-secret', redirect_uris: ['http://localhost:3000'] },
    });

    expect(client.redirect_uris).toEqual(['http://localhost:3000']);
  });

  it('should reject a client secret without a client section', () => {
    const result = OAuthClientSecretSchema.safeParse({});

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatValidationErrors(result.error)).toEqual([
        'Client secret must contain an "installed" or "web" section',
      ]);
    }
  });

  it('should read authorized-user token files', () => {
    const token = StoredTokenSchema.parse({
      token: 'test-access',
      refresh_token: 'test-refresh',
      expiry: '2024-03-01T10:00:00Z',
    });

    expect(token.access_token).toBe('test-access');
    expect(token.refresh_token).toBe('test-refresh');
    expect(token.expiry_date).toBe(1709287200000);
  });

  it('should keep googleapis token fields', () => {
    const token = StoredTokenSchema.parse({
      access_token: 'test-access',
      expiry_date: 1709287200000,
      token_type: 'Bearer',
    });

    expect(token.access_token).toBe('test-access');
    expect(token.refresh_token).toBeUndefined();
    expect(token.expiry_date).toBe(1709287200000);
    expect(token.token_type).toBe('Bearer');
  });

  it('should require a service_account key type', () => {
    const key = {
      type: 'authorized_user',
      client_email: 'bot@test-project.iam.gserviceaccount.com',
      private_key: 'test-key',
    };

    expect(ServiceAccountKeySchema.safeParse(key).success).toBe(false);
    expect(ServiceAccountKeySchema.safeParse({ ...key, type: 'service_account' }).success).toBe(true);
  });
});
