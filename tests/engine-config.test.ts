import { describe, it, expect, vi } from 'vitest';
import { loadEngineConfig } from '../server/config/engine-config';

describe('loadEngineConfig', () => {
  it('should apply defaults and normalize the admin list', () => {
    const config = loadEngineConfig({
      JWT_SECRET: 'test-secret',
      ADMIN_EMAILS: ' Admin@Example.edu, ops@example.edu ,',
      RATE_LIMIT_WINDOW_SECONDS: '10',
    });

    expect(config).toEqual({
      env: 'development',
      port: 5000,
      databaseUrl: undefined,
      auth: { jwtSecret: 'test-secret', adminEmails: ['admin@example.edu', 'ops@example.edu'] },
      rateLimit: { maxRequests: 5, windowMs: 10_000 },
      classification: { topicConfidenceThreshold: 0.5, timeoutMs: 250 },
      moderation: { maxMessageLength: 2000, alertMinSeverity: 'high' },
      alerts: { emailTo: undefined, resendApiKey: undefined, fromEmail: 'alerts@localhost', timeoutMs: 5000 },
      analyticsCron: '*/15 * * * *',
    });
  });

  it('should treat an empty alert address as unset', () => {
    expect(loadEngineConfig({ JWT_SECRET: 'test-secret', ALERT_EMAIL_TO: '' }).alerts.emailTo).toBeUndefined();
  });

  it('should fail without a verification secret', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    expect(() => loadEngineConfig({})).toThrow('JWT_SECRET');
    errorSpy.mockRestore();
  });

  it('should reject unknown severities', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    expect(() => loadEngineConfig({ JWT_SECRET: 'test-secret', ALERT_MIN_SEVERITY: 'severe' })).toThrow('ALERT_MIN_SEVERITY');
    errorSpy.mockRestore();
  });
});
