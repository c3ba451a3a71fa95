import os from 'node:os';
import path from 'node:path';
import { mkdtemp, rm } from 'node:fs/promises';
import { afterEach, describe, expect, it } from 'vitest';

import type { Registration } from '../src/appservice/registration.js';
import { parseAppConfig } from '../src/config.js';
import {
  formatStartupIssue,
  StartupValidationError,
  throwOnStartupErrors,
  validateRegistration,
  validateStartupConfig,
} from '../src/utils/startup.js';

const tempDirs: string[] = [];

afterEach(async () => {
  while (tempDirs.length > 0) {
    const dir = tempDirs.pop();
    if (!dir) continue;
    await rm(dir, { recursive: true, force: true });
  }
});

const configIn = async (overrides: NodeJS.ProcessEnv = {}) => {
  const dir = await mkdtemp(path.join(os.tmpdir(), 'matrix-free-stuff-startup-'));
  tempDirs.push(dir);
  return parseAppConfig(
    {
      HOMESERVER_URL: 'https://matrix.example.org',
      APPSERVICE_REGISTRATION: path.join(dir, 'registration', 'registration.yaml'),
      WEBHOOK_SECRET: 'test-secret',
      ...overrides,
    },
    {},
  );
};

const registration = (url: string | null): Registration => ({
  id: 'free-stuff',
  url,
  as_token: 'test-as-token',
  hs_token: 'test-hs-token',
  sender_localpart: 'free-stuff',
  namespaces: { users: [], aliases: [], rooms: [] },
});

describe('startup checks', () => {
  it('passes a complete configuration without errors', async () => {
    const issues = validateStartupConfig(await configIn());
    expect(issues.filter((issue) => issue.severity === 'error')).toEqual([]);
    expect(() => throwOnStartupErrors(issues)).not.toThrow();
  });

  it('warns when no webhook secret is configured', async () => {
    const issues = validateStartupConfig(await configIn({ WEBHOOK_SECRET: '' }));
    const missing = issues.find((issue) => issue.code === 'missing_webhook_secret');
    expect(missing?.severity).toBe('warn');
  });

  it('warns when the server name is taken from the homeserver url', async () => {
    const derived = validateStartupConfig(await configIn({ HOMESERVER_URL: 'http://localhost:8008' }));
    expect(derived.find((issue) => issue.code === 'derived_homeserver_name')).toEqual({
      severity: 'warn',
      area: 'homeserver',
      message: 'HOMESERVER_NAME is not set; using "localhost:8008" from HOMESERVER_URL for the bridge user id.',
      remediation:
        'Set HOMESERVER_NAME to the server name that appears in user ids. It differs from the URL host when the URL carries a port or the name is delegated.',
      code: 'derived_homeserver_name',
    });

    const explicit = validateStartupConfig(
      await configIn({ HOMESERVER_URL: 'http://localhost:8008', HOMESERVER_NAME: 'localhost' }),
    );
    expect(explicit.some((issue) => issue.code === 'derived_homeserver_name')).toBe(false);
  });

  it('fails on a homeserver url that is not http', async () => {
    const issues = validateStartupConfig(await configIn({ HOMESERVER_URL: 'ftp://matrix.example.org' }));
    const protocol = issues.find((issue) => issue.code === 'homeserver_url_protocol');
    expect(protocol?.severity).toBe('error');
    expect(protocol?.message).toBe('HOMESERVER_URL must use http or https, got "ftp:".');

    expect(() => throwOnStartupErrors(issues)).toThrow(StartupValidationError);
    try {
      throwOnStartupErrors(issues);
    } catch (error) {
      expect(error).toBeInstanceOf(StartupValidationError);
      if (error instanceof StartupValidationError) {
        expect(error.errorCount).toBe(1);
      }
    }
  });

  it('warns about a registration without a callback url', () => {
    expect(validateRegistration(registration(null))).toEqual([
      {
        severity: 'warn',
        area: 'registration',
        message: 'registration "free-stuff" has no url; the homeserver cannot push transactions.',
        remediation:
          'Set APPSERVICE_URL before the registration is first written, or edit the url field and reload the homeserver.',
        code: 'registration_without_url',
      },
    ]);
    expect(validateRegistration(registration('http://127.0.0.1:3000'))).toEqual([]);
  });

  it('renders remediation after the message', () => {
    expect(formatStartupIssue({ severity: 'warn', area: 'webhook', message: 'Problem.', remediation: 'Fix it.' })).toBe(
      'Problem. Remediation: Fix it.',
    );
    expect(formatStartupIssue({ severity: 'warn', area: 'webhook', message: 'Problem.' })).toBe('Problem.');
  });
});
