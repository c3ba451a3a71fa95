import fs from 'node:fs';
import path from 'node:path';
import type { Registration } from '../appservice/registration.js';
import type { AppConfig } from '../config.js';
import { expandPath } from './path.js';

export interface StartupIssue {
  severity: 'warn' | 'error';
  area: string;
  message: string;
  remediation?: string;
  code?: string;
}

export class StartupValidationError extends Error {
  readonly errorCount: number;

  constructor(readonly issues: StartupIssue[]) {
    const errorCount = issues.filter((entry) => entry.severity === 'error').length;
    super(`startup checks failed with ${errorCount} error(s)`);
    this.name = 'StartupValidationError';
    this.errorCount = errorCount;
  }
}

const ensureDirWritable = (targetPath: string): string | null => {
  try {
    fs.mkdirSync(targetPath, { recursive: true });
    fs.accessSync(targetPath, fs.constants.F_OK | fs.constants.R_OK | fs.constants.W_OK);
    return null;
  } catch (error) {
    return error instanceof Error ? error.message : String(error);
  }
};

const issue = (entry: StartupIssue): StartupIssue => entry;

export const formatStartupIssue = (input: StartupIssue) => {
  if (!input.remediation) {
    return input.message;
  }
  return `${input.message} Remediation: ${input.remediation}`;
};

export const validateStartupConfig = (config: AppConfig): StartupIssue[] => {
  const issues: StartupIssue[] = [];

  if (config.WEBHOOK_SECRET === null) {
    issues.push(
      issue({
        severity: 'warn',
        area: 'webhook',
        message: 'WEBHOOK_SECRET is empty; webhook events are accepted without a secret.',
        remediation: 'Set WEBHOOK_SECRET (or WEBHOOK_SECRET_FILE) and send the same value in each event.',
        code: 'missing_webhook_secret',
      }),
    );
  }

  const protocol = new URL(config.HOMESERVER_URL).protocol;
  if (protocol !== 'http:' && protocol !== 'https:') {
    issues.push(
      issue({
        severity: 'error',
        area: 'homeserver',
        message: `HOMESERVER_URL must use http or https, got "${protocol}".`,
        remediation: 'Point HOMESERVER_URL at the client API base, for example https://matrix.example.org.',
        code: 'homeserver_url_protocol',
      }),
    );
  }

  if (config.HOMESERVER_NAME_DERIVED) {
    issues.push(
      issue({
        severity: 'warn',
        area: 'homeserver',
        message: `HOMESERVER_NAME is not set; using "${config.HOMESERVER_NAME}" from HOMESERVER_URL for the bridge user id.`,
        remediation:
          'Set HOMESERVER_NAME to the server name that appears in user ids. It differs from the URL host when the URL carries a port or the name is delegated.',
        code: 'derived_homeserver_name',
      }),
    );
  }

  const registrationDir = path.dirname(expandPath(config.APPSERVICE_REGISTRATION));
  const registrationDirErr = ensureDirWritable(registrationDir);
  if (registrationDirErr) {
    issues.push(
      issue({
        severity: 'error',
        area: 'registration',
        message: `APPSERVICE_REGISTRATION directory is not writable (${registrationDir}): ${registrationDirErr}`,
        remediation: `Create and chown the directory: mkdir -p "${registrationDir}" && chown -R $(id -un):$(id -gn) "${registrationDir}"`,
        code: 'registration_dir_not_writable',
      }),
    );
  }

  if (process.getuid?.() === 0) {
    issues.push(
      issue({
        severity: 'warn',
        area: 'runtime',
        message: 'Running as root; prefer a dedicated non-root user.',
        code: 'running_as_root',
      }),
    );
  }

  return issues;
};

export const validateRegistration = (registration: Registration): StartupIssue[] => {
  if (registration.url) return [];
  return [
    issue({
      severity: 'warn',
      area: 'registration',
      message: `registration "${registration.id}" has no url; the homeserver cannot push transactions.`,
      remediation: 'Set APPSERVICE_URL before the registration is first written, or edit the url field and reload the homeserver.',
      code: 'registration_without_url',
    }),
  ];
};

export const throwOnStartupErrors = (issues: StartupIssue[]) => {
  if (issues.some((entry) => entry.severity === 'error')) {
    throw new StartupValidationError(issues);
  }
  return issues;
};
