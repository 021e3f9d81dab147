import type { LogLevel } from '@nestjs/common';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';

const LOG_LEVELS: readonly LogLevel[] = ['verbose', 'debug', 'log', 'warn', 'error', 'fatal'];

/**
 * Port the webhook listens on.
 * Can be configured via PORT environment variable.
 */
export function getPort(): number {
  return Number.parseInt(process.env['PORT'] || '9443', 10);
}

export function getHost(): string {
  return process.env['HOST'] || '0.0.0.0';
}

/**
 * Levels enabled for the Nest logger: `LOG_LEVEL` and every level above it.
 * An unknown value falls back to `log`.
 */
export function getLogLevels(): LogLevel[] {
  const configured = process.env['LOG_LEVEL'] ?? 'log';
  const threshold = LOG_LEVELS.findIndex((level) => level === configured);
  return LOG_LEVELS.slice(threshold === -1 ? LOG_LEVELS.indexOf('log') : threshold);
}

/**
 * Largest JSON body accepted on `POST /convert`, in body-parser notation.
 * A LIST at another version arrives as one review holding every item.
 * Can be configured via BODY_LIMIT environment variable.
 */
export function getBodyLimit(): string {
  return process.env['BODY_LIMIT'] || '10mb';
}

export interface TlsFiles {
  certFile: string;
  keyFile: string;
}

/** Certificate and key paths; the API server only calls webhooks over HTTPS. */
export function getTlsFiles(): TlsFiles | undefined {
  const certFile = process.env['TLS_CERT_FILE'];
  const keyFile = process.env['TLS_KEY_FILE'];
  if (!certFile || !keyFile) {
    return undefined;
  }
  return { certFile, keyFile };
}

const packageJsonPath = fileURLToPath(new URL('../../package.json', import.meta.url));

/** Version from package.json, read once on first use. */
let packageVersion: string | undefined;

export function getVersion(): string {
  if (packageVersion === undefined) {
    const packageJson = JSON.parse(readFileSync(packageJsonPath, 'utf-8')) as { version: string };
    packageVersion = packageJson.version;
  }
  return packageVersion;
}
