import path from 'path';
import { env, serverPackageDir, type ProcessedEnv } from './envLoader';

/**
 * תצורת השרת. כל ערך ניתן לדריסה במשתנה סביבה ששמו נגזר מהנתיב שלו:
 * server.port → SERVER_PORT, mediaServer.friendlyName → MEDIA_SERVER_FRIENDLY_NAME.
 */
export interface AppConfig {
  server: {
    port: number;
    host: string;
  };
  mediaServer: {
    friendlyName: string;
    /** @hebrew כתובת הבסיס לכתובות res; ריק = http://localhost:<port>. */
    publicUrl: string;
  };
  library: {
    file: string;
    browseAgeLimit: number;
  };
  events: {
    defaultTimeoutSec: number;
    notifyTimeoutMs: number;
    sweepIntervalMs: number;
  };
}

// פונקציית עזר להמרת camelCase ל-SNAKE_CASE
const camelToSnakeCase = (str: string) => str.replace(/[A-Z]/g, letter => `_${letter}`).toUpperCase();

export const envVarName = (configPath: string[]): string => configPath.map(camelToSnakeCase).join('_');

/**
 * קורא ערך מתוך הסביבה לפי נתיב התצורה, או מחזיר את ברירת המחדל.
 * ערך מספרי נדרס רק על ידי משתנה מספרי.
 */
function setting(source: ProcessedEnv, configPath: string[], fallback: number): number;
function setting(source: ProcessedEnv, configPath: string[], fallback: string): string;
function setting(source: ProcessedEnv, configPath: string[], fallback: string | number): string | number {
  const value = source[envVarName(configPath)];
  if (value === undefined) {
    return fallback;
  }
  if (typeof fallback === 'number') {
    return typeof value === 'number' ? value : fallback;
  }
  return String(value);
}

/**
 * בונה את התצורה מתוך משתני סביבה מעובדים.
 */
export function loadConfig(source: ProcessedEnv = env): AppConfig {
  const libraryFile = setting(source, ['library', 'file'], path.join(serverPackageDir, 'data', 'sample-library.json'));

  return {
    server: {
      port: setting(source, ['server', 'port'], 9000),
      host: setting(source, ['server', 'host'], '0.0.0.0'),
    },
    mediaServer: {
      friendlyName: setting(source, ['mediaServer', 'friendlyName'], 'UPnP Media Directory'),
      publicUrl: setting(source, ['mediaServer', 'publicUrl'], ''),
    },
    library: {
      file: path.resolve(libraryFile),
      browseAgeLimit: setting(source, ['library', 'browseAgeLimit'], 100),
    },
    events: {
      defaultTimeoutSec: setting(source, ['events', 'defaultTimeoutSec'], 1800),
      notifyTimeoutMs: setting(source, ['events', 'notifyTimeoutMs'], 5000),
      sweepIntervalMs: setting(source, ['events', 'sweepIntervalMs'], 60 * 1000),
    },
  };
}

export const config = loadConfig();
