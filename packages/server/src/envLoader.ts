import dotenv from 'dotenv';
import path from 'path';
import fs from 'fs';
import { fileURLToPath } from 'url';

const moduleDir = path.dirname(fileURLToPath(import.meta.url));

/** @hebrew תיקיית חבילת השרת (packages/server). */
export const serverPackageDir = path.resolve(moduleDir, '..');

// נתיב לקובץ .env בשורש הפרויקט
const parentEnvPath = path.resolve(moduleDir, '../../../.env');

// נתיב לקובץ .env מקומי, בתוך חבילת השרת
const localEnvPath = path.resolve(serverPackageDir, '.env');

const loadEnvFile = (filePath: string, override: boolean = false) => {
  if (fs.existsSync(filePath)) {
    const result = dotenv.config({ path: filePath, override });
    if (result.error) {
      console.warn(`[EnvLoader] Error loading .env file from ${filePath}:`, result.error.message);
    }
  }
};

// 1. קובץ השורש הוא הבסיס
loadEnvFile(parentEnvPath);

// 2. הקובץ המקומי דורס ערכים זהים מהקובץ הגלובלי
loadEnvFile(localEnvPath, true);

/**
 * בודק אם מחרוזת ניתנת להמרה למספר ללא איבוד מידע ("1" ו-"1.0" נחשבים זהים).
 */
export function isStringLosslesslyNumeric(value: string | undefined): value is string {
  if (value === undefined || value.trim() === '') {
    return false;
  }

  const num = Number(value);
  if (!isFinite(num)) {
    return false;
  }

  return String(num) === value || num === parseFloat(value);
}

export type ProcessedEnv = Record<string, string | number | undefined>;

/**
 * מעבד את משתני הסביבה וממיר ערכים מספריים למספרים.
 */
export const processEnv = (source: NodeJS.ProcessEnv): ProcessedEnv => {
  const processed: ProcessedEnv = {};

  for (const key in source) {
    const value = source[key];
    processed[key] = isStringLosslesslyNumeric(value) ? Number(value) : value;
  }
  return processed;
};

/**
 * משתני הסביבה לאחר טעינה ועיבוד. יש לייבא את האובייקט הזה במקום לגשת ישירות ל-process.env.
 */
export const env = processEnv({ ...process.env });
