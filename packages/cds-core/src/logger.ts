import * as winston from 'winston';
import { Logtail } from '@logtail/node';
import { LogtailTransport } from '@logtail/winston';

// הרחבת הטיפוס של info כך ש-TypeScript יכיר את השדות שאנחנו מוסיפים
declare module 'winston' {
  namespace Logform {
    interface TransformableInfo {
      environment?: string;
      module?: string;
      // מסנני המודולים עובדים על label
      label?: string;
    }
  }
}

/*
```ps
$env:LOG_MODULES = "ContentDirectoryService,SoapHandler"
$env:LOG_LEVEL = "debug"
```
*/

// רמות הלוג של הפרויקט. trace מחליף את http, verbose ו-silly
const logLevels = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
  trace: 4,
};

// כדי ש-TypeScript יכיר את logger.trace() ושאר הרמות המותאמות
export type ModuleLogger = winston.Logger & {
  [level in keyof typeof logLevels]: winston.LeveledLogMethod;
};

const logColors = {
  error: 'red',
  warn: 'yellow',
  info: 'green',
  debug: 'blue',
  trace: 'magenta',
};

winston.addColors(logColors);

const splitModuleList = (value: string): string[] =>
  value.split(',').map(m => m.trim()).filter(m => m);

// --- פורמטים ---

// הסתרת מודולים שמופיעים ב-LOG_HIDE_MODULES
const hideByModuleNameFormat = winston.format((info) => {
  const hidden = process.env.LOG_HIDE_MODULES;
  if (hidden && hidden.trim() !== '' && info.label) {
    if (splitModuleList(hidden).includes(info.label)) {
      return false;
    }
  }
  return info;
});

// הצגה סלקטיבית לפי LOG_MODULES. ריק או "*" מציג הכל
const filterByModuleNameFormat = winston.format((info) => {
  const allowed = process.env.LOG_MODULES;
  if (!allowed || allowed.trim() === '' || allowed.trim() === '*') {
    return info;
  }
  if (info.label) {
    const allowedModules = splitModuleList(allowed);
    if (allowedModules.length > 0 && !allowedModules.includes(info.label)) {
      return false;
    }
  }
  return info;
});

const ERROR_LIKE_FIELDS = ['message', 'code', 'errno', 'syscall', 'address', 'port'] as const;

/**
 * מעצב אובייקט שנראה כמו שגיאה (למשל שגיאת רשת של axios) בלי לאבד את השדות החשובים.
 * @returns null אם האובייקט לא נראה כמו שגיאה.
 */
function describeErrorLike(key: string, value: object): string | null {
  const fields = new Map<string, unknown>(Object.entries(value));
  if (!ERROR_LIKE_FIELDS.some(f => fields.has(f)) && !fields.has('stack')) {
    return null;
  }

  const parts = ERROR_LIKE_FIELDS
    .filter(f => fields.get(f) !== undefined && fields.get(f) !== '')
    .map(f => {
      const fieldValue = fields.get(f);
      return typeof fieldValue === 'number' ? `${f}: ${fieldValue}` : `${f}: "${String(fieldValue)}"`;
    });

  let text = `${key}=PotentialError: { ${parts.join(', ')} }`;
  const stack = fields.get('stack');
  if (typeof stack === 'string' && stack) {
    text += `\nStack: ${stack}`;
  }
  return text;
}

/**
 * פונקציית עזר לפורמט של מטא-דאטה, כולל טיפול בשגיאות.
 * @param metadata - שדות הלוג שנשארו אחרי הוצאת השדות הקבועים.
 */
function formatLogMetadata(metadata: Record<string, unknown>): string {
  const entries = Object.entries(metadata);
  if (entries.length === 0) {
    return '';
  }

  const metaString = entries
    .map(([key, value]) => {
      if (value instanceof Error) {
        return `${key}=Error: ${value.message}${value.stack ? `\nStack: ${value.stack}` : ''}`;
      }
      if (typeof value === 'object' && value !== null) {
        const described = describeErrorLike(key, value);
        if (described) {
          return described;
        }
      }
      try {
        return `${key}=${JSON.stringify(value)}`;
      } catch {
        return `${key}=[UnstringifiableObject]`;
      }
    })
    .join(' ');

  return metaString ? ` ${metaString}` : '';
}

const renderLine = (info: winston.Logform.TransformableInfo, levelString: string): string => {
  let logMessage = `${info.timestamp} [${info.environment?.toUpperCase()}] [${levelString}]`;
  if (info.module) {
    logMessage += ` (${info.module})`;
  }
  logMessage += `: ${info.message}`;

  const {
    level, message, timestamp, label,
    module: _module, environment: _environment,
    [Symbol.for('level')]: _levelSymbol, [Symbol.for('message')]: _messageSymbol,
    stack,
    ...otherMeta
  } = info;

  logMessage += formatLogMetadata(otherMeta);

  if (typeof stack === 'string') {
    logMessage += `\n${stack}`;
  }
  return logMessage;
};

// פורמט טקסט ללא צבעים (לקובץ)
const createTextFormat = () => winston.format.combine(
  hideByModuleNameFormat(),
  filterByModuleNameFormat(),
  winston.format.printf((info) => {
    const originalLevel = info[Symbol.for('level')];
    const levelString = typeof originalLevel === 'string' ? originalLevel.toUpperCase() : 'UNKNOWN_LEVEL';
    return renderLine(info, levelString);
  })
);

// פורמט לקונסולה
export const consoleFormat = () => winston.format.combine(
  winston.format.padLevels(),
  hideByModuleNameFormat(),
  filterByModuleNameFormat(),
  winston.format.printf((info) => renderLine(info, info.level.toUpperCase())),
  winston.format.colorize({ colors: logColors, message: true, level: true, all: true }),
);

export const fileFormat = () => createTextFormat();

const LOG_FILE_MAX_SIZE = 5242880; // 5MB

const consoleEnabled = () => process.env.LOG_TO_CONSOLE === 'true' || process.env.LOG_TO_CONSOLE === undefined;

// --- Logtail ---

function setupLogtailTransport(moduleName: string, environment: string): winston.transport | null {
  const logtailSourceToken = process.env.LOGTAIL_SOURCE_TOKEN;
  const logtailIngestingHost = process.env.LOGTAIL_INGESTING_HOST;
  const logToLogtail = process.env.LOG_TO_LOGTAIL === 'true';

  if (!logToLogtail) {
    return null;
  }

  if (!logtailSourceToken || !logtailIngestingHost) {
    if (consoleEnabled()) {
      // הלוגר עצמו עוד לא קיים כאן
      console.warn(`[LoggerSetup] LOG_TO_LOGTAIL=true but LOGTAIL_SOURCE_TOKEN or LOGTAIL_INGESTING_HOST is missing. Logtail disabled for module: ${moduleName} (${environment}).`);
    }
    return null;
  }

  try {
    const logtail = new Logtail(logtailSourceToken, {
      endpoint: `https://${logtailIngestingHost}`,
    });
    return new LogtailTransport(logtail);
  } catch (error) {
    console.warn(`[LoggerSetup] Failed to initialize Logtail transport for module: ${moduleName} (${environment}).`, error);
    return null;
  }
}

// --- יצירת לוגר ---

const createModuleLogger = (moduleName: string): ModuleLogger => {
  const environment = process.env.NODE_ENV || 'unknown';
  const activeTransports: winston.transport[] = [];
  const logToFile = process.env.LOG_TO_FILE === 'true';

  if (consoleEnabled()) {
    activeTransports.push(new winston.transports.Console({ format: consoleFormat() }));
  }

  if (logToFile) {
    activeTransports.push(new winston.transports.File({
      filename: process.env.LOG_FILE_PATH || 'logs/app.log',
      format: fileFormat(),
      maxsize: LOG_FILE_MAX_SIZE,
      maxFiles: 5,
      tailable: true,
    }));
  }

  const logtailTransport = setupLogtailTransport(moduleName, environment);
  if (logtailTransport) {
    activeTransports.push(logtailTransport);
  }

  // קבצי exceptions/rejections נפתחים רק כשכתיבה לקובץ מופעלת
  const handlerTransports = (envPath: string | undefined, fallback: string): winston.transport[] =>
    logToFile ? [new winston.transports.File({ filename: envPath || fallback, format: fileFormat() })] : [];

  return winston.createLogger({
    level: process.env.LOG_LEVEL || 'info',
    levels: logLevels,
    format: winston.format.combine(
      winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
      winston.format((info) => {
        info.environment = environment;
        if (moduleName) {
          info.module = moduleName;
          info.label = moduleName;
        }
        return info;
      })(),
      winston.format.errors({ stack: true })
    ),
    transports: activeTransports,
    exceptionHandlers: handlerTransports(process.env.LOG_EXCEPTIONS_PATH, 'logs/exceptions.log'),
    rejectionHandlers: handlerTransports(process.env.LOG_REJECTIONS_PATH, 'logs/rejections.log'),
    exitOnError: false,
  }) as ModuleLogger; // winston לא מסיק את המתודות של רמות מותאמות
};

export default createModuleLogger;

export { createTextFormat, createModuleLogger };
