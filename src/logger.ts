import fs from "node:fs";
import path from "node:path";
import winston from "winston";
import DailyRotateFile from "winston-daily-rotate-file";
import moment from "moment-timezone";
import { FixedTimeZone, formatInZone } from "./fixed-time-zone";
import type { LoggerOptions, LogLevel, RotationStrategy, TimestampContext, ZoneInput } from "./types";

const TIMESTAMP_FORMAT = "YYYY-MM-DD HH:mm:ss";
const DEFAULT_LOG_DIR = path.resolve(process.cwd(), "logs");

const defaultRotation = Object.freeze({
  maxSize: "20m",
  maxFiles: "14d",
  datePattern: "YYYY-MM-DD",
  zippedArchive: false,
});

const ensureDirectory = (dir: string) => {
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
};

const sanitizeSegment = (value: string) => {
  const cleaned = value
    .replace(/[<>:"/\\|?*\u0000-\u001F]/g, "-")
    .replace(/\s+/g, "-")
    .replace(/\.+/g, "-")
    .replace(/-+/g, "-")
    .replace(/^-+|-+$/g, "");
  return cleaned || "logs";
};

const buildLogFilePath = (baseDir: string, name: string) => {
  const segments = name
    .split(/[\\/]+/)
    .filter(Boolean)
    .map(sanitizeSegment);

  const relative = segments.length ? segments.join(path.sep) : sanitizeSegment(name);
  return path.join(baseDir, `${relative}-%DATE%.log`);
};

/**
 * Parses designators, drops blanks, and keeps the first of any equal zones, so
 * `+0530` and `UTC+05:30` collapse into one entry. Zones sharing a label but
 * not an offset are all kept.
 */
const normalizeZones = (zones?: ZoneInput | ZoneInput[]): FixedTimeZone[] => {
  if (zones === undefined) {
    return [];
  }

  const list = Array.isArray(zones) ? zones : [zones];
  const unique: FixedTimeZone[] = [];

  for (const entry of list) {
    let zone: FixedTimeZone;
    if (typeof entry === "string") {
      const trimmed = entry.trim();
      if (!trimmed) {
        continue;
      }
      zone = FixedTimeZone.parse(trimmed);
    } else {
      zone = entry;
    }
    if (!unique.some((existing) => existing.equals(zone))) {
      unique.push(zone);
    }
  }

  return unique;
};

interface FormatOptions {
  includeTimestamps?: boolean;
}

const formatMessage = (ctx: TimestampContext, options: FormatOptions = {}) =>
  winston.format.printf((info) => {
    const { includeTimestamps = true } = options;
    const level = info.level.toUpperCase();
    const message =
      typeof info.message === "string" ? info.message : JSON.stringify(info.message, null, 2);

    const { stack, level: _level, message: _msg, ...metadata } = info;
    const cleanedMeta = Object.keys(metadata).length > 0 ? metadata : undefined;

    const lines: string[] = [];

    if (includeTimestamps) {
      const now = Date.now();
      lines.push(
        `UTC: ${moment.utc(now).format(TIMESTAMP_FORMAT)}`,
        ...ctx.zones.map((zone) => `${zone.name}: ${formatInZone(now, zone, TIMESTAMP_FORMAT)}`),
      );
    }

    lines.push(`[${level}] (${ctx.label})`, message);

    if (stack) {
      lines.push(typeof stack === "string" ? stack : JSON.stringify(stack, null, 2));
    }

    if (cleanedMeta) {
      lines.push(JSON.stringify(cleanedMeta, null, 2));
    }

    return `${lines.join("\n")}\n`;
  });

const buildRotateTransport = (options: {
  filename: string;
  level: LogLevel;
  rotation?: RotationStrategy;
}) => {
  const rotation = { ...defaultRotation, ...options.rotation };

  return new DailyRotateFile({
    filename: options.filename,
    datePattern: rotation.datePattern,
    maxSize: rotation.maxSize,
    maxFiles: rotation.maxFiles,
    zippedArchive: rotation.zippedArchive,
    level: options.level,
  });
};

/**
 * Creates a Winston logger whose records carry a UTC timestamp followed by the
 * wall-clock time in each configured fixed-offset zone.
 *
 * @example
 * ```ts
 * const logger = createLogger({
 *   moduleName: 'billing/settlement',
 *   zones: ['UTC+05:30', '-0800'],
 *   logDirectory: './logs',
 * });
 *
 * logger.info('Settlement batch closed');
 * // UTC: 2024-03-01 12:00:00
 * // UTC+05:30: 2024-03-01 17:30:00
 * // UTC-08:00: 2024-03-01 04:00:00
 * // [INFO] (billing/settlement)
 * // Settlement batch closed
 * ```
 *
 * @throws {UnrecognizedTimeZoneError} when a zone designator cannot be parsed.
 */
export const createLogger = (options: LoggerOptions = {}): winston.Logger => {
  const {
    moduleName = "global",
    logDirectory = DEFAULT_LOG_DIR,
    level = "info",
    consoleLevel = level,
    includeConsole = true,
    includeFile = true,
    zones,
    rotation = defaultRotation,
    additionalTransports = [],
  } = options;

  const ctx: TimestampContext = {
    label: moduleName === "global" ? "GLOBAL" : moduleName,
    zones: normalizeZones(zones),
  };

  ensureDirectory(logDirectory);

  const transports: winston.transport[] = [];

  if (includeConsole) {
    transports.push(
      new winston.transports.Console({
        level: consoleLevel,
        handleExceptions: true,
        format: winston.format.combine(
          winston.format.errors({ stack: true }),
          winston.format.colorize({ message: true }),
          formatMessage(ctx, { includeTimestamps: false }),
        ),
      }),
    );
  }

  if (includeFile) {
    const filename = buildLogFilePath(logDirectory, moduleName);
    ensureDirectory(path.dirname(filename));
    transports.push(buildRotateTransport({ filename, level, rotation }));
  }

  transports.push(...additionalTransports);

  return winston.createLogger({
    level,
    format: winston.format.combine(winston.format.errors({ stack: true }), formatMessage(ctx)),
    transports,
    exitOnError: false,
  });
};

/** @internal */
export const __loggerInternals = {
  sanitizeSegment,
  buildLogFilePath,
  normalizeZones,
  formatMessage,
};
