import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { PassThrough } from "node:stream";
import winston from "winston";
import DailyRotateFile from "winston-daily-rotate-file";
import { createLogger, __loggerInternals } from "../src/logger";
import { FixedTimeZone, UTC_ZERO } from "../src/fixed-time-zone";
import { UnrecognizedTimeZoneError } from "../src/errors";

const NOW = Date.UTC(2024, 2, 1, 12, 0, 0);

const createTempDir = () => fs.mkdtempSync(path.join(os.tmpdir(), "fixed-zone-logger-"));

const nextChunk = (stream: PassThrough) =>
  new Promise<string>((resolve) => {
    stream.once("data", (chunk: Buffer) => resolve(chunk.toString()));
  });

const createStreamLogger = (options: Parameters<typeof createLogger>[0] = {}) => {
  const stream = new PassThrough();
  const logger = createLogger({
    logDirectory: createTempDir(),
    includeConsole: false,
    includeFile: false,
    ...options,
    additionalTransports: [new winston.transports.Stream({ stream })],
  });
  return { logger, stream };
};

const shutdownLogger = (logger: winston.Logger) => {
  logger.close();
  logger.transports.forEach((transport: winston.transport) => {
    if (typeof (transport as { close?: () => void }).close === "function") {
      (transport as { close: () => void }).close();
    }
  });
};

describe("createLogger", () => {
  beforeEach(() => {
    jest.spyOn(Date, "now").mockReturnValue(NOW);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("creates the log directory when missing", () => {
    const target = path.join(createTempDir(), "logs-output");

    const logger = createLogger({
      logDirectory: target,
      includeConsole: false,
      includeFile: false,
    });

    expect(fs.existsSync(target)).toBe(true);
    shutdownLogger(logger);
  });

  it("nests the log file for scoped module names", () => {
    const root = createTempDir();
    const logger = createLogger({
      logDirectory: root,
      moduleName: "billing/settlement",
      includeConsole: false,
    });

    const fileTransport = logger.transports.find(
      (transport): transport is DailyRotateFile => transport instanceof DailyRotateFile,
    );

    expect(fs.existsSync(path.join(root, "billing"))).toBe(true);
    expect(fileTransport?.options.filename).toBe(
      path.join(root, "billing", "settlement-%DATE%.log"),
    );
    shutdownLogger(logger);
  });

  it("merges rotation overrides over the defaults", () => {
    const logger = createLogger({
      logDirectory: createTempDir(),
      includeConsole: false,
      rotation: { maxFiles: "2d" },
    });

    const rotating = logger.transports.filter(
      (transport): transport is DailyRotateFile => transport instanceof DailyRotateFile,
    );

    expect(rotating).toHaveLength(1);
    expect(rotating[0].options.maxFiles).toBe("2d");
    expect(rotating[0].options.maxSize).toBe("20m");
    shutdownLogger(logger);
  });

  it("renders the wall clock of each configured zone after UTC", async () => {
    const { logger, stream } = createStreamLogger({
      moduleName: "billing",
      zones: ["+0530", "UTC+05:30", " -0800 ", ""],
    });

    const output = nextChunk(stream);
    logger.info("Settlement closed");

    expect(await output).toContain(
      [
        "UTC: 2024-03-01 12:00:00",
        "UTC+05:30: 2024-03-01 17:30:00",
        "UTC-08:00: 2024-03-01 04:00:00",
        "[INFO] (billing)",
        "Settlement closed",
        "",
      ].join("\n"),
    );
    shutdownLogger(logger);
  });

  it("accepts constructed zones under their own names", async () => {
    const { logger, stream } = createStreamLogger({
      zones: new FixedTimeZone("IST", 19800),
    });

    const output = nextChunk(stream);
    logger.warn("Cut-off approaching");

    expect(await output).toContain(
      "UTC: 2024-03-01 12:00:00\nIST: 2024-03-01 17:30:00\n[WARN] (GLOBAL)\nCut-off approaching\n",
    );
    shutdownLogger(logger);
  });

  it("throws for unrecognized zone designators", () => {
    expect(() =>
      createLogger({
        zones: ["UTC+05:30", "Europe/London"],
        includeConsole: false,
        includeFile: false,
      }),
    ).toThrow(UnrecognizedTimeZoneError);
  });

  it("attaches console transport when enabled", () => {
    const logger = createLogger({
      logDirectory: createTempDir(),
      includeConsole: true,
      includeFile: false,
    });

    const hasConsole = logger.transports.some(
      (transport) => transport instanceof winston.transports.Console,
    );
    expect(hasConsole).toBe(true);
    shutdownLogger(logger);
  });

  it("logs stack traces and metadata", async () => {
    const { logger, stream } = createStreamLogger();
    const error = new Error("Boom");

    const output = nextChunk(stream);
    logger.log({
      level: "error",
      message: "Boom",
      stack: error.stack,
      correlationId: "xyz",
    });

    const text = await output;
    expect(text).toContain("[ERROR] (GLOBAL)\nBoom\nError: Boom\n");
    expect(text).toContain('"correlationId": "xyz"');
    shutdownLogger(logger);
  });

  it("serializes object messages", async () => {
    const { logger, stream } = createStreamLogger();

    const output = nextChunk(stream);
    logger.info({ message: { foo: "bar" } });

    expect(await output).toContain('"foo": "bar"');
    shutdownLogger(logger);
  });

  it("falls back to a safe file name when module name is blank", () => {
    const logger = createLogger({
      logDirectory: createTempDir(),
      moduleName: "   ",
      includeConsole: false,
    });

    const fileTransport = logger.transports.find(
      (transport): transport is DailyRotateFile => transport instanceof DailyRotateFile,
    );

    expect(path.basename(fileTransport?.options.filename ?? "")).toBe("logs-%DATE%.log");
    shutdownLogger(logger);
  });
});

describe("logger internals", () => {
  const { normalizeZones, sanitizeSegment, buildLogFilePath } = __loggerInternals;

  it("returns no zones when none are configured", () => {
    expect(normalizeZones()).toEqual([]);
    expect(normalizeZones("   ")).toEqual([]);
  });

  it("deduplicates zones by canonical name", () => {
    const zones = normalizeZones(["Z", "UTC", "+00:00", "+0530", "UTC+05:30"]);

    expect(zones.map((zone) => zone.name)).toEqual(["Z", "UTC", "UTC+05:30"]);
    expect(zones[0]).toBe(UTC_ZERO);
  });

  it("keeps zones that share a label but not an offset", () => {
    const zones = normalizeZones([
      new FixedTimeZone("Ops", 3600),
      new FixedTimeZone("Ops", -3600),
      new FixedTimeZone("Ops", 3600),
    ]);

    expect(zones.map((zone) => zone.offset.total)).toEqual([3600, -3600]);
  });

  it("sanitizes path segments", () => {
    expect(sanitizeSegment("..a b..")).toBe("a-b");
    expect(sanitizeSegment("a<b>c")).toBe("a-b-c");
    expect(sanitizeSegment("***")).toBe("logs");
  });

  it("builds nested log file paths", () => {
    expect(buildLogFilePath("/var/log/app", "billing/settlement")).toBe(
      path.join("/var/log/app", "billing", "settlement-%DATE%.log"),
    );
  });
});
