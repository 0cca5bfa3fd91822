import pino, { type DestinationStream, type Logger as PinoLogger, type StreamEntry } from "pino";

/**
 * Log stream type. "console" writes to stdout (optionally through pino-pretty),
 * "file" writes daily-rotated files through pino-roll.
 */
export type LogStreamType = "console" | "file";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

interface LoggingTransportConfig {
	type: LogStreamType;
	level: LogLevel;
	/** Only applies to the console transport. */
	pretty: boolean;
}

export interface FileTransportConfig extends LoggingTransportConfig {
	type: "file";
	/** Rotated files are named `${fileDirectoryPath}/${filenamePrefix}.<date>.<n>.log`. */
	filenamePrefix: string;
	fileDirectoryPath: string;
	datePattern: string;
	maxFiles: number;
	/** Size before rotation, e.g. "500m". */
	maxSize: string;
}

export interface ConsoleTransportConfig extends LoggingTransportConfig {
	type: "console";
}

export type TransportConfig = FileTransportConfig | ConsoleTransportConfig;

export interface LoggingConfig {
	/** When false a silent logger is returned. */
	enabled: boolean;
	level: LogLevel;
	transports: Array<TransportConfig>;
	/**
	 * Per-module level overrides keyed by file name without extension,
	 * e.g. `{ AccessControlService: "debug" }`.
	 */
	moduleOverrides: Record<string, string | undefined>;
}

const LOG_LEVELS: ReadonlyArray<LogLevel> = ["trace", "debug", "info", "warn", "error", "fatal"];

const transports = new Map<LogStreamType, DestinationStream>();

function getServerTransport(transportConfig: TransportConfig): DestinationStream {
	const cached = transports.get(transportConfig.type);
	if (cached) {
		return cached;
	}

	let stream: DestinationStream;
	if (transportConfig.type === "file") {
		const { datePattern, filenamePrefix, fileDirectoryPath, maxFiles, maxSize, level } = transportConfig;
		stream = pino.transport({
			targets: [
				{
					target: "pino-roll",
					level,
					options: {
						file: `${fileDirectoryPath}/${filenamePrefix}`,
						frequency: "daily",
						size: maxSize,
						dateFormat: datePattern,
						extension: ".log",
						mkdir: true,
						limit: { count: maxFiles },
					},
				},
			],
		});
	} else if (transportConfig.pretty) {
		stream = pino.transport({
			target: "pino-pretty",
			level: transportConfig.level,
			options: {
				colorize: true,
				translateTime: "yyyy-mm-dd HH:MM:ss",
				ignore: "pid,hostname",
				messageFormat: "{module} - {msg}",
				singleLine: true,
			},
		});
	} else {
		stream = process.stdout;
	}
	transports.set(transportConfig.type, stream);
	return stream;
}

/**
 * Derives the module name from an `import.meta` or a plain string: the last path
 * segment with its final extension removed.
 */
export function getModuleName(module: string | ImportMeta): string {
	const moduleUrl = typeof module === "string" ? module : module.url;
	const lastSlashIndex = moduleUrl.lastIndexOf("/");
	const fileNameWithExtension = lastSlashIndex >= 0 ? moduleUrl.substring(lastSlashIndex + 1) : moduleUrl;
	const parts = fileNameWithExtension.split(".");
	return parts.length > 1 ? parts.slice(0, -1).join(".") : fileNameWithExtension;
}

export function isLogLevel(value: string): value is LogLevel {
	return LOG_LEVELS.some(level => level === value);
}

/**
 * Builds a logging configuration from already-parsed values.
 *
 * @param transportNames comma-separated list, e.g. "console,file"
 * @param moduleOverrides comma-separated "module:level" pairs, e.g. "OrganizationSyncService:debug"
 */
export function createLoggingConfig(
	enabled: boolean,
	filenamePrefix: string,
	level: LogLevel,
	pretty: boolean,
	transportNames: string,
	moduleOverrides: string,
	fileDirectoryPath: string,
	datePattern = "yyyy-MM-dd",
	maxFiles = 14,
	maxSize = "500m",
): LoggingConfig {
	const transportConfigs: Array<TransportConfig> = [];
	for (const name of transportNames.split(",").map(t => t.trim())) {
		if (name === "file") {
			transportConfigs.push({
				type: "file",
				filenamePrefix,
				fileDirectoryPath,
				datePattern,
				maxFiles,
				maxSize,
				level,
				pretty,
			});
		} else if (name === "console") {
			transportConfigs.push({ type: "console", level, pretty });
		}
	}

	const overrides: Record<string, string> = {};
	for (const pair of moduleOverrides.split(",")) {
		const [module, lvl] = pair.split(":");
		if (module?.trim() && lvl?.trim()) {
			overrides[module.trim()] = lvl.trim();
		}
	}

	return { enabled, level, transports: transportConfigs, moduleOverrides: overrides };
}

/**
 * Reads the logging configuration from the environment:
 * - DISABLE_LOGGING: "true" returns a silent logger
 * - LOG_LEVEL: default level, "info" when unset or invalid
 * - LOG_PRETTY: pretty console output (default on in development)
 * - LOG_TRANSPORTS: "console", "file" or both (default console)
 * - LOG_LEVEL_OVERRIDES: "module:level" pairs
 * - LOG_FILE_NAME_PREFIX, LOG_FILE_DIRECTORY_PATH, LOG_FILE_DATE_PATTERN, LOG_FILE_MAX_FILES
 */
export function getLoggingConfig(): LoggingConfig {
	const env = process.env;
	const isDevelopment = env.NODE_ENV === "development";
	const rawLevel = env.LOG_LEVEL ?? "info";
	return createLoggingConfig(
		env.DISABLE_LOGGING !== "true",
		env.LOG_FILE_NAME_PREFIX ?? "orgscope",
		isLogLevel(rawLevel) ? rawLevel : "info",
		(env.LOG_PRETTY ?? (isDevelopment ? "true" : "false")) === "true",
		env.LOG_TRANSPORTS ?? "console",
		env.LOG_LEVEL_OVERRIDES ?? "",
		env.LOG_FILE_DIRECTORY_PATH ?? "./logs",
		env.LOG_FILE_DATE_PATTERN ?? "yyyy-MM-dd",
		Number(env.LOG_FILE_MAX_FILES ?? "14"),
	);
}

function createDefaultLogger(config: LoggingConfig): PinoLogger {
	const streams: Array<StreamEntry> = config.transports.map(transportConfig => ({
		level: transportConfig.level,
		stream: getServerTransport(transportConfig),
	}));
	if (streams.length > 1) {
		return pino({ level: config.level }, pino.multistream(streams));
	}
	if (streams.length === 1) {
		return pino({ level: config.level }, streams[0].stream);
	}
	return pino({ level: config.level });
}

// Lower number is more verbose
function getMinimumLevel(level1: LogLevel, level2: LogLevel): LogLevel {
	const values = pino.levels.values;
	return values[level1] < values[level2] ? level1 : level2;
}

function createModuleLogger(
	moduleName: string,
	config: LoggingConfig,
	defaultLoggerProvider: (config: LoggingConfig) => PinoLogger,
): PinoLogger {
	const override = config.moduleOverrides[moduleName];
	const moduleLevel = override && isLogLevel(override) ? override : config.level;

	// The parent has to be at least as verbose as the module, or the child never sees the records
	const parentLevel = getMinimumLevel(moduleLevel, config.level);
	const logger = defaultLoggerProvider({
		...config,
		level: parentLevel,
		transports: config.transports.map(t => ({ ...t, level: parentLevel })),
	});
	return logger.child({ module: moduleName }, { level: moduleLevel });
}

export type Logger = PinoLogger;

let silentLogger: Logger | undefined;

/**
 * Creates a logger for a module. Call `createLog(import.meta)` once near the top
 * of a file.
 *
 * @param module the module meta or module name
 * @param loggingConfigProvider replaces the environment-based configuration
 * @param defaultLoggerProvider replaces the pino root logger factory
 */
export function createLog(
	module: string | ImportMeta,
	loggingConfigProvider: () => LoggingConfig = getLoggingConfig,
	defaultLoggerProvider: (config: LoggingConfig) => PinoLogger = createDefaultLogger,
): Logger {
	const config = loggingConfigProvider();
	if (!config.enabled) {
		if (!silentLogger) {
			silentLogger = pino({ enabled: false });
		}
		return silentLogger;
	}
	return createModuleLogger(getModuleName(module), config, defaultLoggerProvider);
}
