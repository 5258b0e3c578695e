export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_RANK: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
	silent: 100,
};

const PREFIX = '[cycle-sqi]';

let currentLevel: LogLevel = 'warn';

export function setLogLevel(level: LogLevel): void {
	currentLevel = level;
}

export function getLogLevel(): LogLevel {
	return currentLevel;
}

function enabled(level: LogLevel): boolean {
	return LEVEL_RANK[level] >= LEVEL_RANK[currentLevel];
}

export function debug(...args: unknown[]): void {
	if (enabled('debug')) console.debug(PREFIX, '[DEBUG]', ...args);
}

export function info(...args: unknown[]): void {
	if (enabled('info')) console.info(PREFIX, '[INFO]', ...args);
}

export function warn(...args: unknown[]): void {
	if (enabled('warn')) console.warn(PREFIX, '[WARN]', ...args);
}

export function error(...args: unknown[]): void {
	if (enabled('error')) console.error(PREFIX, '[ERROR]', ...args);
}

export default { debug, info, warn, error, setLogLevel, getLogLevel };
