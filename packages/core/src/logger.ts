// Structured logger shared by the runner packages
export interface LogEntry {
	timestamp: string;
	level: LogLevel;
	message: string;
	service?: string;
	component?: string | undefined;
	suite?: string;
	command?: string;
	error?: {
		name: string;
		message: string;
		stack?: string;
		code?: string;
	};
	metadata?: Record<string, unknown>;
	duration?: number;
	correlationId?: string;
}

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export type LoggerOptions = {
	level?: LogLevel;
	service?: string;
	component?: string;
	colorize?: boolean;
};

const RED = "\u001b[0;31m";
const RESET = "\u001b[0m";

export const isLogLevel = (value: string): value is LogLevel =>
	LOG_LEVELS.some((level) => level === value);

export class Logger {
	private level: LogLevel = "info";
	private service: string;
	private component?: string;
	private colorize: boolean;

	constructor(options: LoggerOptions = {}) {
		this.level = options.level ?? "info";
		this.service = options.service ?? "e2e-runner";
		if (options.component !== undefined) {
			this.component = options.component;
		}
		this.colorize = options.colorize ?? false;
	}

	private shouldLog(level: LogLevel): boolean {
		return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.level);
	}

	private createLogEntry(
		level: LogLevel,
		message: string,
		metadata?: Record<string, unknown>,
	): LogEntry {
		const entry: LogEntry = {
			timestamp: new Date().toISOString(),
			level,
			message,
			service: this.service,
		};

		if (this.component !== undefined) {
			entry.component = this.component;
		}

		if (metadata) {
			const { suite, command, duration, correlationId, error, ...rest } = metadata;
			if (typeof suite === "string") entry.suite = suite;
			if (typeof command === "string") entry.command = command;
			if (typeof duration === "number") entry.duration = duration;
			if (typeof correlationId === "string") entry.correlationId = correlationId;
			if (isErrorData(error)) entry.error = error;
			if (Object.keys(rest).length > 0) entry.metadata = rest;
		}

		return entry;
	}

	formatLogEntry(entry: LogEntry): string {
		const baseFields = [
			entry.timestamp,
			entry.level.toUpperCase(),
			entry.service,
			entry.component || "main",
		]
			.filter(Boolean)
			.join(" | ");

		let message = `[${baseFields}] ${entry.message}`;

		const contextFields: string[] = [];
		if (entry.suite) contextFields.push(`suite=${entry.suite}`);
		if (entry.command) contextFields.push(`cmd=${entry.command}`);
		if (entry.correlationId) contextFields.push(`corr=${entry.correlationId}`);
		if (entry.duration !== undefined) contextFields.push(`duration=${entry.duration}ms`);

		if (contextFields.length > 0) {
			message += ` [${contextFields.join(", ")}]`;
		}

		if (entry.error || entry.metadata) {
			const structured = {
				...(entry.error && { error: entry.error }),
				...(entry.metadata && { meta: entry.metadata }),
			};
			message += ` ${JSON.stringify(structured)}`;
		}

		return message;
	}

	private log(level: LogLevel, message: string, metadata?: Record<string, unknown>): void {
		if (!this.shouldLog(level)) return;

		const entry = this.createLogEntry(level, message, metadata);
		const formattedMessage = this.formatLogEntry(entry);

		switch (level) {
			case "debug":
				console.debug(formattedMessage);
				break;
			case "info":
				console.info(formattedMessage);
				break;
			case "warn":
				console.warn(formattedMessage);
				break;
			case "error":
				console.error(this.colorize ? `${RED}${formattedMessage}${RESET}` : formattedMessage);
				break;
		}
	}

	debug(message: string, metadata?: Record<string, unknown>): void {
		this.log("debug", message, metadata);
	}

	info(message: string, metadata?: Record<string, unknown>): void {
		this.log("info", message, metadata);
	}

	warn(message: string, metadata?: Record<string, unknown>): void {
		this.log("warn", message, metadata);
	}

	error(message: string, error?: unknown, metadata?: Record<string, unknown>): void {
		let errorData: LogEntry["error"];

		if (error instanceof Error) {
			const code = readErrorCode(error);
			errorData = {
				name: error.name,
				message: error.message,
				...(this.level === "debug" && error.stack !== undefined && { stack: error.stack }),
				...(code !== undefined && { code }),
			};
		} else if (error !== undefined && error !== null) {
			errorData = { name: "Error", message: String(error) };
		}

		this.log("error", message, {
			...metadata,
			...(errorData && { error: errorData }),
		});
	}

	// Performance logging
	startTimer(operation: string, metadata?: Record<string, unknown>): () => void {
		const startTime = Date.now();
		const correlationId = this.generateCorrelationId();

		this.debug(`Starting operation: ${operation}`, {
			...metadata,
			correlationId,
		});

		return () => {
			const duration = Date.now() - startTime;
			this.debug(`Completed operation: ${operation}`, {
				...metadata,
				correlationId,
				duration,
			});
		};
	}

	child(context: { component?: string; service?: string }): Logger {
		const options: LoggerOptions = {
			level: this.level,
			service: context.service || this.service,
			colorize: this.colorize,
		};
		const component = context.component || this.component;
		if (component !== undefined) {
			options.component = component;
		}
		return new Logger(options);
	}

	private generateCorrelationId(): string {
		return Math.random().toString(36).substring(2, 10);
	}

	static create(service: string, component?: string): Logger {
		return new Logger({
			service,
			...(component !== undefined && { component }),
			colorize: process.stderr.isTTY === true,
		});
	}
}

const isErrorData = (value: unknown): value is NonNullable<LogEntry["error"]> =>
	value !== null
	&& typeof value === "object"
	&& "name" in value
	&& typeof value.name === "string"
	&& "message" in value
	&& typeof value.message === "string";

const readErrorCode = (error: Error): string | undefined => {
	if (!("code" in error)) return undefined;
	const { code } = error;
	return typeof code === "string" || typeof code === "number" ? String(code) : undefined;
};
