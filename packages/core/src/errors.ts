/**
 * Errors raised by the runner. Every error carries a stable `code` so the CLI
 * and the tests can tell failures apart without matching on messages.
 */
export class RunnerError extends Error {
	public readonly code: string;
	public readonly details?: Record<string, unknown> | undefined;

	constructor(message: string, code: string, details?: Record<string, unknown>) {
		super(message);
		this.name = "RunnerError";
		this.code = code;
		this.details = details;
	}
}

export class UsageError extends RunnerError {
	constructor(message: string, flag?: string) {
		super(message, "USAGE_ERROR", { flag });
		this.name = "UsageError";
	}
}

export class ConfigError extends RunnerError {
	constructor(message: string, variable?: string) {
		super(message, "CONFIG_ERROR", { variable });
		this.name = "ConfigError";
	}
}

export class MissingCommandError extends RunnerError {
	constructor(command: string) {
		super(`Missing required command: ${command}`, "MISSING_COMMAND", { command });
		this.name = "MissingCommandError";
	}
}

export class ToolchainError extends RunnerError {
	constructor(message: string, tool?: string) {
		super(message, "TOOLCHAIN_ERROR", { tool });
		this.name = "ToolchainError";
	}
}

export class CommandFailedError extends RunnerError {
	public readonly command: string;
	public readonly exitCode: number;

	constructor(command: string, exitCode: number) {
		super(`Command failed with exit code ${exitCode}: ${command}`, "COMMAND_FAILED", {
			command,
			exitCode,
		});
		this.name = "CommandFailedError";
		this.command = command;
		this.exitCode = exitCode;
	}
}

export class InterruptedError extends RunnerError {
	constructor() {
		super("Run interrupted", "INTERRUPTED");
		this.name = "InterruptedError";
	}
}

export const isRunnerError = (error: unknown): error is RunnerError => error instanceof RunnerError;
