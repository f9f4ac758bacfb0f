import {appendFileSync, mkdirSync} from 'node:fs';
import {join} from 'node:path';
import {getLogDir} from './config.js';

type LogLevel = 'INFO' | 'WARN' | 'ERROR' | 'DEBUG';

/**
 * File-based logger
 *
 * stdout carries the MCP stdio protocol, so nothing is ever printed there.
 *
 * Log location: ~/.mcp/display-interface/server.log
 */
export class Logger {
	private readonly logPath: string;
	private readonly enabled: boolean;

	constructor(logDir: string = getLogDir()) {
		this.logPath = join(logDir, 'server.log');

		try {
			mkdirSync(logDir, {recursive: true});
			this.enabled = true;
		} catch {
			// Without a log directory, logging is disabled
			this.enabled = false;
		}
	}

	formatMessage(level: LogLevel, message: string, ...args: unknown[]): string {
		const timestamp = new Date().toISOString();
		const formattedArgs = args.map((arg) => {
			if (arg instanceof Error) {
				return `${arg.name}: ${arg.message}\n${arg.stack ?? ''}`;
			}

			if (typeof arg === 'object') {
				try {
					return JSON.stringify(arg);
				} catch {
					return String(arg);
				}
			}

			return String(arg);
		}).join(' ');

		const fullMessage = formattedArgs ? `${message} ${formattedArgs}` : message;
		return `[${timestamp}] [${level}] ${fullMessage}\n`;
	}

	private write(level: LogLevel, message: string, ...args: unknown[]): void {
		if (!this.enabled) {
			return;
		}

		try {
			appendFileSync(this.logPath, this.formatMessage(level, message, ...args), 'utf8');
		} catch {
			// Nowhere left to report a failed log write
		}
	}

	info(message: string, ...args: unknown[]): void {
		this.write('INFO', message, ...args);
	}

	error(message: string, ...args: unknown[]): void {
		this.write('ERROR', message, ...args);
	}

	warn(message: string, ...args: unknown[]): void {
		this.write('WARN', message, ...args);
	}

	debug(message: string, ...args: unknown[]): void {
		this.write('DEBUG', message, ...args);
	}

	getLogPath(): string {
		return this.logPath;
	}
}

export const logger = new Logger();
