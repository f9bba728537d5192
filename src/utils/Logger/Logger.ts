import type { ILogger, LogLevel } from "../../interfaces/utils/ILogger.js";
import ConsoleLogger, { isLogLevel } from "../ConsoleLogger.js";

const envLevel = process.env.LOG_LEVEL?.toUpperCase() ?? "DEBUG";
const globalLogger: ILogger = new ConsoleLogger(isLogLevel(envLevel) ? envLevel : "DEBUG");

/**
 * Clase Logger con métodos estáticos para logging global
 * Proporciona una interfaz simple sin necesidad de inyectar dependencias
 */
export class Logger {
	static debug(message: string, ...args: unknown[]): void {
		globalLogger.logDebug(message, ...args);
	}

	static info(message: string, ...args: unknown[]): void {
		globalLogger.logInfo(message, ...args);
	}

	static ok(message: string, ...args: unknown[]): void {
		globalLogger.logOk(message, ...args);
	}

	static warn(message: string, ...args: unknown[]): void {
		globalLogger.logWarn(message, ...args);
	}

	static error(message: string, ...args: unknown[]): void {
		globalLogger.logError(message, ...args);
	}

	static setLevel(level: LogLevel): void {
		globalLogger.setLevel(level);
	}

	static getLogger(title: string): ILogger {
		return globalLogger.getLogger(title);
	}
}
