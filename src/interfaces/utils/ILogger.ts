export type LogLevel = "DEBUG" | "INFO" | "OK" | "WARN" | "ERROR" | "NONE";

/**
 * Interfaz para el sistema de logging
 */
export interface ILogger {
	logDebug(message: string, ...args: unknown[]): void;
	logInfo(message: string, ...args: unknown[]): void;
	logOk(message: string, ...args: unknown[]): void;
	logWarn(message: string, ...args: unknown[]): void;
	logError(message: string, ...args: unknown[]): void;
	setLevel(level: LogLevel): void;
	/** Crea un logger hijo que antepone `[title]` a cada mensaje */
	getLogger(title: string): ILogger;
}
