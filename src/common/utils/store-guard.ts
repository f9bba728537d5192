import CustomError from "../types/CustomError.js";
import { AuthError } from "../types/custom-errors/AuthError.js";
import type { ILogger } from "../../interfaces/utils/ILogger.js";

/**
 * Ejecuta una operación contra el almacenamiento.
 * Los errores propios pasan intactos; cualquier otro fallo se registra y se
 * convierte en SERVICE_UNAVAILABLE para abortar el request completo.
 */
export async function withStore<T>(logger: ILogger, operation: string, fn: () => Promise<T>): Promise<T> {
	try {
		return await fn();
	} catch (error) {
		if (error instanceof CustomError) throw error;
		const reason = error instanceof Error ? error.message : String(error);
		logger.logError(`Error de almacenamiento en ${operation}: ${reason}`);
		throw new AuthError(503, "SERVICE_UNAVAILABLE", "Almacenamiento no disponible");
	}
}
