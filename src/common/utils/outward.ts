import CustomError from "../types/CustomError.js";
import { AuthError } from "../types/custom-errors/AuthError.js";
import { AccessError } from "../types/custom-errors/AccessError.js";
import { IdentityError } from "../types/custom-errors/IdentityError.js";

/**
 * Señal que ve el llamador externo (capa de routing).
 * No revela cuál de los chequeos internos falló.
 */
export interface OutwardError {
	status: number;
	errorKey: string;
	message: string;
}

const UNAUTHORIZED: OutwardError = { status: 401, errorKey: "UNAUTHORIZED", message: "No autorizado" };
const FORBIDDEN: OutwardError = { status: 403, errorKey: "FORBIDDEN", message: "Acceso denegado" };
const UNAVAILABLE: OutwardError = { status: 503, errorKey: "SERVICE_UNAVAILABLE", message: "Servicio no disponible" };

/**
 * Traduce cualquier error del núcleo a la señal uniforme hacia afuera.
 *
 * - AuthError → 401 (salvo SERVICE_UNAVAILABLE → 503 y WEAK_PASSWORD, que es validación)
 * - AccessError → 403
 * - IdentityError → se propaga tal cual (API de gestión, no es un oráculo de tokens)
 * - Cualquier otro error → 503 (solo llegan aquí errores de drivers)
 */
export function toOutwardError(error: unknown): OutwardError {
	if (error instanceof AuthError) {
		if (error.errorKey === "SERVICE_UNAVAILABLE") return { ...UNAVAILABLE };
		if (error.errorKey === "WEAK_PASSWORD") {
			return { status: error.status, errorKey: error.errorKey, message: error.message };
		}
		return { ...UNAUTHORIZED };
	}
	if (error instanceof AccessError) return { ...FORBIDDEN };
	if (error instanceof IdentityError) {
		return { status: error.status, errorKey: error.errorKey, message: error.message };
	}
	if (error instanceof CustomError) {
		return { status: error.status, errorKey: String(error.errorKey), message: error.message };
	}
	return { ...UNAVAILABLE };
}
