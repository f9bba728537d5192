import CustomError from "../CustomError.js";

type AccessErrorData = {
	subjectId?: string;
	callerOrgId?: string;
	resourceOrgId?: string;
	permission?: string;
};

export type AccessErrorTypes = "CROSS_TENANT" | "PERMISSION_DENIED";

/**
 * Denegaciones del guard de tenant y del resolver de permisos.
 * Hacia afuera se traducen siempre a un 403 uniforme.
 */
export class AccessError extends CustomError<AccessErrorData, AccessErrorTypes> {
	public readonly name = "AccessError";
}
