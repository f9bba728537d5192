import CustomError, { type CustomErrorJSON } from "../CustomError.js";

export type IdentityErrorTypes =
	// Access / org isolation
	| "CROSS_ORG_ROLE"
	| "INVALID_CROSS_TENANT_ROLE"
	| "CANNOT_DELETE_PREDEFINED"
	| "ROLE_CYCLE"
	| "PERMISSION_IN_USE"
	// Not found
	| "USER_NOT_FOUND"
	| "ROLE_NOT_FOUND"
	| "ORG_NOT_FOUND"
	| "PERMISSION_NOT_FOUND"
	// Conflicts
	| "EMAIL_EXISTS"
	| "ROLE_NAME_EXISTS"
	| "PERMISSION_EXISTS"
	// Validation
	| "MISSING_FIELDS"
	| "INVALID_PERMISSION_CODE";

export class IdentityError extends CustomError<Record<string, unknown>, IdentityErrorTypes> {
	public readonly name = "IdentityError";
}

/**
 * @public
 */
export type IdentityErrorJSON = CustomErrorJSON<Record<string, unknown>, IdentityErrorTypes>;
