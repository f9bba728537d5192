import CustomError, { type CustomErrorJSON } from "../CustomError.js";

type AuthErrorData = { tokenId?: string; subjectId?: string };

type ExpectedAuthErrorTypes =
	// CREDENTIALS
	| "INVALID_CREDENTIALS"
	| "WEAK_PASSWORD"
	// TOKENS
	| "TOKEN_MALFORMED"
	| "TOKEN_EXPIRED"
	| "TOKEN_REVOKED"
	| "WRONG_TOKEN_KIND"
	// SUBJECT
	| "SUBJECT_UNAVAILABLE";

type UnexpectedAuthErrorTypes = "SERVICE_UNAVAILABLE";

export type AuthErrorTypes = UnexpectedAuthErrorTypes | ExpectedAuthErrorTypes;

export class AuthError extends CustomError<AuthErrorData, AuthErrorTypes> {
	public readonly name = "AuthError";
}

export type AuthErrorJSON = CustomErrorJSON<AuthErrorData, AuthErrorTypes>;
