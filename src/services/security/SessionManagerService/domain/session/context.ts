import type { TokenKind } from "../../types.js";
import type { VerifiedClaims } from "../tokens/TokenService.js";

/**
 * Contexto inmutable de identidad construido por request a partir de un
 * token validado.
 *
 * Solo se obtiene desde claims verificados: un objeto con la misma forma no
 * es un SessionContext, ni para el compilador ni en runtime (`isIssued`).
 */
export class SessionContext {
	// Marca nominal
	readonly #issued = true;

	private constructor(
		readonly subjectId: string,
		readonly organizationId: string,
		/** Roles al momento de emitir el token; la autorización siempre consulta el store */
		readonly roleIds: readonly string[],
		readonly tokenKind: TokenKind,
		readonly tokenId: string,
		/** Segundos epoch */
		readonly expiresAt: number
	) {
		Object.freeze(this);
	}

	static fromClaims(claims: VerifiedClaims): SessionContext {
		return new SessionContext(
			claims.subjectId,
			claims.organizationId,
			Object.freeze([...claims.roleIds]),
			claims.kind,
			claims.tokenId,
			claims.expiresAt
		);
	}

	static isIssued(value: unknown): value is SessionContext {
		return typeof value === "object" && value !== null && #issued in value;
	}
}
