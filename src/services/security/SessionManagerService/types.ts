import type { PermissionCode } from "../../core/IdentityManagerService/permissions.js";
import type { SessionContext } from "./domain/session/context.js";

export type TokenKind = "access" | "refresh";

/**
 * Token recién firmado
 */
export interface IssuedToken {
	token: string;
	tokenId: string;
	kind: TokenKind;
	/** Segundos epoch */
	issuedAt: number;
	/** Segundos epoch */
	expiresAt: number;
}

/**
 * Par de tokens retornado en login
 */
export interface TokenPair {
	accessToken: string;
	refreshToken: string;
	accessTokenExpiresAt: number;
	refreshTokenExpiresAt: number;
	tokenType: "Bearer";
}

/**
 * Resultado de refresh: solo un access token nuevo, el refresh token no se extiende
 */
export interface RefreshResult {
	accessToken: string;
	accessTokenExpiresAt: number;
}

export type AuthorizationDecision = { allowed: true } | { allowed: false; reason: "CROSS_TENANT" | "PERMISSION_DENIED" };

/**
 * Interfaz de entrada usada por la capa de routing
 */
export interface ISessionManager {
	authenticate(email: string, password: string): Promise<TokenPair>;
	refresh(refreshToken: string): Promise<RefreshResult>;
	contextFromToken(rawToken: string): Promise<SessionContext>;
	authorize(context: SessionContext, permission: PermissionCode, resourceOrganizationId: string): Promise<AuthorizationDecision>;
	requireAuthorization(context: SessionContext, permission: PermissionCode, resourceOrganizationId: string): Promise<void>;
	logout(accessToken: string, refreshToken?: string): Promise<void>;
	revokeAllForSubject(subjectId: string): Promise<void>;
	changePassword(context: SessionContext, currentPassword: string, newPassword: string): Promise<void>;
}
