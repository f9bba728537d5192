import { BaseService } from "../../BaseService.js";
import type { AuthConfig, SigningKey } from "../../../config/auth.js";
import type { IJWTProvider } from "../../../providers/security/jwt/index.js";
import type { IRedisProvider } from "../../../providers/queue/redis/index.js";
import type { IIdentityManager } from "../../core/IdentityManagerService/types.js";
import type { PublicUser } from "../../core/IdentityManagerService/domain/user.js";
import { type PermissionCode, grants } from "../../core/IdentityManagerService/permissions.js";
import { scoped } from "../../core/IdentityManagerService/tenant-guard.js";
import { type Clock, systemClock } from "../../../utils/time.js";
import { AuthError } from "../../../common/types/custom-errors/AuthError.js";
import { AccessError } from "../../../common/types/custom-errors/AccessError.js";
import type { AuthorizationDecision, ISessionManager, RefreshResult, TokenPair } from "./types.js";

// Domain components
import { KeyStore } from "./domain/keys/KeyStore.js";
import { TokenService, type VerifiedClaims } from "./domain/tokens/TokenService.js";
import { RevocationRepository } from "./domain/tokens/RevocationRepository.js";
import { SessionContext } from "./domain/session/context.js";

export interface SessionManagerDependencies {
	config: AuthConfig;
	identity: IIdentityManager;
	jwt: IJWTProvider;
	/** Redis es opcional: sin él las revocaciones viven en memoria del proceso */
	redis?: IRedisProvider;
	clock?: Clock;
}

interface SessionCore {
	keyStore: KeyStore;
	revocations: RevocationRepository;
	tokens: TokenService;
}

const ALLOWED: AuthorizationDecision = Object.freeze({ allowed: true });

/**
 * SessionManagerService - Orquestador de autenticación y sesiones
 *
 * Características de seguridad:
 * - Access Token (JWS HS256) de vida corta con ids de rol, nunca permisos
 * - Refresh Token (JWS) de vida larga, canjeable solo por access tokens
 * - Rotación de claves por `kid`: la más nueva firma, todas las vigentes verifican
 * - Revocación por token y por sujeto, en Redis si está disponible
 * - Autorización en dos barreras independientes: tenant primero, permiso después
 */
export default class SessionManagerService extends BaseService<ISessionManager> implements ISessionManager {
	public readonly name = "SessionManagerService";

	readonly #clock: Clock;
	#core: SessionCore | null = null;

	constructor(private readonly deps: SessionManagerDependencies) {
		super();
		this.#clock = deps.clock ?? systemClock;
	}

	async getInstance(): Promise<ISessionManager> {
		return this;
	}

	async start(): Promise<void> {
		await super.start();
		const { config } = this.deps;

		if (!this.deps.redis) {
			this.logger.logWarn("Redis no disponible, usando almacenamiento en memoria para revocaciones");
		}

		const keyStore = new KeyStore({ keys: config.signingKeys });
		keyStore.onRotation((kids) => {
			this.logger.logInfo(`Claves rotadas. Vigentes: ${kids.join(", ")}`);
		});

		const revocations = new RevocationRepository({
			clock: this.#clock,
			graceSeconds: config.clockSkewSeconds,
			subjectCutoffTtlSeconds: Math.max(config.accessTokenTtl, config.refreshTokenTtl) + config.clockSkewSeconds,
			redis: this.deps.redis,
		});

		const tokens = new TokenService(
			keyStore,
			this.deps.jwt,
			revocations,
			{
				accessTokenTtl: config.accessTokenTtl,
				refreshTokenTtl: config.refreshTokenTtl,
				clockSkewSeconds: config.clockSkewSeconds,
			},
			this.#clock,
			this.logger.getLogger("TokenService")
		);

		this.#core = { keyStore, revocations, tokens };
		this.logger.logOk(`SessionManagerService iniciado${this.deps.redis ? " con Redis" : ""} (kid activo: ${keyStore.getSigningKey().kid})`);
	}

	async stop(): Promise<void> {
		this.#core?.revocations.stop();
		this.#core = null;
		await super.stop();
	}

	#require(): SessionCore {
		if (!this.#core) {
			throw new Error("SessionManagerService no está iniciado");
		}
		return this.#core;
	}

	/**
	 * Acceso al emisor/validador de tokens (para capas que necesitan `issue`/`validate` directo)
	 */
	get tokens(): TokenService {
		return this.#require().tokens;
	}

	// ─────────────────────────────────────────────────────────────────────────────
	// Autenticación
	// ─────────────────────────────────────────────────────────────────────────────

	/**
	 * Login con email y password. Cualquier fallo responde lo mismo.
	 * @throws AuthError INVALID_CREDENTIALS
	 */
	async authenticate(email: string, password: string): Promise<TokenPair> {
		const { tokens } = this.#require();

		const user = await this.deps.identity.verifyCredentials(email, password);
		if (!user) {
			this.logger.logDebug("Login fallido");
			throw new AuthError(401, "INVALID_CREDENTIALS", "Credenciales inválidas");
		}

		await this.deps.identity.recordLogin(user.id);

		const access = await tokens.issue(user.id, user.organizationId, "access", undefined, user.roleIds);
		const refresh = await tokens.issue(user.id, user.organizationId, "refresh");
		this.logger.logDebug(`Login exitoso: ${user.id} (${user.organizationId})`);

		return {
			accessToken: access.token,
			refreshToken: refresh.token,
			accessTokenExpiresAt: access.expiresAt,
			refreshTokenExpiresAt: refresh.expiresAt,
			tokenType: "Bearer",
		};
	}

	/**
	 * Canjea un refresh token por un access token nuevo con los roles actuales
	 * del usuario. El refresh token conserva su expiración original.
	 */
	async refresh(refreshToken: string): Promise<RefreshResult> {
		const { tokens } = this.#require();
		const claims = await tokens.validate(refreshToken, "refresh");
		const subject = await this.#requireActiveSubject(claims);

		const access = await tokens.issue(subject.id, subject.organizationId, "access", undefined, subject.roleIds);
		return { accessToken: access.token, accessTokenExpiresAt: access.expiresAt };
	}

	/**
	 * Construye el contexto de identidad de un request a partir de un access token
	 */
	async contextFromToken(rawToken: string): Promise<SessionContext> {
		const claims = await this.#require().tokens.validate(rawToken, "access");
		await this.#requireActiveSubject(claims);
		return SessionContext.fromClaims(claims);
	}

	// ─────────────────────────────────────────────────────────────────────────────
	// Autorización
	// ─────────────────────────────────────────────────────────────────────────────

	/**
	 * ¿Puede el sujeto del contexto ejecutar `permission` sobre un recurso de
	 * `resourceOrganizationId`? La barrera de tenant se evalúa primero y no
	 * depende del resultado de permisos.
	 */
	async authorize(context: SessionContext, permission: PermissionCode, resourceOrganizationId: string): Promise<AuthorizationDecision> {
		this.#requireIssued(context);
		const resolution = await this.deps.identity.resolveDetailed(context.subjectId, context.organizationId);

		const scope = scoped(resourceOrganizationId, context.organizationId, { crossTenant: resolution.crossTenant });
		if (!scope.allowed) {
			this.logger.logWarn(
				`Acceso denegado (CROSS_TENANT): ${context.subjectId}@${context.organizationId} → ${permission} en ${resourceOrganizationId}`
			);
			return { allowed: false, reason: "CROSS_TENANT" };
		}

		if (!grants(resolution.permissions, permission)) {
			this.logger.logWarn(`Acceso denegado (PERMISSION_DENIED): ${context.subjectId}@${context.organizationId} → ${permission}`);
			return { allowed: false, reason: "PERMISSION_DENIED" };
		}

		return ALLOWED;
	}

	/**
	 * @throws AccessError CROSS_TENANT | PERMISSION_DENIED
	 */
	async requireAuthorization(context: SessionContext, permission: PermissionCode, resourceOrganizationId: string): Promise<void> {
		const decision = await this.authorize(context, permission, resourceOrganizationId);
		if (!decision.allowed) {
			throw new AccessError(403, decision.reason, "Acceso denegado", {
				subjectId: context.subjectId,
				callerOrgId: context.organizationId,
				resourceOrgId: resourceOrganizationId,
				permission,
			});
		}
	}

	// ─────────────────────────────────────────────────────────────────────────────
	// Revocación
	// ─────────────────────────────────────────────────────────────────────────────

	/**
	 * Revoca el access token y, si se indica, el refresh token. Un token ya
	 * expirado o revocado no necesita registro.
	 */
	async logout(accessToken: string, refreshToken?: string): Promise<void> {
		const { tokens } = this.#require();

		const access = await this.#claimsForRevocation(accessToken, "access");
		if (access) await tokens.revoke(access.tokenId, access.expiresAt);

		if (refreshToken) {
			const refresh = await this.#claimsForRevocation(refreshToken, "refresh");
			if (refresh) await tokens.revoke(refresh.tokenId, refresh.expiresAt);
		}
	}

	/**
	 * Invalida todas las sesiones emitidas hasta ahora para el sujeto
	 */
	async revokeAllForSubject(subjectId: string): Promise<void> {
		await this.#require().tokens.revokeSubject(subjectId);
		this.logger.logInfo(`Sesiones revocadas para ${subjectId}`);
	}

	/**
	 * Cambia el password del sujeto del contexto y revoca todas sus sesiones,
	 * incluida la actual
	 */
	async changePassword(context: SessionContext, currentPassword: string, newPassword: string): Promise<void> {
		this.#requireIssued(context);
		await this.deps.identity.changePassword(context.subjectId, currentPassword, newPassword);
		await this.revokeAllForSubject(context.subjectId);
	}

	/**
	 * Rota la clave de firma. Los tokens firmados con claves aún vigentes
	 * siguen verificando.
	 */
	async rotateSigningKey(key: SigningKey): Promise<void> {
		await this.#require().keyStore.rotate(key);
	}

	// Llamadores sin tipos (JS) pueden pasar cualquier objeto
	#requireIssued(context: SessionContext): void {
		if (!SessionContext.isIssued(context)) {
			throw new AuthError(401, "TOKEN_MALFORMED", "Contexto de sesión no emitido por contextFromToken");
		}
	}

	async #requireActiveSubject(claims: VerifiedClaims): Promise<PublicUser> {
		const subject = await this.deps.identity.getActiveSubject(claims.subjectId, claims.organizationId);
		if (!subject) {
			throw new AuthError(401, "SUBJECT_UNAVAILABLE", "Sujeto no disponible", { subjectId: claims.subjectId });
		}
		return subject;
	}

	async #claimsForRevocation(token: string, kind: "access" | "refresh"): Promise<VerifiedClaims | null> {
		try {
			return await this.#require().tokens.validate(token, kind);
		} catch (error) {
			if (error instanceof AuthError && (error.errorKey === "TOKEN_EXPIRED" || error.errorKey === "TOKEN_REVOKED")) {
				return null;
			}
			throw error;
		}
	}
}

// Re-exportar tipos
export type { TokenPair, RefreshResult, AuthorizationDecision, ISessionManager, IssuedToken, TokenKind } from "./types.js";
export { SessionContext } from "./domain/session/context.js";
export { KeyStore } from "./domain/keys/KeyStore.js";
export { TokenService, VerifiedClaims } from "./domain/tokens/TokenService.js";
export { RevocationRepository } from "./domain/tokens/RevocationRepository.js";
