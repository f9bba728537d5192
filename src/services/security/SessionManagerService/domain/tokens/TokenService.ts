import { randomUUID } from "node:crypto";
import type { JWTPayload } from "jose";
import type { IJWTProvider } from "../../../../../providers/security/jwt/index.js";
import type { ILogger } from "../../../../../interfaces/utils/ILogger.js";
import { type Clock, toEpochSeconds } from "../../../../../utils/time.js";
import { AuthError } from "../../../../../common/types/custom-errors/AuthError.js";
import { withStore } from "../../../../../common/utils/store-guard.js";
import type { IssuedToken, TokenKind } from "../../types.js";
import type { KeyStore } from "../keys/KeyStore.js";
import type { RevocationRepository } from "./RevocationRepository.js";

const ISSUER_KEY = Symbol("VerifiedClaims");

/**
 * Claims de un token cuya firma y vigencia ya fueron verificadas.
 * Solo TokenService.validate puede construirlos.
 */
export class VerifiedClaims {
	// Marca nominal: un objeto con la misma forma no es un VerifiedClaims
	readonly #verified = true;

	private constructor(
		readonly subjectId: string,
		readonly organizationId: string,
		readonly kind: TokenKind,
		readonly tokenId: string,
		readonly issuedAt: number,
		readonly expiresAt: number,
		readonly roleIds: readonly string[],
		readonly kid: string
	) {
		Object.freeze(this);
	}

	/**
	 * Lee los claims propios de un payload verificado por firma.
	 * Devuelve null si falta alguno o tiene un tipo inválido.
	 */
	static fromPayload(key: symbol, payload: JWTPayload, kid: string): VerifiedClaims | null {
		if (key !== ISSUER_KEY) return null;

		const { sub, org, kind, jti, iat, exp, roles } = payload;
		if (typeof sub !== "string" || sub.length === 0) return null;
		if (typeof org !== "string" || org.length === 0) return null;
		if (kind !== "access" && kind !== "refresh") return null;
		if (typeof jti !== "string" || jti.length === 0) return null;
		if (typeof iat !== "number" || typeof exp !== "number") return null;

		let roleIds: readonly string[] = [];
		if (kind === "access") {
			if (!Array.isArray(roles) || !roles.every((role): role is string => typeof role === "string")) return null;
			roleIds = Object.freeze([...roles]);
		}

		return new VerifiedClaims(sub, org, kind, jti, iat, exp, roleIds, kid);
	}
}

/**
 * Configuración del TokenService
 */
export interface TokenServiceConfig {
	/** TTL del Access Token en segundos */
	accessTokenTtl: number;
	/** TTL del Refresh Token en segundos */
	refreshTokenTtl: number;
	/** Tolerancia simétrica de reloj en segundos */
	clockSkewSeconds: number;
}

/**
 * TokenService - Emisión y validación de Access y Refresh Tokens
 *
 * Responsabilidades:
 * - Firmar tokens con la clave vigente del KeyStore
 * - Validar en orden: firma → expiración → revocación → tipo
 * - Registrar revocaciones
 *
 * La emisión y la validación son puras dado clave, reloj y entrada; la única
 * E/S es la consulta de revocaciones.
 */
export class TokenService {
	#keyStore: KeyStore;
	#jwtProvider: IJWTProvider;
	#revocations: RevocationRepository;
	#config: TokenServiceConfig;
	#clock: Clock;
	#logger: ILogger;

	constructor(
		keyStore: KeyStore,
		jwtProvider: IJWTProvider,
		revocations: RevocationRepository,
		config: TokenServiceConfig,
		clock: Clock,
		logger: ILogger
	) {
		this.#keyStore = keyStore;
		this.#jwtProvider = jwtProvider;
		this.#revocations = revocations;
		this.#config = config;
		this.#clock = clock;
		this.#logger = logger;
	}

	/**
	 * Firma un token nuevo. Los access tokens llevan los ids de rol (nunca permisos).
	 * @param ttlSeconds - por defecto el TTL configurado para el tipo
	 */
	async issue(subjectId: string, organizationId: string, kind: TokenKind, ttlSeconds?: number, roleIds: readonly string[] = []): Promise<IssuedToken> {
		const ttl = ttlSeconds ?? (kind === "access" ? this.#config.accessTokenTtl : this.#config.refreshTokenTtl);
		if (!Number.isInteger(ttl) || ttl <= 0) {
			throw new Error(`TTL inválido: ${ttl}`);
		}

		const issuedAt = toEpochSeconds(this.#clock.now());
		const expiresAt = issuedAt + ttl;
		const tokenId = randomUUID();
		const { kid, key } = this.#keyStore.getSigningKey();

		const payload: JWTPayload = kind === "access" ? { org: organizationId, kind, roles: [...roleIds] } : { org: organizationId, kind };
		const token = await this.#jwtProvider.signWithKey(payload, key, {
			kid,
			subject: subjectId,
			jwtId: tokenId,
			issuedAt,
			expiresAt,
		});

		return { token, tokenId, kind, issuedAt, expiresAt };
	}

	/**
	 * Valida un token. Ningún claim se lee antes de verificar la firma.
	 *
	 * @throws AuthError TOKEN_MALFORMED | TOKEN_EXPIRED | TOKEN_REVOKED | WRONG_TOKEN_KIND
	 */
	async validate(token: string, expectedKind?: TokenKind): Promise<VerifiedClaims> {
		const result = await this.#jwtProvider.verifyWithKeys(token, (kid) => this.#keyStore.resolve(kid), {
			currentDate: new Date(this.#clock.now()),
			clockTolerance: this.#config.clockSkewSeconds,
		});

		if (!result.valid) {
			this.#logger.logDebug(`Token rechazado (${result.reason}): ${result.error}`);
			if (result.reason === "expired") {
				throw new AuthError(401, "TOKEN_EXPIRED", "Token expirado");
			}
			throw new AuthError(401, "TOKEN_MALFORMED", "Token inválido");
		}

		const claims = VerifiedClaims.fromPayload(ISSUER_KEY, result.payload, result.kid);
		if (!claims) {
			this.#logger.logDebug("Token rechazado: claims incompletos");
			throw new AuthError(401, "TOKEN_MALFORMED", "Token inválido");
		}

		const revoked = await withStore(this.#logger, "isRevoked", () =>
			this.#revocations.isRevoked({ tokenId: claims.tokenId, subjectId: claims.subjectId, issuedAt: claims.issuedAt })
		);
		if (revoked) {
			throw new AuthError(401, "TOKEN_REVOKED", "Token revocado", { tokenId: claims.tokenId, subjectId: claims.subjectId });
		}

		if (expectedKind && claims.kind !== expectedKind) {
			throw new AuthError(401, "WRONG_TOKEN_KIND", `Se esperaba un ${expectedKind} token`, { tokenId: claims.tokenId });
		}

		return claims;
	}

	/**
	 * Revoca un token hasta su expiración natural. Revocar un refresh token no
	 * revoca los access tokens derivados de él.
	 */
	async revoke(tokenId: string, expiresAt: number): Promise<void> {
		await withStore(this.#logger, "recordRevocation", () => this.#revocations.recordRevocation(tokenId, expiresAt));
	}

	/**
	 * Revoca todos los tokens del sujeto emitidos hasta este segundo inclusive
	 */
	async revokeSubject(subjectId: string): Promise<void> {
		const cutoff = toEpochSeconds(this.#clock.now());
		await withStore(this.#logger, "revokeSubject", () => this.#revocations.revokeSubject(subjectId, cutoff));
	}
}
