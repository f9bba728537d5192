import * as jose from "jose";
import { BaseProvider, ProviderType } from "../../BaseProvider.js";

/** Único algoritmo aceptado. Cualquier otro `alg` en el header se rechaza. */
export const SIGNING_ALGORITHM = "HS256" as const;

/**
 * Una firma base64url con bits de relleno distintos de cero decodifica a los
 * mismos bytes; solo se acepta la codificación canónica.
 */
function hasCanonicalSignature(token: string): boolean {
	const parts = token.split(".");
	if (parts.length !== 3) return false;

	const [, , signature] = parts;
	try {
		return jose.base64url.encode(jose.base64url.decode(signature)) === signature;
	} catch {
		return false;
	}
}

/**
 * Opciones de configuración del JWT
 */
export interface JWTProviderConfig {
	/** Issuer del token */
	issuer: string;
	/** Audience del token */
	audience: string;
}

/**
 * Claims registrados que el provider fija al firmar (en segundos epoch)
 */
export interface SignOptions {
	kid: string;
	subject: string;
	jwtId: string;
	issuedAt: number;
	expiresAt: number;
}

export interface VerifyOptions {
	/** Instante de referencia para `exp` */
	currentDate: Date;
	/** Tolerancia simétrica en segundos */
	clockTolerance: number;
}

/**
 * Resultado de verificación de token.
 * `expired` solo se reporta si la firma ya fue verificada.
 */
export type TokenVerificationResult<T> =
	| { valid: true; payload: T; kid: string }
	| { valid: false; reason: "expired" | "malformed"; error: string };

/**
 * Resuelve la clave de verificación para un `kid` (null si no se conoce)
 */
export type VerificationKeyResolver = (kid: string) => Uint8Array | null;

/**
 * Interface del JWT Provider con soporte multi-key
 */
export interface IJWTProvider {
	/**
	 * Firma un JWT (JWS compacto) con una clave específica
	 */
	signWithKey(payload: jose.JWTPayload, key: Uint8Array, options: SignOptions): Promise<string>;

	/**
	 * Verifica la firma con la clave indicada por el `kid` del header y luego los claims
	 */
	verifyWithKeys(token: string, resolveKey: VerificationKeyResolver, options: VerifyOptions): Promise<TokenVerificationResult<jose.JWTPayload>>;
}

/**
 * JWTProvider - Firma y verificación de tokens usando jose
 *
 * Genera JWS compactos (`header.payload.signature`, base64url) aptos para
 * viajar como bearer. La verificación no requiere acceso a la base de datos.
 *
 * Soporta rotación de secretos: cada token lleva el `kid` de la clave que lo
 * firmó y el llamador decide qué claves siguen siendo válidas.
 */
export default class JWTProvider extends BaseProvider implements IJWTProvider {
	public readonly name = "security/jwt";
	public readonly type = ProviderType.SECURITY_TOKEN;

	#config: JWTProviderConfig;

	constructor(config: JWTProviderConfig) {
		super();
		this.#config = { ...config };
	}

	async start(): Promise<void> {
		await super.start();
		this.logger.logOk(`JWTProvider iniciado (${SIGNING_ALGORITHM}, issuer=${this.#config.issuer})`);
	}

	async signWithKey(payload: jose.JWTPayload, key: Uint8Array, options: SignOptions): Promise<string> {
		return new jose.SignJWT(payload)
			.setProtectedHeader({ alg: SIGNING_ALGORITHM, typ: "JWT", kid: options.kid })
			.setSubject(options.subject)
			.setJti(options.jwtId)
			.setIssuedAt(options.issuedAt)
			.setExpirationTime(options.expiresAt)
			.setIssuer(this.#config.issuer)
			.setAudience(this.#config.audience)
			.sign(key);
	}

	async verifyWithKeys(
		token: string,
		resolveKey: VerificationKeyResolver,
		options: VerifyOptions
	): Promise<TokenVerificationResult<jose.JWTPayload>> {
		let kid = "";

		if (!hasCanonicalSignature(token)) {
			return { valid: false, reason: "malformed", error: "Firma no canónica" };
		}

		try {
			const { payload } = await jose.jwtVerify(
				token,
				(header: jose.JWSHeaderParameters) => {
					if (typeof header.kid !== "string") {
						throw new Error("Header sin kid");
					}
					const key = resolveKey(header.kid);
					if (!key) {
						throw new Error(`kid desconocido: ${header.kid}`);
					}
					kid = header.kid;
					return key;
				},
				{
					algorithms: [SIGNING_ALGORITHM],
					issuer: this.#config.issuer,
					audience: this.#config.audience,
					typ: "JWT",
					requiredClaims: ["sub", "jti", "iat", "exp"],
					currentDate: options.currentDate,
					clockTolerance: options.clockTolerance,
				}
			);

			return { valid: true, payload, kid };
		} catch (error) {
			// jose valida los claims solo después de verificar la firma
			if (error instanceof jose.errors.JWTExpired) {
				return { valid: false, reason: "expired", error: "Token expirado" };
			}

			return {
				valid: false,
				reason: "malformed",
				error: error instanceof Error ? error.message : "Token inválido",
			};
		}
	}
}
