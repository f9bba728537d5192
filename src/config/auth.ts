import { parseDuration } from "../utils/time.js";

/** Longitud mínima de un secreto de firma (HS256 con 256 bits) */
export const MIN_SECRET_LENGTH = 32;

/**
 * Clave de firma identificada por `kid`
 */
export interface SigningKey {
	kid: string;
	secret: string;
}

/**
 * Configuración consumida por el núcleo de autenticación.
 * Se construye una vez al arrancar y se pasa explícitamente a cada componente.
 */
export interface AuthConfig {
	/** Claves ordenadas de más nueva a más vieja. La primera firma; todas verifican. */
	signingKeys: readonly SigningKey[];
	/** TTL del access token en segundos */
	accessTokenTtl: number;
	/** TTL del refresh token en segundos */
	refreshTokenTtl: number;
	/** Tolerancia simétrica de reloj (segundos) aplicada al chequeo de expiración */
	clockSkewSeconds: number;
	issuer: string;
	audience: string;
	/** TTL del cache de permisos en ms (0 = deshabilitado) */
	permissionCacheTtlMs: number;
	permissionCacheSize: number;
	passwordMinLength: number;
}

type Env = Record<string, string | undefined>;

/**
 * Parsea `kid:secret,kid:secret` (más nueva primero)
 */
export function parseSigningKeys(raw: string): SigningKey[] {
	return raw
		.split(",")
		.map((entry) => entry.trim())
		.filter((entry) => entry.length > 0)
		.map((entry) => {
			const separator = entry.indexOf(":");
			if (separator <= 0) {
				throw new Error(`Clave de firma inválida: se esperaba "kid:secret"`);
			}
			return { kid: entry.slice(0, separator), secret: entry.slice(separator + 1) };
		});
}

export function validateSigningKeys(keys: readonly SigningKey[]): void {
	if (keys.length === 0) {
		throw new Error("Se requiere al menos una clave de firma (SIGNING_KEYS o JWT_SECRET)");
	}

	const seen = new Set<string>();
	for (const key of keys) {
		if (key.secret.length < MIN_SECRET_LENGTH) {
			throw new Error(`La clave "${key.kid}" debe tener al menos ${MIN_SECRET_LENGTH} caracteres`);
		}
		if (seen.has(key.kid)) {
			throw new Error(`kid duplicado en las claves de firma: "${key.kid}"`);
		}
		seen.add(key.kid);
	}
}

function readInt(env: Env, name: string, fallback: number, min: number): number {
	const raw = env[name];
	if (raw === undefined || raw.trim() === "") return fallback;

	const value = Number(raw);
	if (!Number.isInteger(value) || value < min) {
		throw new Error(`${name} debe ser un entero >= ${min} (recibido: "${raw}")`);
	}
	return value;
}

/**
 * Construye la configuración desde variables de entorno
 */
export function loadAuthConfig(env: Env = process.env): AuthConfig {
	const signingKeys = env.SIGNING_KEYS
		? parseSigningKeys(env.SIGNING_KEYS)
		: env.JWT_SECRET
			? [{ kid: "primary", secret: env.JWT_SECRET }]
			: [];
	validateSigningKeys(signingKeys);

	const issuer = env.TOKEN_ISSUER || "tenant-auth-core";

	return Object.freeze({
		signingKeys: Object.freeze(signingKeys),
		accessTokenTtl: parseDuration(env.ACCESS_TOKEN_TTL || "15m"),
		refreshTokenTtl: parseDuration(env.REFRESH_TOKEN_TTL || "30d"),
		clockSkewSeconds: readInt(env, "CLOCK_SKEW_SECONDS", 5, 0),
		issuer,
		audience: env.TOKEN_AUDIENCE || issuer,
		permissionCacheTtlMs: readInt(env, "PERMISSION_CACHE_TTL_MS", 0, 0),
		permissionCacheSize: readInt(env, "PERMISSION_CACHE_SIZE", 1000, 1),
		passwordMinLength: readInt(env, "PASSWORD_MIN_LENGTH", 8, 1),
	});
}
