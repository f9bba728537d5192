import type { IRedisProvider } from "../../../../../providers/queue/redis/index.js";
import { type Clock, toEpochSeconds } from "../../../../../utils/time.js";

/** Prefijos de claves Redis */
const REDIS_PREFIX = {
	TOKEN: "revoked:token:",
	SUBJECT: "revoked:subject:",
} as const;

export interface RevocationRepositoryOptions {
	clock: Clock;
	/** Segundos extra que se conserva un registro después del `exp` (tolerancia de reloj) */
	graceSeconds: number;
	/** Vida del corte por sujeto: la del token más largo que puede haber emitido */
	subjectCutoffTtlSeconds: number;
	/** Redis para compartir revocaciones entre instancias (opcional) */
	redis?: IRedisProvider;
}

/**
 * Datos mínimos de un token ya verificado para decidir su revocación
 */
export interface RevocationCheck {
	tokenId: string;
	subjectId: string;
	/** Segundos epoch */
	issuedAt: number;
}

/**
 * RevocationRepository - Registros de revocación
 *
 * Dos tipos de registro:
 * - Por identificador de token (`jti`), vigente hasta la expiración natural
 * - Por sujeto: corte "emitido en o antes de" (`iat <= corte`) que invalida
 *   todos los tokens previos del usuario
 *
 * Soporta Redis para persistencia distribuida. Sin Redis, funciona con
 * almacenamiento en memoria. Cada operación toca una sola clave, por lo que
 * una lectura posterior a una escritura resuelta siempre la observa.
 */
export class RevocationRepository {
	readonly #redis: IRedisProvider | null;
	readonly #clock: Clock;
	readonly #graceSeconds: number;
	readonly #subjectCutoffTtl: number;

	// Fallback en memoria: clave → vence (segundos epoch)
	readonly #tokens = new Map<string, number>();
	readonly #subjects = new Map<string, { cutoff: number; expiresAt: number }>();
	#cleanupTimer: ReturnType<typeof setInterval> | null = null;

	constructor(options: RevocationRepositoryOptions) {
		this.#redis = options.redis ?? null;
		this.#clock = options.clock;
		this.#graceSeconds = options.graceSeconds;
		this.#subjectCutoffTtl = options.subjectCutoffTtlSeconds;

		// Limpieza periódica solo si no hay Redis (Redis usa TTL nativo)
		if (!this.#redis) {
			this.#cleanupTimer = setInterval(() => this.#cleanupExpired(), 60 * 60 * 1000);
			this.#cleanupTimer.unref();
		}
	}

	get distributed(): boolean {
		return this.#redis !== null;
	}

	/**
	 * Detiene el timer de limpieza
	 */
	stop(): void {
		if (this.#cleanupTimer) {
			clearInterval(this.#cleanupTimer);
			this.#cleanupTimer = null;
		}
	}

	/**
	 * Marca un token como revocado hasta su expiración natural
	 * @param expiresAt - `exp` del token (segundos epoch)
	 */
	async recordRevocation(tokenId: string, expiresAt: number): Promise<void> {
		const until = expiresAt + this.#graceSeconds;
		const ttl = until - this.#now();
		if (ttl <= 0) return;

		if (this.#redis) {
			await this.#redis.setex(`${REDIS_PREFIX.TOKEN}${tokenId}`, ttl, String(expiresAt));
		} else {
			this.#tokens.set(tokenId, until);
		}
	}

	async isTokenRevoked(tokenId: string): Promise<boolean> {
		if (this.#redis) {
			return this.#redis.exists(`${REDIS_PREFIX.TOKEN}${tokenId}`);
		}

		const until = this.#tokens.get(tokenId);
		return until !== undefined && until > this.#now();
	}

	/**
	 * Revoca todos los tokens del sujeto emitidos en o antes de `cutoff`.
	 * Nunca retrocede un corte ya registrado.
	 */
	async revokeSubject(subjectId: string, cutoff: number = this.#now()): Promise<void> {
		const effective = Math.max(cutoff, (await this.getSubjectCutoff(subjectId)) ?? cutoff);

		if (this.#redis) {
			await this.#redis.setex(`${REDIS_PREFIX.SUBJECT}${subjectId}`, this.#subjectCutoffTtl, String(effective));
		} else {
			this.#subjects.set(subjectId, { cutoff: effective, expiresAt: this.#now() + this.#subjectCutoffTtl });
		}
	}

	async getSubjectCutoff(subjectId: string): Promise<number | null> {
		if (this.#redis) {
			const raw = await this.#redis.get(`${REDIS_PREFIX.SUBJECT}${subjectId}`);
			if (raw === null) return null;
			const cutoff = Number(raw);
			return Number.isFinite(cutoff) ? cutoff : null;
		}

		const record = this.#subjects.get(subjectId);
		if (!record || record.expiresAt <= this.#now()) return null;
		return record.cutoff;
	}

	/**
	 * Un token está revocado si su `jti` tiene registro o si fue emitido en o
	 * antes del corte de su sujeto
	 */
	async isRevoked(check: RevocationCheck): Promise<boolean> {
		if (await this.isTokenRevoked(check.tokenId)) return true;
		const cutoff = await this.getSubjectCutoff(check.subjectId);
		return cutoff !== null && check.issuedAt <= cutoff;
	}

	#now(): number {
		return toEpochSeconds(this.#clock.now());
	}

	#cleanupExpired(): void {
		const now = this.#now();
		for (const [tokenId, until] of this.#tokens) {
			if (until <= now) this.#tokens.delete(tokenId);
		}
		for (const [subjectId, record] of this.#subjects) {
			if (record.expiresAt <= now) this.#subjects.delete(subjectId);
		}
	}
}
