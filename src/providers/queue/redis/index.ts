import { Redis } from "ioredis";
import { BaseProvider, ProviderType } from "../../BaseProvider.js";

/**
 * Configuración del RedisProvider
 */
export interface RedisProviderConfig {
	/** Host del servidor Redis (default: localhost) */
	host?: string;
	/** Puerto del servidor Redis (default: 6379) */
	port?: number;
	/** Password de Redis (opcional) */
	password?: string;
	/** Base de datos a usar (default: 0) */
	db?: number;
	/** Prefijo para las claves (default: "auth:") */
	keyPrefix?: string;
}

/**
 * Interface del Redis Provider
 */
export interface IRedisProvider {
	get(key: string): Promise<string | null>;
	exists(key: string): Promise<boolean>;
	setex(key: string, ttlSeconds: number, value: string): Promise<void>;
}

/**
 * RedisProvider - Cliente Redis para estado compartido entre instancias
 *
 * Usa ioredis. Cada operación es de una sola clave, por lo que lecturas y
 * escrituras sobre la misma clave son linealizables.
 */
export default class RedisProvider extends BaseProvider implements IRedisProvider {
	public readonly name = "redis";
	public readonly type = ProviderType.QUEUE_PROVIDER;

	#client: Redis | null = null;
	#config: Required<Omit<RedisProviderConfig, "password">> & { password?: string };

	constructor(config?: RedisProviderConfig) {
		super();
		this.#config = {
			host: config?.host || process.env.REDIS_HOST || "localhost",
			port: config?.port || parseInt(process.env.REDIS_PORT || "6379", 10),
			password: config?.password || process.env.REDIS_PASSWORD || undefined,
			db: config?.db || parseInt(process.env.REDIS_DB || "0", 10),
			keyPrefix: config?.keyPrefix || "auth:",
		};
	}

	get client(): Redis {
		if (!this.#client) {
			throw new Error("RedisProvider no está inicializado");
		}
		return this.#client;
	}

	async start(): Promise<void> {
		await super.start();

		this.#client = new Redis({
			host: this.#config.host,
			port: this.#config.port,
			password: this.#config.password,
			db: this.#config.db,
			keyPrefix: this.#config.keyPrefix,
			retryStrategy: (times) => {
				if (times > 3) {
					this.logger.logError("Redis: máximo de reintentos alcanzado");
					return null;
				}
				return Math.min(times * 200, 2000);
			},
			maxRetriesPerRequest: 3,
		});

		this.#client.on("error", (err: Error) => {
			this.logger.logError(`Redis error: ${err.message}`);
		});

		this.#client.on("connect", () => {
			this.logger.logDebug("Redis conectado");
		});

		await this.#client.ping();
		this.logger.logOk(`RedisProvider iniciado (${this.#config.host}:${this.#config.port})`);
	}

	async stop(): Promise<void> {
		if (this.#client) {
			await this.#client.quit();
			this.#client = null;
		}
		await super.stop();
	}

	async get(key: string): Promise<string | null> {
		return this.client.get(key);
	}

	async exists(key: string): Promise<boolean> {
		const result = await this.client.exists(key);
		return result === 1;
	}

	async setex(key: string, ttlSeconds: number, value: string): Promise<void> {
		await this.client.setex(key, ttlSeconds, value);
	}
}
