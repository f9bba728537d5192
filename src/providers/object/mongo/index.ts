import mongoose, { type Connection, type Model, type Schema } from "mongoose";
import { BaseProvider, ProviderType } from "../../BaseProvider.js";

/**
 * Configuración del proveedor de MongoDB
 */
export interface IMongoConfig {
	uri: string;
	maxRetries: number;
	retryDelay: number;
	connectionTimeout: number;
	serverSelectionTimeout: number;
	socketTimeout: number;
	autoReconnect: boolean;
	reconnectInterval: number;
}

/**
 * Interfaz del proveedor de MongoDB
 */
export interface IMongoProvider {
	/**
	 * Verifica si está conectado
	 */
	isConnected(): boolean;

	/**
	 * Registra un esquema y retorna el modelo
	 */
	createModel<T>(name: string, schema: Schema<T>): Model<T>;
}

/**
 * MongoProvider - Proveedor de conexión a MongoDB con tolerancia a fallos
 *
 * Características:
 * - Conexión con reintentos y backoff exponencial
 * - Reconexión automática en caso de desconexión
 */
export default class MongoProvider extends BaseProvider implements IMongoProvider {
	public readonly name = "mongo";
	public readonly type = ProviderType.OBJECT_PROVIDER;

	#connection: Connection | null = null;
	readonly #config: IMongoConfig;
	#retryCount = 0;
	#reconnectTimer: NodeJS.Timeout | null = null;
	#isDisconnecting = false;

	constructor(options: Partial<IMongoConfig> = {}) {
		super();

		this.#config = {
			uri: options.uri || process.env.MONGODB_URI || "mongodb://localhost:27017/tenant-auth",
			maxRetries: options.maxRetries ?? 5,
			retryDelay: options.retryDelay ?? 5000,
			connectionTimeout: options.connectionTimeout ?? 10000,
			serverSelectionTimeout: options.serverSelectionTimeout ?? 5000,
			socketTimeout: options.socketTimeout ?? 45000,
			autoReconnect: options.autoReconnect ?? true,
			reconnectInterval: options.reconnectInterval ?? 10000,
		};

		mongoose.set("strict", true);
		mongoose.set("strictQuery", true);
	}

	async start(): Promise<void> {
		await super.start();
		this.#isDisconnecting = false;
		await this.connect();
	}

	async stop(): Promise<void> {
		this.#isDisconnecting = true;
		await this.disconnect();
		await super.stop();
	}

	/**
	 * Conecta a MongoDB con reintentos automáticos
	 */
	async connect(): Promise<void> {
		if (this.#connection?.readyState === 1) return;

		try {
			this.logger.logInfo("Conectando a MongoDB...");

			await mongoose.connect(this.#config.uri, {
				connectTimeoutMS: this.#config.connectionTimeout,
				serverSelectionTimeoutMS: this.#config.serverSelectionTimeout,
				socketTimeoutMS: this.#config.socketTimeout,
				retryWrites: true,
				retryReads: true,
				maxPoolSize: 10,
			});

			this.#connection = mongoose.connection;
			this.#retryCount = 0;
			this.#setupConnectionListeners(this.#connection);

			this.logger.logOk("Conectado exitosamente a MongoDB");
		} catch (error) {
			this.logger.logError(`Error conectando: ${error instanceof Error ? error.message : String(error)}`);
			await this.#handleConnectionError();
		}
	}

	/**
	 * Maneja errores de conexión con reintentos
	 */
	async #handleConnectionError(): Promise<void> {
		if (this.#retryCount >= this.#config.maxRetries) {
			throw new Error(`No se pudo conectar a MongoDB después de ${this.#config.maxRetries} intentos`);
		}

		this.#retryCount++;
		const delay = this.#config.retryDelay * Math.pow(2, this.#retryCount - 1);
		this.logger.logWarn(`Reintentando conexión (${this.#retryCount}/${this.#config.maxRetries}) en ${delay}ms...`);

		await new Promise((resolve) => setTimeout(resolve, delay));
		await this.connect();
	}

	#setupConnectionListeners(connection: Connection): void {
		connection.removeAllListeners("disconnected");
		connection.removeAllListeners("error");

		connection.on("disconnected", () => {
			this.logger.logWarn("Desconectado de MongoDB");
			if (this.#config.autoReconnect && !this.#isDisconnecting) {
				this.#scheduleReconnect();
			}
		});

		connection.on("error", (error: Error) => {
			this.logger.logError(`Error de conexión: ${error.message}`);
		});
	}

	#scheduleReconnect(): void {
		if (this.#reconnectTimer) return;

		this.logger.logInfo(`Programando reconexión en ${this.#config.reconnectInterval}ms...`);
		this.#reconnectTimer = setTimeout(() => {
			this.#reconnectTimer = null;
			this.connect().catch((err: unknown) => {
				this.logger.logError(`Error en reconexión: ${err instanceof Error ? err.message : String(err)}`);
			});
		}, this.#config.reconnectInterval);
	}

	isConnected(): boolean {
		return this.#connection?.readyState === 1;
	}

	createModel<T>(name: string, schema: Schema<T>): Model<T> {
		if (!this.#connection) {
			throw new Error("MongoDB no está conectado");
		}
		// Evitar registrar el mismo modelo dos veces
		const existing: Model<T> | undefined = this.#connection.models[name];
		if (existing) return existing;
		return this.#connection.model<T>(name, schema);
	}

	/**
	 * Desconecta de MongoDB
	 */
	async disconnect(): Promise<void> {
		if (this.#reconnectTimer) {
			clearTimeout(this.#reconnectTimer);
			this.#reconnectTimer = null;
		}

		if (this.#connection) {
			await mongoose.disconnect();
			this.#connection = null;
			this.logger.logOk("Desconectado de MongoDB");
		}
	}
}
