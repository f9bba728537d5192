import type { ILogger } from "../interfaces/utils/ILogger.js";
import type { ILifecycle } from "../kernel.js";
import { Logger } from "../utils/Logger/Logger.js";

export interface IService<T> extends ILifecycle {
	getInstance(): Promise<T>;
}

/**
 * Clase base abstracta para todos los Services.
 * Las dependencias (providers, otros services, configuración) llegan por
 * constructor; el Kernel solo ordena el ciclo de vida.
 */
export abstract class BaseService<T> implements IService<T> {
	/** Nombre único del service */
	abstract readonly name: string;

	protected readonly logger: ILogger = Logger.getLogger(this.constructor.name);

	/**
	 * Obtener la instancia del service
	 */
	abstract getInstance(): Promise<T>;

	/**
	 * Lógica de inicialización del service
	 */
	public async start(): Promise<void> {
		this.logger.logInfo(`Inicializando ${this.name}...`);
	}

	/**
	 * Lógica de cierre del service
	 */
	public async stop(): Promise<void> {
		this.logger.logOk(`Detenido.`);
	}
}
