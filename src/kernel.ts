import type { ILogger } from "./interfaces/utils/ILogger.js";
import { Logger } from "./utils/Logger/Logger.js";

/**
 * Ciclo de vida común a providers y services
 */
export interface ILifecycle {
	readonly name: string;
	start(): Promise<void>;
	stop(): Promise<void>;
}

type ModuleType = "provider" | "service";

interface RegisteredModule {
	type: ModuleType;
	instance: ILifecycle;
}

/**
 * Kernel - Raíz de composición
 *
 * Registra providers y services, los inicia en orden de registro y los detiene
 * en orden inverso. Los providers deben registrarse antes que los services que
 * los consumen.
 */
export class Kernel {
	readonly #logger: ILogger = Logger.getLogger("Kernel");
	readonly #modules = new Map<string, RegisteredModule>();
	#started: ILifecycle[] = [];

	#register(type: ModuleType, instance: ILifecycle): void {
		if (this.#modules.has(instance.name)) {
			throw new Error(`Ya existe un módulo registrado con el nombre '${instance.name}'`);
		}
		this.#modules.set(instance.name, { type, instance });
		this.#logger.logDebug(`${type === "provider" ? "Provider" : "Service"} registrado: ${instance.name}`);
	}

	public registerProvider(instance: ILifecycle): void {
		this.#register("provider", instance);
	}

	public registerService(instance: ILifecycle): void {
		this.#register("service", instance);
	}

	public has(name: string): boolean {
		return this.#modules.has(name);
	}

	public get isRunning(): boolean {
		return this.#started.length > 0;
	}

	/**
	 * Inicia todos los módulos. Si alguno falla, detiene los ya iniciados y
	 * propaga el error.
	 */
	public async start(): Promise<void> {
		this.#logger.logInfo("Iniciando módulos...");

		for (const { type, instance } of this.#modules.values()) {
			try {
				await instance.start();
				this.#started.push(instance);
			} catch (error) {
				this.#logger.logError(`Error iniciando ${type} ${instance.name}: ${error instanceof Error ? error.message : String(error)}`);
				await this.stop();
				throw error;
			}
		}

		this.#logger.logOk(`Kernel iniciado (${this.#started.length} módulos)`);
	}

	// --- Lógica de Cierre ---
	public async stop(): Promise<void> {
		if (this.#started.length === 0) return;
		this.#logger.logInfo("Iniciando cierre ordenado...");

		const started = this.#started;
		this.#started = [];

		for (const instance of [...started].reverse()) {
			try {
				this.#logger.logDebug(`Deteniendo ${instance.name}`);
				await instance.stop();
			} catch (error) {
				this.#logger.logError(`Error deteniendo ${instance.name}: ${error instanceof Error ? error.message : String(error)}`);
			}
		}

		this.#logger.logOk("Cierre completado");
	}
}
