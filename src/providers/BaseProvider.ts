import type { ILogger } from "../interfaces/utils/ILogger.js";
import type { ILifecycle } from "../kernel.js";
import { Logger } from "../utils/Logger/Logger.js";

export interface IProvider extends ILifecycle {
	readonly type: string;
}

export abstract class BaseProvider implements IProvider {
	/** Nombre único del provider */
	abstract readonly name: string;
	abstract readonly type: string;
	protected readonly logger: ILogger = Logger.getLogger(this.constructor.name);

	public async start(): Promise<void> {
		this.logger.logDebug(`Iniciando ${this.name}`);
	}

	public async stop(): Promise<void> {
		this.logger.logDebug(`Deteniendo ${this.name}`);
	}
}

export enum ProviderType {
	OBJECT_PROVIDER = "object-provider",
	QUEUE_PROVIDER = "queue-provider",
	SECURITY_TOKEN = "security-token",
}
