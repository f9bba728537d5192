import { randomBytes } from "node:crypto";
import type { ILogger } from "../../../../../interfaces/utils/ILogger.js";
import { type SigningKey, validateSigningKeys } from "../../../../../config/auth.js";
import { Logger } from "../../../../../utils/Logger/Logger.js";

/**
 * Configuración del KeyStore
 */
export interface KeyStoreConfig {
	/** Claves iniciales, de más nueva a más vieja */
	keys: readonly SigningKey[];
	/** Cantidad máxima de claves que siguen verificando (default: max(3, keys.length)) */
	maxKeys?: number;
}

/**
 * Clave lista para firmar
 */
export interface ActiveKey {
	kid: string;
	key: Uint8Array;
}

/**
 * Callback para notificar rotación de claves (recibe los kids vigentes)
 */
export type KeyRotationCallback = (kids: readonly string[]) => void | Promise<void>;

interface StoredKey {
	kid: string;
	bytes: Uint8Array;
}

/**
 * KeyStore - Gestión de secretos de firma con rotación
 *
 * Mantiene una lista ordenada de claves: la primera firma y todas verifican.
 * Al rotar, la clave nueva pasa al frente y las más viejas se descartan al
 * superar `maxKeys`; los tokens firmados con una clave descartada dejan de
 * verificar.
 */
export class KeyStore {
	#keys: StoredKey[];
	readonly #maxKeys: number;
	readonly #rotationCallbacks: KeyRotationCallback[] = [];
	readonly #logger: ILogger = Logger.getLogger("KeyStore");

	constructor(config: KeyStoreConfig) {
		validateSigningKeys(config.keys);
		this.#maxKeys = Math.max(1, config.maxKeys ?? Math.max(3, config.keys.length));
		this.#keys = config.keys.slice(0, this.#maxKeys).map((key) => this.#toStored(key));
	}

	/**
	 * Genera una clave aleatoria segura (base64url, 48 bytes)
	 */
	static generateKey(kid: string): SigningKey {
		return { kid, secret: randomBytes(48).toString("base64url") };
	}

	/**
	 * Clave con la que se firman los tokens nuevos
	 */
	getSigningKey(): ActiveKey {
		const [current] = this.#keys;
		return { kid: current.kid, key: current.bytes };
	}

	/**
	 * Clave de verificación para un `kid` (null si no está vigente)
	 */
	resolve(kid: string): Uint8Array | null {
		return this.#keys.find((key) => key.kid === kid)?.bytes ?? null;
	}

	/** kids vigentes, de más nuevo a más viejo */
	get kids(): readonly string[] {
		return this.#keys.map((key) => key.kid);
	}

	/**
	 * Rota a una clave nueva. Falla si el secreto es corto o el kid ya existe.
	 */
	async rotate(newKey: SigningKey): Promise<void> {
		validateSigningKeys([newKey]);
		if (this.resolve(newKey.kid)) {
			throw new Error(`kid duplicado en las claves de firma: "${newKey.kid}"`);
		}

		const dropped = this.#keys.slice(this.#maxKeys - 1).map((key) => key.kid);
		this.#keys = [this.#toStored(newKey), ...this.#keys].slice(0, this.#maxKeys);
		this.#logger.logInfo(`Clave de firma rotada: ${newKey.kid}${dropped.length ? ` (descartadas: ${dropped.join(", ")})` : ""}`);

		// Notificar a los listeners
		const kids = this.kids;
		for (const callback of this.#rotationCallbacks) {
			try {
				await callback(kids);
			} catch (error) {
				// Los errores en callbacks no detienen la rotación
				this.#logger.logError(`Error en callback de rotación: ${error instanceof Error ? error.message : String(error)}`);
			}
		}
	}

	/**
	 * Registra un callback para cuando se rotan las claves
	 */
	onRotation(callback: KeyRotationCallback): void {
		this.#rotationCallbacks.push(callback);
	}

	#toStored(key: SigningKey): StoredKey {
		return { kid: key.kid, bytes: new TextEncoder().encode(key.secret) };
	}
}
