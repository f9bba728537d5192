import type { ILogger } from "../../../../interfaces/utils/ILogger.js";
import { type Clock, systemClock } from "../../../../utils/time.js";
import type { IdentityStore } from "../store/types.js";
import type { Role } from "./role.js";
import { isRoleVisibleTo } from "./role.js";
import { type PermissionCode, grants } from "../permissions.js";
import type { IntegrityWarning, ResolutionResult } from "../types.js";
import { withStore } from "../../../../common/utils/store-guard.js";

interface PermissionCacheEntry {
	result: ResolutionResult;
	timestamp: number;
}

/**
 * LRU Cache simple para permisos
 */
class LRUCache<K, V> {
	#cache = new Map<K, V>();
	#maxSize: number;

	constructor(maxSize: number) {
		this.#maxSize = maxSize;
	}

	get(key: K): V | undefined {
		const value = this.#cache.get(key);
		if (value !== undefined) {
			// Move to end (most recently used)
			this.#cache.delete(key);
			this.#cache.set(key, value);
		}
		return value;
	}

	set(key: K, value: V): void {
		if (this.#cache.has(key)) {
			this.#cache.delete(key);
		} else if (this.#cache.size >= this.#maxSize) {
			// Remove least recently used (first item)
			const firstKey = this.#cache.keys().next().value;
			if (firstKey !== undefined) {
				this.#cache.delete(firstKey);
			}
		}
		this.#cache.set(key, value);
	}

	delete(key: K): boolean {
		return this.#cache.delete(key);
	}

	clear(): void {
		this.#cache.clear();
	}

	keys(): IterableIterator<K> {
		return this.#cache.keys();
	}

	get size(): number {
		return this.#cache.size;
	}
}

export interface PermissionResolverOptions {
	/** TTL del cache en ms. 0 deshabilita el cache. */
	cacheTtlMs: number;
	cacheSize: number;
	clock?: Clock;
}

const EMPTY_RESULT: ResolutionResult = Object.freeze({
	permissions: new Set<PermissionCode>(),
	crossTenant: false,
	warnings: Object.freeze([]),
});

/**
 * PermissionResolver - Cálculo del conjunto efectivo de permisos
 *
 * Características:
 * - Unión de los permisos de los roles asignados y de sus `includes` (cierre transitivo)
 * - Solo cuentan roles visibles para la organización del usuario (globales o propios)
 * - Roles desconocidos, ajenos, ciclos y códigos sin registro generan IntegrityWarning
 * - Cache LRU opcional con TTL, invalidado sincrónicamente en cada mutación
 */
export class PermissionResolver {
	#cache: LRUCache<string, PermissionCacheEntry>;
	readonly #cacheTTL: number;
	readonly #clock: Clock;

	constructor(
		private readonly store: IdentityStore,
		private readonly logger: ILogger,
		options: PermissionResolverOptions
	) {
		this.#cache = new LRUCache(Math.max(1, options.cacheSize));
		this.#cacheTTL = options.cacheTtlMs;
		this.#clock = options.clock ?? systemClock;
	}

	get cacheEnabled(): boolean {
		return this.#cacheTTL > 0;
	}

	// ─────────────────────────────────────────────────────────────────────────────
	// Consultas
	// ─────────────────────────────────────────────────────────────────────────────

	async resolve(userId: string, organizationId: string): Promise<ReadonlySet<PermissionCode>> {
		const { permissions } = await this.resolveDetailed(userId, organizationId);
		return permissions;
	}

	/**
	 * Verifica si el usuario tiene el permiso (con comodines `*` y `recurso:*`)
	 */
	async authorize(userId: string, organizationId: string, code: PermissionCode): Promise<boolean> {
		const { permissions } = await this.resolveDetailed(userId, organizationId);
		return grants(permissions, code);
	}

	/**
	 * Resuelve permisos, alcance cross-tenant y advertencias de integridad (con cache)
	 */
	async resolveDetailed(userId: string, organizationId: string): Promise<ResolutionResult> {
		if (!this.cacheEnabled) {
			return withStore(this.logger, "resolvePermissions", () => this.#compute(userId, organizationId));
		}

		const cacheKey = `${userId}:${organizationId}`;
		const cached = this.#cache.get(cacheKey);
		if (cached && this.#clock.now() - cached.timestamp < this.#cacheTTL) {
			return cached.result;
		}

		const result = await withStore(this.logger, "resolvePermissions", () => this.#compute(userId, organizationId));
		this.#cache.set(cacheKey, { result, timestamp: this.#clock.now() });
		return result;
	}

	async #compute(userId: string, organizationId: string): Promise<ResolutionResult> {
		const user = await this.store.findUserById(userId);
		if (!user || !user.isActive || user.organizationId !== organizationId) {
			return EMPTY_RESULT;
		}

		const organization = await this.store.findOrganizationById(organizationId);
		if (!organization?.isActive) {
			return EMPTY_RESULT;
		}

		const warnings: IntegrityWarning[] = [];
		const { visible, hidden, missing } = await this.#loadRoleGraph(user.roleIds, organizationId);
		const accepted = this.#expand(user.roleIds, visible, hidden, missing, warnings);

		// Unión de códigos, descartando los que no están en el catálogo
		const referenced = new Set<string>();
		for (const role of accepted) {
			for (const code of role.permissionCodes) referenced.add(code);
		}
		const known = new Set((await this.store.findPermissionsByCodes([...referenced])).map((p) => p.code));

		const permissions = new Set<PermissionCode>();
		for (const role of accepted) {
			for (const code of role.permissionCodes) {
				if (known.has(code)) {
					permissions.add(code);
				} else {
					warnings.push({ kind: "UNKNOWN_PERMISSION", roleId: role.id, code });
				}
			}
		}

		for (const warning of warnings) {
			this.logger.logWarn(`Integridad (${userId}@${organizationId}): ${describeWarning(warning)}`);
		}

		return Object.freeze({
			permissions,
			crossTenant: accepted.some((role) => role.crossTenant && role.organizationId === null),
			warnings: Object.freeze(warnings),
		});
	}

	/**
	 * Carga por niveles (una consulta por nivel) todos los roles alcanzables
	 * desde las asignaciones. Los roles no visibles no se expanden.
	 */
	async #loadRoleGraph(
		roots: readonly string[],
		organizationId: string
	): Promise<{ visible: Map<string, Role>; hidden: Map<string, Role>; missing: Set<string> }> {
		const visible = new Map<string, Role>();
		const hidden = new Map<string, Role>();
		const missing = new Set<string>();
		const seen = new Set<string>();

		let frontier = [...new Set(roots)];
		while (frontier.length > 0) {
			for (const id of frontier) seen.add(id);

			const found = await this.store.findRolesByIds(frontier);
			const byId = new Map(found.map((role) => [role.id, role]));
			const next = new Set<string>();

			for (const id of frontier) {
				const role = byId.get(id);
				if (!role) {
					missing.add(id);
				} else if (!isRoleVisibleTo(role, organizationId)) {
					hidden.set(id, role);
				} else {
					visible.set(id, role);
					for (const included of role.includes) {
						if (!seen.has(included)) next.add(included);
					}
				}
			}

			frontier = [...next];
		}

		return { visible, hidden, missing };
	}

	/**
	 * Recorre el grafo en profundidad detectando ciclos. La arista que cierra un
	 * ciclo se ignora; el resto del grafo se acepta.
	 */
	#expand(
		roots: readonly string[],
		visible: ReadonlyMap<string, Role>,
		hidden: ReadonlyMap<string, Role>,
		missing: ReadonlySet<string>,
		warnings: IntegrityWarning[]
	): Role[] {
		const accepted: Role[] = [];
		const done = new Set<string>();
		const onPath = new Set<string>();
		const reported = new Set<string>();

		const report = (key: string, warning: IntegrityWarning) => {
			if (reported.has(key)) return;
			reported.add(key);
			warnings.push(warning);
		};

		const visit = (roleId: string, parentId: string | null) => {
			if (missing.has(roleId)) {
				report(`missing:${roleId}`, { kind: "UNKNOWN_ROLE", roleId });
				return;
			}
			const foreign = hidden.get(roleId);
			if (foreign) {
				report(`hidden:${roleId}`, { kind: "ROLE_NOT_VISIBLE", roleId, roleOrganizationId: foreign.organizationId });
				return;
			}
			if (onPath.has(roleId)) {
				report(`cycle:${parentId}>${roleId}`, { kind: "ROLE_CYCLE", roleId, includedBy: parentId ?? roleId });
				return;
			}
			const role = visible.get(roleId);
			if (!role || done.has(roleId)) return;

			onPath.add(roleId);
			accepted.push(role);
			for (const included of role.includes) visit(included, roleId);
			onPath.delete(roleId);
			done.add(roleId);
		};

		for (const roleId of roots) visit(roleId, null);
		return accepted;
	}

	// ─────────────────────────────────────────────────────────────────────────────
	// Invalidación de cache
	// ─────────────────────────────────────────────────────────────────────────────

	/**
	 * Invalida cache para un usuario específico
	 */
	invalidateUser(userId: string): void {
		for (const key of [...this.#cache.keys()]) {
			if (key.startsWith(`${userId}:`)) {
				this.#cache.delete(key);
			}
		}
	}

	/**
	 * Invalida cache para usuarios con un rol específico.
	 * Limpia todo el cache: saber qué usuarios afecta requeriría otra consulta.
	 */
	invalidateRole(_roleId: string): void {
		this.#cache.clear();
	}

	invalidateAll(): void {
		this.#cache.clear();
	}
}

export function describeWarning(warning: IntegrityWarning): string {
	switch (warning.kind) {
		case "UNKNOWN_ROLE":
			return `rol desconocido ${warning.roleId}`;
		case "ROLE_NOT_VISIBLE":
			return `rol ${warning.roleId} pertenece a otra organización (${warning.roleOrganizationId})`;
		case "ROLE_CYCLE":
			return `ciclo de inclusión ${warning.includedBy} → ${warning.roleId}`;
		case "UNKNOWN_PERMISSION":
			return `rol ${warning.roleId} referencia el permiso inexistente ${warning.code}`;
	}
}
