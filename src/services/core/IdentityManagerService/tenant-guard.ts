import { AccessError } from "../../../common/types/custom-errors/AccessError.js";

export type ScopeDecision = { allowed: true } | { allowed: false; reason: "CROSS_TENANT" };

export interface ScopeOptions {
	/** Lo concede únicamente un rol global marcado como cross-tenant */
	crossTenant?: boolean;
}

const ALLOWED: ScopeDecision = Object.freeze({ allowed: true });
const CROSS_TENANT: ScopeDecision = Object.freeze({ allowed: false, reason: "CROSS_TENANT" });

/**
 * Barrera de tenant: el recurso debe pertenecer a la organización del llamador.
 * Es independiente del resultado de permisos.
 */
export function scoped(resourceOrganizationId: string, callerOrganizationId: string, options: ScopeOptions = {}): ScopeDecision {
	if (options.crossTenant) return ALLOWED;
	return resourceOrganizationId === callerOrganizationId ? ALLOWED : CROSS_TENANT;
}

/**
 * @throws AccessError CROSS_TENANT
 */
export function assertScoped(resourceOrganizationId: string, callerOrganizationId: string, options: ScopeOptions = {}): void {
	if (!scoped(resourceOrganizationId, callerOrganizationId, options).allowed) {
		throw new AccessError(403, "CROSS_TENANT", "Recurso de otra organización", {
			callerOrgId: callerOrganizationId,
			resourceOrgId: resourceOrganizationId,
		});
	}
}

/**
 * Recurso propiedad de una organización
 */
export interface TenantOwned {
	id: string;
	organizationId: string;
}

/**
 * Fuente de datos sin filtrar que envuelve el ScopedRepository
 */
export interface TenantSource<T extends TenantOwned> {
	findById(id: string): Promise<T | null>;
	/** Debe aplicar `organizationId` como filtro obligatorio */
	findMany(organizationId: string, filter: Partial<T>): Promise<T[]>;
}

/**
 * ScopedRepository - Acceso a una colección tenant-owned filtrado siempre por
 * la organización del llamador.
 *
 * Un id de otra organización se comporta igual que uno inexistente en las
 * lecturas, y falla con CROSS_TENANT en `require`.
 */
export class ScopedRepository<T extends TenantOwned> {
	constructor(
		private readonly source: TenantSource<T>,
		private readonly callerOrganizationId: string,
		private readonly options: ScopeOptions = {}
	) {}

	get organizationId(): string {
		return this.callerOrganizationId;
	}

	async findById(id: string): Promise<T | null> {
		const item = await this.source.findById(id);
		if (!item) return null;
		return scoped(item.organizationId, this.callerOrganizationId, this.options).allowed ? item : null;
	}

	/**
	 * @throws AccessError CROSS_TENANT si el recurso existe en otra organización
	 */
	async require(id: string): Promise<T | null> {
		const item = await this.source.findById(id);
		if (!item) return null;
		assertScoped(item.organizationId, this.callerOrganizationId, this.options);
		return item;
	}

	/**
	 * El filtro de organización se impone siempre, aunque el llamador pase otro.
	 * Los listados no se amplían con `crossTenant`.
	 */
	async findMany(filter: Partial<T> = {}): Promise<T[]> {
		const items = await this.source.findMany(this.callerOrganizationId, filter);
		return items.filter((item) => item.organizationId === this.callerOrganizationId);
	}
}
