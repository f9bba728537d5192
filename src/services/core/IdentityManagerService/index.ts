import { BaseService } from "../../BaseService.js";
import type { AuthConfig } from "../../../config/auth.js";
import type { Clock } from "../../../utils/time.js";
import type { IMongoProvider } from "../../../providers/object/mongo/index.js";
import type { Organization, Permission, PublicUser, Role } from "./domain/index.js";
import type { CreateOrganizationInput, CreateRoleInput, CreateUserInput, IIdentityManager, ResolutionResult } from "./types.js";
import type { IdentityStore } from "./store/types.js";
import type { PermissionCode } from "./permissions.js";
import { MemoryIdentityStore } from "./store/memory.js";
import { MongoIdentityStore } from "./store/mongo.js";
import { PermissionResolver } from "./domain/permissions.js";
import { UserManager } from "./dao/users.js";
import { RoleManager } from "./dao/roles.js";
import { OrganizationManager } from "./dao/organizations.js";
import { PermissionCatalog } from "./dao/permissions.js";

export interface IdentityManagerDependencies {
	config: Pick<AuthConfig, "passwordMinLength" | "permissionCacheTtlMs" | "permissionCacheSize">;
	/** Persistencia en MongoDB; sin ella (y sin `store`) se usa memoria */
	mongo?: IMongoProvider;
	/** Store explícito (tiene prioridad sobre `mongo`) */
	store?: IdentityStore;
	clock?: Clock;
	/** Siembra permisos y roles predefinidos al iniciar (default: true) */
	seed?: boolean;
}

interface IdentityCore {
	store: IdentityStore;
	resolver: PermissionResolver;
	users: UserManager;
	roles: RoleManager;
	organizations: OrganizationManager;
	permissions: PermissionCatalog;
}

/**
 * IdentityManagerService - Usuarios, organizaciones, roles y permisos
 *
 * **Persistencia:**
 * Usa MongoDB si se le pasa un MongoProvider conectado. Sin provider trabaja en
 * memoria (útil para tests y desarrollo local) y lo advierte en el log.
 */
export default class IdentityManagerService extends BaseService<IIdentityManager> implements IIdentityManager {
	public readonly name = "IdentityManagerService";

	#core: IdentityCore | null = null;

	constructor(private readonly deps: IdentityManagerDependencies) {
		super();
	}

	async getInstance(): Promise<IIdentityManager> {
		return this;
	}

	async start(): Promise<void> {
		await super.start();

		const store = await this.#createStore();
		const resolver = new PermissionResolver(store, this.logger.getLogger("PermissionResolver"), {
			cacheTtlMs: this.deps.config.permissionCacheTtlMs,
			cacheSize: this.deps.config.permissionCacheSize,
			clock: this.deps.clock,
		});
		const organizations = new OrganizationManager(store, resolver, this.logger);
		const permissions = new PermissionCatalog(store, resolver, this.logger);
		const roles = new RoleManager(store, permissions, organizations, resolver, this.logger);
		const users = new UserManager(store, organizations, roles, resolver, this.logger, {
			passwordMinLength: this.deps.config.passwordMinLength,
		});

		if (this.deps.seed ?? true) {
			await permissions.initializePredefinedPermissions();
			await roles.initializePredefinedRoles();
		}

		this.#core = { store, resolver, users, roles, organizations, permissions };
		this.logger.logOk(`IdentityManagerService iniciado (cache de permisos ${resolver.cacheEnabled ? "activo" : "deshabilitado"})`);
	}

	async stop(): Promise<void> {
		this.#core?.resolver.invalidateAll();
		this.#core = null;
		await super.stop();
	}

	async #createStore(): Promise<IdentityStore> {
		if (this.deps.store) return this.deps.store;

		if (this.deps.mongo) {
			if (!this.deps.mongo.isConnected()) {
				throw new Error("IdentityManagerService requiere MongoDB conectado");
			}
			const store = new MongoIdentityStore(this.deps.mongo);
			await store.syncIndexes();
			this.logger.logDebug("Usando MongoDB como almacenamiento de identidades");
			return store;
		}

		this.logger.logWarn("MongoDB no configurado. Identidades en memoria (no persistentes)");
		return new MemoryIdentityStore();
	}

	#require(): IdentityCore {
		if (!this.#core) {
			throw new Error("IdentityManagerService no está iniciado");
		}
		return this.#core;
	}

	// ─────────────────────────────────────────────────────────────────────────────
	// Métodos públicos de IIdentityManager (delegados a managers)
	// ─────────────────────────────────────────────────────────────────────────────

	async verifyCredentials(email: string, password: string): Promise<PublicUser | null> {
		return this.#require().users.authenticate(email, password);
	}

	async recordLogin(userId: string): Promise<void> {
		return this.#require().users.recordLogin(userId);
	}

	async changePassword(userId: string, currentPassword: string, newPassword: string): Promise<void> {
		return this.#require().users.changePassword(userId, currentPassword, newPassword);
	}

	async createUser(input: CreateUserInput): Promise<PublicUser> {
		return this.#require().users.createUser(input);
	}

	async getUser(userId: string): Promise<PublicUser | null> {
		return this.#require().users.getUser(userId);
	}

	async getActiveSubject(userId: string, organizationId: string): Promise<PublicUser | null> {
		return this.#require().users.getActiveSubject(userId, organizationId);
	}

	async assignRole(userId: string, roleId: string): Promise<PublicUser> {
		return this.#require().users.assignRole(userId, roleId);
	}

	async unassignRole(userId: string, roleId: string): Promise<PublicUser> {
		return this.#require().users.unassignRole(userId, roleId);
	}

	async deactivateUser(userId: string): Promise<void> {
		return this.#require().users.deactivateUser(userId);
	}

	async createOrganization(input: CreateOrganizationInput): Promise<Organization> {
		return this.#require().organizations.createOrganization(input);
	}

	async getOrganization(organizationId: string): Promise<Organization | null> {
		return this.#require().organizations.getOrganization(organizationId);
	}

	async deactivateOrganization(organizationId: string): Promise<void> {
		return this.#require().organizations.deactivateOrganization(organizationId);
	}

	async createRole(input: CreateRoleInput): Promise<Role> {
		return this.#require().roles.createRole(input);
	}

	async getRole(roleId: string): Promise<Role | null> {
		return this.#require().roles.getRole(roleId);
	}

	async listRoles(organizationId: string): Promise<Role[]> {
		return this.#require().roles.listRoles(organizationId);
	}

	async setRolePermissions(roleId: string, permissionCodes: string[]): Promise<Role> {
		return this.#require().roles.setRolePermissions(roleId, permissionCodes);
	}

	async setRoleIncludes(roleId: string, includes: string[]): Promise<Role> {
		return this.#require().roles.setRoleIncludes(roleId, includes);
	}

	async deleteRole(roleId: string): Promise<void> {
		return this.#require().roles.deleteRole(roleId);
	}

	async registerPermission(code: string, description: string): Promise<Permission> {
		return this.#require().permissions.registerPermission(code, description);
	}

	async listPermissions(): Promise<Permission[]> {
		return this.#require().permissions.listPermissions();
	}

	async deletePermission(code: string): Promise<void> {
		return this.#require().permissions.deletePermission(code);
	}

	async resolvePermissions(userId: string, organizationId: string): Promise<ReadonlySet<PermissionCode>> {
		return this.#require().resolver.resolve(userId, organizationId);
	}

	async resolveDetailed(userId: string, organizationId: string): Promise<ResolutionResult> {
		return this.#require().resolver.resolveDetailed(userId, organizationId);
	}

	async hasPermission(userId: string, organizationId: string, code: PermissionCode): Promise<boolean> {
		return this.#require().resolver.authorize(userId, organizationId, code);
	}
}

// Re-exportar tipos para facilitar uso
export type { User, PublicUser, Role, Organization, Permission } from "./domain/index.js";
export type { IIdentityManager, IntegrityWarning, ResolutionResult, CreateUserInput, CreateRoleInput, CreateOrganizationInput } from "./types.js";
export type { IdentityStore } from "./store/types.js";
export { MemoryIdentityStore } from "./store/memory.js";
export { MongoIdentityStore } from "./store/mongo.js";
export { SystemRole } from "./defaults/predefined.js";
export { WILDCARD, grants, isPermissionCode, type PermissionCode } from "./permissions.js";
export { scoped, assertScoped, ScopedRepository, type ScopeDecision, type TenantOwned, type TenantSource } from "./tenant-guard.js";
