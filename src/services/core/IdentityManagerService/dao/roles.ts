import type { ILogger } from "../../../../interfaces/utils/ILogger.js";
import type { Role } from "../domain/index.js";
import { isRoleVisibleTo } from "../domain/role.js";
import type { IdentityStore } from "../store/types.js";
import type { CreateRoleInput } from "../types.js";
import type { PermissionResolver } from "../domain/permissions.js";
import type { PermissionCatalog } from "./permissions.js";
import type { OrganizationManager } from "./organizations.js";
import { generateId } from "../utils/crypto.js";
import { withStore } from "../../../../common/utils/store-guard.js";
import { IdentityError } from "../../../../common/types/custom-errors/IdentityError.js";
import { PREDEFINED_ROLES } from "../defaults/predefined.js";

export class RoleManager {
	constructor(
		private readonly store: IdentityStore,
		private readonly catalog: PermissionCatalog,
		private readonly organizations: OrganizationManager,
		private readonly resolver: PermissionResolver,
		private readonly logger: ILogger
	) {}

	/**
	 * Inicializa roles predefinidos del sistema (globales)
	 */
	async initializePredefinedRoles(): Promise<void> {
		await withStore(this.logger, "initializePredefinedRoles", async () => {
			for (const roleData of PREDEFINED_ROLES) {
				const existing = await this.store.findRoleByName(roleData.name, null);
				if (!existing) {
					const now = new Date();
					await this.store.insertRole({
						id: generateId(),
						name: roleData.name,
						description: roleData.description,
						organizationId: null,
						permissionCodes: [...roleData.permissionCodes],
						includes: [],
						isDefault: roleData.isDefault,
						isPredefined: true,
						crossTenant: false,
						createdAt: now,
						updatedAt: now,
					});
				}
				this.logger.logDebug(`Rol predefinido disponible: ${roleData.name}`);
			}
		});
	}

	/**
	 * Crea un rol global (`organizationId = null`) o propio de una organización
	 */
	async createRole(input: CreateRoleInput): Promise<Role> {
		const name = input.name?.trim();
		if (!name) {
			throw new IdentityError(400, "MISSING_FIELDS", "El nombre del rol es requerido");
		}
		if (input.crossTenant && input.organizationId !== null) {
			throw new IdentityError(400, "INVALID_CROSS_TENANT_ROLE", "Solo un rol global puede ser cross-tenant");
		}
		if (input.organizationId !== null) {
			await this.organizations.requireActive(input.organizationId);
		}

		const permissionCodes = [...new Set(input.permissionCodes)];
		await this.catalog.requireExisting(permissionCodes);

		const includes = [...new Set(input.includes ?? [])];
		await this.#requireIncludable(includes, input.organizationId);

		return withStore(this.logger, "createRole", async () => {
			if (await this.store.findRoleByName(name, input.organizationId)) {
				throw new IdentityError(409, "ROLE_NAME_EXISTS", `Ya existe un rol ${name} en ese alcance`);
			}

			const now = new Date();
			const role: Role = {
				id: generateId(),
				name,
				description: input.description?.trim() ?? "",
				organizationId: input.organizationId,
				permissionCodes,
				includes,
				isDefault: input.isDefault ?? false,
				isPredefined: false,
				crossTenant: input.crossTenant ?? false,
				createdAt: now,
				updatedAt: now,
			};

			await this.store.insertRole(role);
			this.logger.logDebug(`Rol creado: ${name} (${input.organizationId ?? "global"})`);
			return role;
		});
	}

	async getRole(roleId: string): Promise<Role | null> {
		return withStore(this.logger, "getRole", () => this.store.findRoleById(roleId));
	}

	async requireRole(roleId: string): Promise<Role> {
		const role = await this.getRole(roleId);
		if (!role) {
			throw new IdentityError(404, "ROLE_NOT_FOUND", `Rol ${roleId} no encontrado`);
		}
		return role;
	}

	/**
	 * Roles globales más los propios de la organización
	 */
	async listRoles(organizationId: string): Promise<Role[]> {
		return withStore(this.logger, "listRoles", () => this.store.findVisibleRoles(organizationId));
	}

	async getDefaultRoles(organizationId: string): Promise<Role[]> {
		return withStore(this.logger, "getDefaultRoles", () => this.store.findDefaultRoles(organizationId));
	}

	/**
	 * Reemplaza el conjunto de permisos del rol en una sola escritura
	 */
	async setRolePermissions(roleId: string, permissionCodes: string[]): Promise<Role> {
		await this.requireRole(roleId);
		const codes = [...new Set(permissionCodes)];
		await this.catalog.requireExisting(codes);

		const updated = await withStore(this.logger, "setRolePermissions", () =>
			this.store.updateRole(roleId, { permissionCodes: codes, updatedAt: new Date() })
		);
		if (!updated) {
			throw new IdentityError(404, "ROLE_NOT_FOUND", `Rol ${roleId} no encontrado`);
		}

		this.resolver.invalidateRole(roleId);
		this.logger.logDebug(`Permisos del rol ${roleId} actualizados (${codes.length})`);
		return updated;
	}

	/**
	 * Reemplaza los roles incluidos. Rechaza inclusiones que cierren un ciclo.
	 */
	async setRoleIncludes(roleId: string, includes: string[]): Promise<Role> {
		const role = await this.requireRole(roleId);
		const unique = [...new Set(includes)];
		await this.#requireIncludable(unique, role.organizationId);

		if (unique.includes(roleId) || (await this.#reaches(unique, roleId))) {
			throw new IdentityError(409, "ROLE_CYCLE", `Incluir esos roles en ${role.name} generaría un ciclo`, { roleId });
		}

		const updated = await withStore(this.logger, "setRoleIncludes", () =>
			this.store.updateRole(roleId, { includes: unique, updatedAt: new Date() })
		);
		if (!updated) {
			throw new IdentityError(404, "ROLE_NOT_FOUND", `Rol ${roleId} no encontrado`);
		}

		this.resolver.invalidateRole(roleId);
		return updated;
	}

	/**
	 * Elimina un rol personalizado y lo quita de usuarios y de otros roles
	 */
	async deleteRole(roleId: string): Promise<void> {
		const role = await this.requireRole(roleId);
		if (role.isPredefined) {
			throw new IdentityError(403, "CANNOT_DELETE_PREDEFINED", `No se puede eliminar el rol predefinido ${role.name}`);
		}

		await withStore(this.logger, "deleteRole", async () => {
			const unassigned = await this.store.removeRoleFromUsers(roleId);
			for (const parent of await this.store.findRolesIncluding(roleId)) {
				await this.store.updateRole(parent.id, {
					includes: parent.includes.filter((id) => id !== roleId),
					updatedAt: new Date(),
				});
			}
			await this.store.deleteRole(roleId);
			this.logger.logDebug(`Rol eliminado: ${role.name} (desasignado de ${unassigned} usuario(s))`);
		});

		this.resolver.invalidateRole(roleId);
	}

	/**
	 * Un rol puede incluir roles globales; uno de organización además los propios
	 */
	async #requireIncludable(roleIds: readonly string[], organizationId: string | null): Promise<void> {
		if (roleIds.length === 0) return;

		const found = await withStore(this.logger, "findRolesByIds", () => this.store.findRolesByIds(roleIds));
		const byId = new Map(found.map((role) => [role.id, role]));

		for (const id of roleIds) {
			const included = byId.get(id);
			if (!included) {
				throw new IdentityError(404, "ROLE_NOT_FOUND", `Rol ${id} no encontrado`);
			}
			const allowed = organizationId === null ? included.organizationId === null : isRoleVisibleTo(included, organizationId);
			if (!allowed) {
				throw new IdentityError(403, "CROSS_ORG_ROLE", `El rol ${included.name} no es visible en ese alcance`, { roleId: id });
			}
		}
	}

	/**
	 * ¿Alguno de `from` alcanza `target` siguiendo `includes`?
	 */
	async #reaches(from: readonly string[], target: string): Promise<boolean> {
		const seen = new Set<string>();
		let frontier = [...from];

		while (frontier.length > 0) {
			for (const id of frontier) seen.add(id);
			const roles = await withStore(this.logger, "findRolesByIds", () => this.store.findRolesByIds(frontier));

			const next: string[] = [];
			for (const role of roles) {
				for (const included of role.includes) {
					if (included === target) return true;
					if (!seen.has(included)) next.push(included);
				}
			}
			frontier = [...new Set(next)];
		}
		return false;
	}
}
