import type { Organization, Permission, Role, User } from "../domain/index.js";
import { isRoleVisibleTo } from "../domain/role.js";
import { IdentityError } from "../../../../common/types/custom-errors/IdentityError.js";
import type { IdentityStore, OrganizationPatch, RolePatch, UserPatch } from "./types.js";

/**
 * IdentityStore en memoria.
 *
 * Guarda snapshots (structuredClone) al escribir y devuelve copias al leer, por
 * lo que un rol reemplazado nunca se observa a medio actualizar.
 */
export class MemoryIdentityStore implements IdentityStore {
	readonly #users = new Map<string, User>();
	readonly #organizations = new Map<string, Organization>();
	readonly #roles = new Map<string, Role>();
	readonly #permissions = new Map<string, Permission>();

	// ─────────────────────────────────────────────────────────────────────────────
	// Users
	// ─────────────────────────────────────────────────────────────────────────────

	async findUserById(id: string): Promise<User | null> {
		return copy(this.#users.get(id));
	}

	async findUserByEmail(email: string): Promise<User | null> {
		for (const user of this.#users.values()) {
			if (user.email === email) return copy(user);
		}
		return null;
	}

	async insertUser(user: User): Promise<void> {
		for (const existing of this.#users.values()) {
			if (existing.email === user.email) {
				throw new IdentityError(409, "EMAIL_EXISTS", `El email ${user.email} ya está registrado`);
			}
		}
		this.#users.set(user.id, structuredClone(user));
	}

	async updateUser(id: string, patch: UserPatch): Promise<User | null> {
		const current = this.#users.get(id);
		if (!current) return null;

		const next: User = structuredClone({ ...current, ...patch });
		this.#users.set(id, next);
		return structuredClone(next);
	}

	async addUserRole(userId: string, roleId: string): Promise<User | null> {
		const current = this.#users.get(userId);
		if (!current) return null;
		if (current.roleIds.includes(roleId)) return structuredClone(current);

		return this.#replaceUser({ ...current, roleIds: [...current.roleIds, roleId], updatedAt: new Date() });
	}

	async removeUserRole(userId: string, roleId: string): Promise<User | null> {
		const current = this.#users.get(userId);
		if (!current) return null;
		if (!current.roleIds.includes(roleId)) return structuredClone(current);

		return this.#replaceUser({ ...current, roleIds: current.roleIds.filter((id) => id !== roleId), updatedAt: new Date() });
	}

	// Lectura y escritura sin await entre medio
	#replaceUser(user: User): User {
		const next = structuredClone(user);
		this.#users.set(user.id, next);
		return structuredClone(next);
	}

	async removeRoleFromUsers(roleId: string): Promise<number> {
		let modified = 0;
		for (const [id, user] of this.#users) {
			if (!user.roleIds.includes(roleId)) continue;
			this.#users.set(id, { ...user, roleIds: user.roleIds.filter((r) => r !== roleId), updatedAt: new Date() });
			modified++;
		}
		return modified;
	}

	// ─────────────────────────────────────────────────────────────────────────────
	// Organizations
	// ─────────────────────────────────────────────────────────────────────────────

	async findOrganizationById(id: string): Promise<Organization | null> {
		return copy(this.#organizations.get(id));
	}

	async insertOrganization(organization: Organization): Promise<void> {
		this.#organizations.set(organization.id, structuredClone(organization));
	}

	async updateOrganization(id: string, patch: OrganizationPatch): Promise<Organization | null> {
		const current = this.#organizations.get(id);
		if (!current) return null;

		const next: Organization = structuredClone({ ...current, ...patch });
		this.#organizations.set(id, next);
		return structuredClone(next);
	}

	// ─────────────────────────────────────────────────────────────────────────────
	// Roles
	// ─────────────────────────────────────────────────────────────────────────────

	async findRoleById(id: string): Promise<Role | null> {
		return copy(this.#roles.get(id));
	}

	async findRolesByIds(ids: readonly string[]): Promise<Role[]> {
		const result: Role[] = [];
		for (const id of new Set(ids)) {
			const role = this.#roles.get(id);
			if (role) result.push(structuredClone(role));
		}
		return result;
	}

	async findRoleByName(name: string, organizationId: string | null): Promise<Role | null> {
		for (const role of this.#roles.values()) {
			if (role.name === name && role.organizationId === organizationId) return structuredClone(role);
		}
		return null;
	}

	async findVisibleRoles(organizationId: string): Promise<Role[]> {
		return [...this.#roles.values()].filter((role) => isRoleVisibleTo(role, organizationId)).map((role) => structuredClone(role));
	}

	async findDefaultRoles(organizationId: string): Promise<Role[]> {
		return (await this.findVisibleRoles(organizationId)).filter((role) => role.isDefault);
	}

	async findRolesIncluding(roleId: string): Promise<Role[]> {
		return [...this.#roles.values()].filter((role) => role.includes.includes(roleId)).map((role) => structuredClone(role));
	}

	async insertRole(role: Role): Promise<void> {
		if (await this.findRoleByName(role.name, role.organizationId)) {
			throw new IdentityError(409, "ROLE_NAME_EXISTS", `Ya existe un rol ${role.name} en ese alcance`);
		}
		this.#roles.set(role.id, structuredClone(role));
	}

	async updateRole(id: string, patch: RolePatch): Promise<Role | null> {
		const current = this.#roles.get(id);
		if (!current) return null;

		if (patch.name !== undefined && patch.name !== current.name) {
			const clash = await this.findRoleByName(patch.name, current.organizationId);
			if (clash) {
				throw new IdentityError(409, "ROLE_NAME_EXISTS", `Ya existe un rol ${patch.name} en ese alcance`);
			}
		}

		const next: Role = structuredClone({ ...current, ...patch });
		this.#roles.set(id, next);
		return structuredClone(next);
	}

	async deleteRole(id: string): Promise<boolean> {
		return this.#roles.delete(id);
	}

	async countRolesWithPermission(code: string): Promise<number> {
		let count = 0;
		for (const role of this.#roles.values()) {
			if (role.permissionCodes.includes(code)) count++;
		}
		return count;
	}

	// ─────────────────────────────────────────────────────────────────────────────
	// Permissions
	// ─────────────────────────────────────────────────────────────────────────────

	async findPermissionsByCodes(codes: readonly string[]): Promise<Permission[]> {
		const result: Permission[] = [];
		for (const code of new Set(codes)) {
			const permission = this.#permissions.get(code);
			if (permission) result.push(structuredClone(permission));
		}
		return result;
	}

	async listPermissions(): Promise<Permission[]> {
		return [...this.#permissions.values()].sort((a, b) => a.code.localeCompare(b.code)).map((p) => structuredClone(p));
	}

	async insertPermission(permission: Permission): Promise<void> {
		if (this.#permissions.has(permission.code)) {
			throw new IdentityError(409, "PERMISSION_EXISTS", `El permiso ${permission.code} ya existe`);
		}
		this.#permissions.set(permission.code, structuredClone(permission));
	}

	async deletePermission(code: string): Promise<boolean> {
		return this.#permissions.delete(code);
	}
}

function copy<T>(value: T | undefined): T | null {
	return value === undefined ? null : structuredClone(value);
}
