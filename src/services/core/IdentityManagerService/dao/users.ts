import type { ILogger } from "../../../../interfaces/utils/ILogger.js";
import { type PublicUser, type User, normalizeEmail, toPublicUser } from "../domain/user.js";
import { isRoleVisibleTo } from "../domain/role.js";
import type { IdentityStore } from "../store/types.js";
import type { CreateUserInput } from "../types.js";
import type { PermissionResolver } from "../domain/permissions.js";
import type { OrganizationManager } from "./organizations.js";
import type { RoleManager } from "./roles.js";
import { generateId, hashPassword, verifyPassword } from "../utils/crypto.js";
import { withStore } from "../../../../common/utils/store-guard.js";
import { AuthError } from "../../../../common/types/custom-errors/AuthError.js";
import { IdentityError } from "../../../../common/types/custom-errors/IdentityError.js";

export interface UserManagerOptions {
	passwordMinLength: number;
}

export class UserManager {
	constructor(
		private readonly store: IdentityStore,
		private readonly organizations: OrganizationManager,
		private readonly roles: RoleManager,
		private readonly resolver: PermissionResolver,
		private readonly logger: ILogger,
		private readonly options: UserManagerOptions
	) {}

	/**
	 * Autentica un usuario con email y password.
	 * Siempre deriva el hash (contra uno de relleno si el email no existe) y
	 * solo después mira los flags de actividad.
	 */
	async authenticate(email: string, password: string): Promise<PublicUser | null> {
		return withStore(this.logger, "authenticate", async () => {
			const user = await this.store.findUserByEmail(normalizeEmail(email));
			const valid = await verifyPassword(password, user?.passwordHash ?? null);
			if (!user || !valid) return null;

			if (!user.isActive) {
				this.logger.logDebug(`Login rechazado: usuario inactivo ${user.id}`);
				return null;
			}

			const organization = await this.store.findOrganizationById(user.organizationId);
			if (!organization?.isActive) {
				this.logger.logDebug(`Login rechazado: organización inactiva ${user.organizationId}`);
				return null;
			}

			return toPublicUser(user);
		});
	}

	async recordLogin(userId: string): Promise<void> {
		const now = new Date();
		await withStore(this.logger, "recordLogin", () => this.store.updateUser(userId, { lastLoginAt: now }));
	}

	/**
	 * Crea un nuevo usuario en una organización activa
	 */
	async createUser(input: CreateUserInput): Promise<PublicUser> {
		const email = normalizeEmail(input.email ?? "");
		if (!email || !input.password || !input.organizationId) {
			throw new IdentityError(400, "MISSING_FIELDS", "email, password y organizationId son requeridos");
		}
		this.#requireStrength(input.password);

		await this.organizations.requireActive(input.organizationId);
		const roleIds = input.roleIds
			? await this.#requireAssignable(input.roleIds, input.organizationId)
			: (await this.roles.getDefaultRoles(input.organizationId)).map((role) => role.id);

		const passwordHash = await hashPassword(input.password);

		return withStore(this.logger, "createUser", async () => {
			if (await this.store.findUserByEmail(email)) {
				throw new IdentityError(409, "EMAIL_EXISTS", `El email ${email} ya está registrado`);
			}

			const now = new Date();
			const user: User = {
				id: generateId(),
				email,
				passwordHash,
				organizationId: input.organizationId,
				roleIds,
				isActive: true,
				createdAt: now,
				updatedAt: now,
			};

			await this.store.insertUser(user);
			this.logger.logDebug(`Usuario creado: ${user.id} (${user.organizationId})`);
			return toPublicUser(user);
		});
	}

	/**
	 * Obtiene un usuario por ID
	 */
	async getUser(userId: string): Promise<PublicUser | null> {
		const user = await withStore(this.logger, "getUser", () => this.store.findUserById(userId));
		return user ? toPublicUser(user) : null;
	}

	/**
	 * Usuario activo, perteneciente a la organización indicada y con la
	 * organización activa. Cualquier otra situación devuelve null.
	 */
	async getActiveSubject(userId: string, organizationId: string): Promise<PublicUser | null> {
		return withStore(this.logger, "getActiveSubject", async () => {
			const user = await this.store.findUserById(userId);
			if (!user?.isActive || user.organizationId !== organizationId) return null;

			const organization = await this.store.findOrganizationById(organizationId);
			if (!organization?.isActive) return null;

			return toPublicUser(user);
		});
	}

	/**
	 * Asignaciones concurrentes no se pisan: el store agrega o quita un único
	 * elemento por escritura.
	 */
	async assignRole(userId: string, roleId: string): Promise<PublicUser> {
		const user = await this.#requireUser(userId);
		await this.#requireAssignable([roleId], user.organizationId);

		return this.#updateRoles(userId, () => this.store.addUserRole(userId, roleId));
	}

	async unassignRole(userId: string, roleId: string): Promise<PublicUser> {
		await this.#requireUser(userId);
		return this.#updateRoles(userId, () => this.store.removeUserRole(userId, roleId));
	}

	/**
	 * Desactiva un usuario. Es terminal: no hay reactivación.
	 */
	async deactivateUser(userId: string): Promise<void> {
		await this.#requireUser(userId);
		await withStore(this.logger, "deactivateUser", () => this.store.updateUser(userId, { isActive: false, updatedAt: new Date() }));
		this.resolver.invalidateUser(userId);
		this.logger.logInfo(`Usuario desactivado: ${userId}`);
	}

	/**
	 * Cambia el password verificando el actual
	 */
	async changePassword(userId: string, currentPassword: string, newPassword: string): Promise<void> {
		const user = await withStore(this.logger, "changePassword", () => this.store.findUserById(userId));
		if (!user?.isActive) {
			throw new AuthError(401, "SUBJECT_UNAVAILABLE", "Usuario no disponible", { subjectId: userId });
		}

		const valid = await verifyPassword(currentPassword, user.passwordHash);
		if (!valid) {
			throw new AuthError(401, "INVALID_CREDENTIALS", "Credenciales inválidas");
		}
		this.#requireStrength(newPassword);

		const passwordHash = await hashPassword(newPassword);
		await withStore(this.logger, "changePassword", () => this.store.updateUser(userId, { passwordHash, updatedAt: new Date() }));
		this.logger.logInfo(`Password actualizado: ${userId}`);
	}

	#requireStrength(password: string): void {
		if (password.length < this.options.passwordMinLength) {
			throw new AuthError(400, "WEAK_PASSWORD", `El password debe tener al menos ${this.options.passwordMinLength} caracteres`);
		}
	}

	async #requireUser(userId: string): Promise<User> {
		const user = await withStore(this.logger, "getUser", () => this.store.findUserById(userId));
		if (!user) {
			throw new IdentityError(404, "USER_NOT_FOUND", `Usuario ${userId} no encontrado`);
		}
		return user;
	}

	/**
	 * Todos los roles deben existir y ser visibles para la organización
	 */
	async #requireAssignable(roleIds: readonly string[], organizationId: string): Promise<string[]> {
		const unique = [...new Set(roleIds)];
		for (const roleId of unique) {
			const role = await this.roles.requireRole(roleId);
			if (!isRoleVisibleTo(role, organizationId)) {
				throw new IdentityError(403, "CROSS_ORG_ROLE", `El rol ${role.name} pertenece a otra organización`, { roleId });
			}
		}
		return unique;
	}

	async #updateRoles(userId: string, write: () => Promise<User | null>): Promise<PublicUser> {
		const updated = await withStore(this.logger, "updateUserRoles", write);
		if (!updated) {
			throw new IdentityError(404, "USER_NOT_FOUND", `Usuario ${userId} no encontrado`);
		}

		this.resolver.invalidateUser(userId);
		return toPublicUser(updated);
	}
}
