import type { ILogger } from "../../../../interfaces/utils/ILogger.js";
import type { Permission } from "../domain/index.js";
import type { IdentityStore } from "../store/types.js";
import type { PermissionResolver } from "../domain/permissions.js";
import { isPermissionCode } from "../permissions.js";
import { withStore } from "../../../../common/utils/store-guard.js";
import { IdentityError } from "../../../../common/types/custom-errors/IdentityError.js";
import { PREDEFINED_PERMISSIONS } from "../defaults/predefined.js";

/**
 * Catálogo de permisos (`recurso:acción`)
 */
export class PermissionCatalog {
	constructor(
		private readonly store: IdentityStore,
		private readonly resolver: PermissionResolver,
		private readonly logger: ILogger
	) {}

	/**
	 * Registra los permisos predefinidos que todavía no existan
	 */
	async initializePredefinedPermissions(): Promise<void> {
		await withStore(this.logger, "initializePredefinedPermissions", async () => {
			const existing = new Set((await this.store.findPermissionsByCodes(PREDEFINED_PERMISSIONS.map((p) => p.code))).map((p) => p.code));
			for (const { code, description } of PREDEFINED_PERMISSIONS) {
				if (existing.has(code)) continue;
				await this.store.insertPermission({ code, description, createdAt: new Date() });
				this.logger.logDebug(`Permiso predefinido registrado: ${code}`);
			}
		});
	}

	async registerPermission(code: string, description: string): Promise<Permission> {
		if (!isPermissionCode(code)) {
			throw new IdentityError(400, "INVALID_PERMISSION_CODE", `Código de permiso inválido: "${code}" (formato: recurso:acción)`);
		}

		const permission: Permission = { code, description: description.trim(), createdAt: new Date() };
		await withStore(this.logger, "registerPermission", () => this.store.insertPermission(permission));
		this.resolver.invalidateAll();
		this.logger.logDebug(`Permiso registrado: ${code}`);
		return permission;
	}

	async listPermissions(): Promise<Permission[]> {
		return withStore(this.logger, "listPermissions", () => this.store.listPermissions());
	}

	/**
	 * Verifica que todos los códigos existan en el catálogo
	 */
	async requireExisting(codes: readonly string[]): Promise<void> {
		const unique = [...new Set(codes)];
		const found = await withStore(this.logger, "findPermissionsByCodes", () => this.store.findPermissionsByCodes(unique));
		const known = new Set(found.map((p) => p.code));
		const missing = unique.filter((code) => !known.has(code));
		if (missing.length > 0) {
			throw new IdentityError(404, "PERMISSION_NOT_FOUND", `Permisos inexistentes: ${missing.join(", ")}`, { codes: missing });
		}
	}

	/**
	 * Elimina un permiso. Un permiso referenciado por algún rol es inmutable.
	 */
	async deletePermission(code: string): Promise<void> {
		await withStore(this.logger, "deletePermission", async () => {
			const inUse = await this.store.countRolesWithPermission(code);
			if (inUse > 0) {
				throw new IdentityError(409, "PERMISSION_IN_USE", `El permiso ${code} está asignado a ${inUse} rol(es)`, { roles: inUse });
			}
			const deleted = await this.store.deletePermission(code);
			if (!deleted) {
				throw new IdentityError(404, "PERMISSION_NOT_FOUND", `Permiso ${code} no encontrado`);
			}
		});
		this.resolver.invalidateAll();
	}
}
