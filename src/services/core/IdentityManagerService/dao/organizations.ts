import type { ILogger } from "../../../../interfaces/utils/ILogger.js";
import type { Organization } from "../domain/index.js";
import type { IdentityStore } from "../store/types.js";
import type { CreateOrganizationInput } from "../types.js";
import type { PermissionResolver } from "../domain/permissions.js";
import { generateId } from "../utils/crypto.js";
import { withStore } from "../../../../common/utils/store-guard.js";
import { IdentityError } from "../../../../common/types/custom-errors/IdentityError.js";

export class OrganizationManager {
	constructor(
		private readonly store: IdentityStore,
		private readonly resolver: PermissionResolver,
		private readonly logger: ILogger
	) {}

	/**
	 * Crea una organización activa
	 */
	async createOrganization(input: CreateOrganizationInput): Promise<Organization> {
		const name = input.name?.trim();
		if (!name) {
			throw new IdentityError(400, "MISSING_FIELDS", "El nombre de la organización es requerido");
		}

		return withStore(this.logger, "createOrganization", async () => {
			const now = new Date();
			const organization: Organization = {
				id: input.id ?? generateId(),
				name,
				isActive: true,
				createdAt: now,
				updatedAt: now,
			};

			await this.store.insertOrganization(organization);
			this.logger.logDebug(`Organización creada: ${organization.id}`);
			return organization;
		});
	}

	async getOrganization(organizationId: string): Promise<Organization | null> {
		return withStore(this.logger, "getOrganization", () => this.store.findOrganizationById(organizationId));
	}

	/**
	 * Obtiene una organización activa o falla con ORG_NOT_FOUND
	 */
	async requireActive(organizationId: string): Promise<Organization> {
		const organization = await this.getOrganization(organizationId);
		if (!organization) {
			throw new IdentityError(404, "ORG_NOT_FOUND", `Organización ${organizationId} no encontrada`);
		}
		if (!organization.isActive) {
			throw new IdentityError(404, "ORG_NOT_FOUND", `Organización ${organizationId} inactiva`);
		}
		return organization;
	}

	/**
	 * Desactiva la organización. Sus usuarios dejan de poder autenticarse.
	 */
	async deactivateOrganization(organizationId: string): Promise<void> {
		await withStore(this.logger, "deactivateOrganization", async () => {
			const updated = await this.store.updateOrganization(organizationId, { isActive: false, updatedAt: new Date() });
			if (!updated) {
				throw new IdentityError(404, "ORG_NOT_FOUND", `Organización ${organizationId} no encontrada`);
			}
		});
		this.resolver.invalidateAll();
		this.logger.logInfo(`Organización desactivada: ${organizationId}`);
	}
}
