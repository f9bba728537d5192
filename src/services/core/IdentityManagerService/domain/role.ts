import { Schema } from "mongoose";

/**
 * Definición de rol.
 *
 * `organizationId = null` indica un rol global, visible para todas las
 * organizaciones. El nombre es único dentro de su alcance (global o por org).
 */
export interface Role {
	id: string;
	name: string;
	description: string;
	organizationId: string | null;
	permissionCodes: string[];
	/** Roles incluidos (cierre transitivo al resolver) */
	includes: string[];
	/** Se asigna a usuarios nuevos cuando no se indican roles */
	isDefault: boolean;
	/** Roles sembrados al iniciar; no se pueden eliminar */
	isPredefined: boolean;
	/** Solo válido en roles globales: levanta la barrera de tenant */
	crossTenant: boolean;
	createdAt: Date;
	updatedAt: Date;
}

/**
 * Un rol es visible para una organización si es global o le pertenece
 */
export function isRoleVisibleTo(role: Pick<Role, "organizationId">, organizationId: string): boolean {
	return role.organizationId === null || role.organizationId === organizationId;
}

export const roleSchema = new Schema<Role>(
	{
		id: { type: String, required: true, unique: true },
		name: { type: String, required: true },
		description: { type: String, default: "" },
		organizationId: { type: String, default: null },
		permissionCodes: { type: [String], default: [], index: true },
		includes: { type: [String], default: [] },
		isDefault: { type: Boolean, default: false },
		isPredefined: { type: Boolean, default: false },
		crossTenant: { type: Boolean, default: false },
		createdAt: { type: Date, default: Date.now },
		updatedAt: { type: Date, default: Date.now },
	},
	{ id: false }
);

// Unicidad por alcance: (name, null) para globales, (name, orgId) por tenant
roleSchema.index({ name: 1, organizationId: 1 }, { unique: true });
