import { WILDCARD } from "../permissions.js";

export enum SystemRole {
	ADMIN = "Admin",
	EDITOR = "Editor",
	VIEWER = "Viewer",
}

export const PREDEFINED_PERMISSIONS: ReadonlyArray<{ code: string; description: string }> = [
	{ code: WILDCARD, description: "Acceso total" },
	{ code: "doc:read", description: "Leer documentos" },
	{ code: "doc:write", description: "Crear y editar documentos" },
	{ code: "doc:delete", description: "Eliminar documentos" },
	{ code: "user:read", description: "Ver usuarios" },
	{ code: "user:write", description: "Gestionar usuarios" },
	{ code: "role:read", description: "Ver roles" },
	{ code: "role:write", description: "Gestionar roles" },
	{ code: "org:read", description: "Ver la organización" },
	{ code: "org:write", description: "Gestionar la organización" },
];

/**
 * Roles globales sembrados al iniciar. Admin es un rol común con el comodín.
 */
export const PREDEFINED_ROLES: ReadonlyArray<{ name: SystemRole; description: string; permissionCodes: string[]; isDefault: boolean }> = [
	{
		name: SystemRole.ADMIN,
		description: "Administrador de la organización",
		permissionCodes: [WILDCARD],
		isDefault: false,
	},
	{
		name: SystemRole.EDITOR,
		description: "Lectura y edición de documentos",
		permissionCodes: ["doc:read", "doc:write"],
		isDefault: false,
	},
	{
		name: SystemRole.VIEWER,
		description: "Solo lectura de documentos",
		permissionCodes: ["doc:read"],
		isDefault: true,
	},
];
