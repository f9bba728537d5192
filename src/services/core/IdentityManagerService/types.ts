import type { Organization, Permission, PublicUser, Role } from "./domain/index.js";
import type { PermissionCode } from "./permissions.js";

/**
 * Inconsistencia detectada al resolver permisos. No es fatal: el elemento se
 * ignora y la advertencia se registra.
 */
export type IntegrityWarning =
	| { kind: "UNKNOWN_ROLE"; roleId: string }
	| { kind: "ROLE_NOT_VISIBLE"; roleId: string; roleOrganizationId: string | null }
	| { kind: "ROLE_CYCLE"; roleId: string; includedBy: string }
	| { kind: "UNKNOWN_PERMISSION"; roleId: string; code: string };

export interface ResolutionResult {
	readonly permissions: ReadonlySet<PermissionCode>;
	/** Algún rol global aceptado levanta la barrera de tenant */
	readonly crossTenant: boolean;
	readonly warnings: readonly IntegrityWarning[];
}

export interface CreateOrganizationInput {
	name: string;
	id?: string;
}

export interface CreateUserInput {
	email: string;
	password: string;
	organizationId: string;
	/** Si se omite se asignan los roles por defecto visibles para la organización */
	roleIds?: string[];
}

export interface CreateRoleInput {
	name: string;
	description?: string;
	/** null = rol global */
	organizationId: string | null;
	permissionCodes: string[];
	includes?: string[];
	isDefault?: boolean;
	crossTenant?: boolean;
}

/**
 * Interfaz del servicio de IdentityManager
 */
export interface IIdentityManager {
	// ── Credenciales ──────────────────────────────────────────────────────────
	/**
	 * Verifica email y password. Devuelve null ante cualquier fallo (usuario
	 * desconocido, password incorrecto, usuario u organización inactivos).
	 */
	verifyCredentials(email: string, password: string): Promise<PublicUser | null>;
	recordLogin(userId: string): Promise<void>;
	changePassword(userId: string, currentPassword: string, newPassword: string): Promise<void>;

	// ── Usuarios ──────────────────────────────────────────────────────────────
	createUser(input: CreateUserInput): Promise<PublicUser>;
	getUser(userId: string): Promise<PublicUser | null>;
	/** Usuario activo, de esa organización y con la organización activa */
	getActiveSubject(userId: string, organizationId: string): Promise<PublicUser | null>;
	assignRole(userId: string, roleId: string): Promise<PublicUser>;
	unassignRole(userId: string, roleId: string): Promise<PublicUser>;
	deactivateUser(userId: string): Promise<void>;

	// ── Organizaciones ────────────────────────────────────────────────────────
	createOrganization(input: CreateOrganizationInput): Promise<Organization>;
	getOrganization(organizationId: string): Promise<Organization | null>;
	deactivateOrganization(organizationId: string): Promise<void>;

	// ── Roles ─────────────────────────────────────────────────────────────────
	createRole(input: CreateRoleInput): Promise<Role>;
	getRole(roleId: string): Promise<Role | null>;
	listRoles(organizationId: string): Promise<Role[]>;
	setRolePermissions(roleId: string, permissionCodes: string[]): Promise<Role>;
	setRoleIncludes(roleId: string, includes: string[]): Promise<Role>;
	deleteRole(roleId: string): Promise<void>;

	// ── Permisos ──────────────────────────────────────────────────────────────
	registerPermission(code: string, description: string): Promise<Permission>;
	listPermissions(): Promise<Permission[]>;
	deletePermission(code: string): Promise<void>;

	// ── Resolución ────────────────────────────────────────────────────────────
	resolvePermissions(userId: string, organizationId: string): Promise<ReadonlySet<PermissionCode>>;
	resolveDetailed(userId: string, organizationId: string): Promise<ResolutionResult>;
	hasPermission(userId: string, organizationId: string, code: PermissionCode): Promise<boolean>;
}
