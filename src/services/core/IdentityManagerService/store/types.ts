import type { Organization, Permission, Role, User } from "../domain/index.js";

export type UserPatch = Partial<Omit<User, "id" | "createdAt">>;
export type RolePatch = Partial<Omit<Role, "id" | "organizationId" | "isPredefined" | "createdAt">>;
export type OrganizationPatch = Partial<Omit<Organization, "id" | "createdAt">>;

/**
 * Puerto de persistencia del núcleo de identidad.
 *
 * Las lecturas devuelven copias: modificar un objeto devuelto no afecta al
 * almacenamiento. Las escrituras de un documento son atómicas (un lector ve la
 * versión anterior o la nueva, nunca una mezcla). Las violaciones de unicidad
 * se reportan como IdentityError (EMAIL_EXISTS, ROLE_NAME_EXISTS, PERMISSION_EXISTS).
 */
export interface IdentityStore {
	// Users
	findUserById(id: string): Promise<User | null>;
	/** `email` ya normalizado */
	findUserByEmail(email: string): Promise<User | null>;
	insertUser(user: User): Promise<void>;
	updateUser(id: string, patch: UserPatch): Promise<User | null>;
	/** Agrega un rol al usuario en una sola escritura (idempotente) */
	addUserRole(userId: string, roleId: string): Promise<User | null>;
	/** Quita un rol del usuario en una sola escritura (idempotente) */
	removeUserRole(userId: string, roleId: string): Promise<User | null>;
	/** Quita un rol de todos los usuarios que lo tengan asignado */
	removeRoleFromUsers(roleId: string): Promise<number>;

	// Organizations
	findOrganizationById(id: string): Promise<Organization | null>;
	insertOrganization(organization: Organization): Promise<void>;
	updateOrganization(id: string, patch: OrganizationPatch): Promise<Organization | null>;

	// Roles
	findRoleById(id: string): Promise<Role | null>;
	findRolesByIds(ids: readonly string[]): Promise<Role[]>;
	/** `organizationId = null` busca entre los roles globales */
	findRoleByName(name: string, organizationId: string | null): Promise<Role | null>;
	/** Roles globales más los propios de la organización */
	findVisibleRoles(organizationId: string): Promise<Role[]>;
	findDefaultRoles(organizationId: string): Promise<Role[]>;
	/** Roles que listan `roleId` en sus `includes` */
	findRolesIncluding(roleId: string): Promise<Role[]>;
	insertRole(role: Role): Promise<void>;
	updateRole(id: string, patch: RolePatch): Promise<Role | null>;
	deleteRole(id: string): Promise<boolean>;
	countRolesWithPermission(code: string): Promise<number>;

	// Permissions
	findPermissionsByCodes(codes: readonly string[]): Promise<Permission[]>;
	listPermissions(): Promise<Permission[]>;
	insertPermission(permission: Permission): Promise<void>;
	deletePermission(code: string): Promise<boolean>;
}
