import { mongo, type Model } from "mongoose";
import type { IMongoProvider } from "../../../../providers/object/mongo/index.js";
import {
	type Organization,
	type Permission,
	type Role,
	type User,
	organizationSchema,
	permissionSchema,
	roleSchema,
	userSchema,
} from "../domain/index.js";
import { IdentityError } from "../../../../common/types/custom-errors/IdentityError.js";
import type { IdentityStore, OrganizationPatch, RolePatch, UserPatch } from "./types.js";

/** Proyección que excluye los campos internos de Mongo */
const PUBLIC_FIELDS = "-_id -__v";

function isDuplicateKeyError(error: unknown): boolean {
	return error instanceof mongo.MongoServerError && error.code === 11000;
}

/**
 * IdentityStore sobre MongoDB (mongoose).
 *
 * Cada reemplazo de rol es un único `findOneAndUpdate`, atómico a nivel de
 * documento. Los índices únicos del esquema resuelven las carreras de alta.
 */
export class MongoIdentityStore implements IdentityStore {
	readonly #users: Model<User>;
	readonly #organizations: Model<Organization>;
	readonly #roles: Model<Role>;
	readonly #permissions: Model<Permission>;

	constructor(mongoProvider: IMongoProvider) {
		this.#users = mongoProvider.createModel<User>("User", userSchema);
		this.#organizations = mongoProvider.createModel<Organization>("Organization", organizationSchema);
		this.#roles = mongoProvider.createModel<Role>("Role", roleSchema);
		this.#permissions = mongoProvider.createModel<Permission>("Permission", permissionSchema);
	}

	/**
	 * Crea los índices declarados en los esquemas
	 */
	async syncIndexes(): Promise<void> {
		await Promise.all([this.#users.init(), this.#organizations.init(), this.#roles.init(), this.#permissions.init()]);
	}

	// ─────────────────────────────────────────────────────────────────────────────
	// Users
	// ─────────────────────────────────────────────────────────────────────────────

	async findUserById(id: string): Promise<User | null> {
		return this.#users.findOne({ id }).select(PUBLIC_FIELDS).lean<User>().exec();
	}

	async findUserByEmail(email: string): Promise<User | null> {
		return this.#users.findOne({ email }).select(PUBLIC_FIELDS).lean<User>().exec();
	}

	async insertUser(user: User): Promise<void> {
		try {
			await this.#users.create(user);
		} catch (error) {
			if (isDuplicateKeyError(error)) {
				throw new IdentityError(409, "EMAIL_EXISTS", `El email ${user.email} ya está registrado`);
			}
			throw error;
		}
	}

	async updateUser(id: string, patch: UserPatch): Promise<User | null> {
		return this.#users.findOneAndUpdate({ id }, { $set: patch }, { new: true }).select(PUBLIC_FIELDS).lean<User>().exec();
	}

	async addUserRole(userId: string, roleId: string): Promise<User | null> {
		return this.#users
			.findOneAndUpdate({ id: userId }, { $addToSet: { roleIds: roleId }, $set: { updatedAt: new Date() } }, { new: true })
			.select(PUBLIC_FIELDS)
			.lean<User>()
			.exec();
	}

	async removeUserRole(userId: string, roleId: string): Promise<User | null> {
		return this.#users
			.findOneAndUpdate({ id: userId }, { $pull: { roleIds: roleId }, $set: { updatedAt: new Date() } }, { new: true })
			.select(PUBLIC_FIELDS)
			.lean<User>()
			.exec();
	}

	async removeRoleFromUsers(roleId: string): Promise<number> {
		const result = await this.#users.updateMany({ roleIds: roleId }, { $pull: { roleIds: roleId }, $set: { updatedAt: new Date() } }).exec();
		return result.modifiedCount;
	}

	// ─────────────────────────────────────────────────────────────────────────────
	// Organizations
	// ─────────────────────────────────────────────────────────────────────────────

	async findOrganizationById(id: string): Promise<Organization | null> {
		return this.#organizations.findOne({ id }).select(PUBLIC_FIELDS).lean<Organization>().exec();
	}

	async insertOrganization(organization: Organization): Promise<void> {
		await this.#organizations.create(organization);
	}

	async updateOrganization(id: string, patch: OrganizationPatch): Promise<Organization | null> {
		return this.#organizations.findOneAndUpdate({ id }, { $set: patch }, { new: true }).select(PUBLIC_FIELDS).lean<Organization>().exec();
	}

	// ─────────────────────────────────────────────────────────────────────────────
	// Roles
	// ─────────────────────────────────────────────────────────────────────────────

	async findRoleById(id: string): Promise<Role | null> {
		return this.#roles.findOne({ id }).select(PUBLIC_FIELDS).lean<Role>().exec();
	}

	async findRolesByIds(ids: readonly string[]): Promise<Role[]> {
		if (ids.length === 0) return [];
		return this.#roles
			.find({ id: { $in: [...ids] } })
			.select(PUBLIC_FIELDS)
			.lean<Role[]>()
			.exec();
	}

	async findRoleByName(name: string, organizationId: string | null): Promise<Role | null> {
		return this.#roles.findOne({ name, organizationId }).select(PUBLIC_FIELDS).lean<Role>().exec();
	}

	async findVisibleRoles(organizationId: string): Promise<Role[]> {
		return this.#roles
			.find({ $or: [{ organizationId: null }, { organizationId }] })
			.select(PUBLIC_FIELDS)
			.lean<Role[]>()
			.exec();
	}

	async findDefaultRoles(organizationId: string): Promise<Role[]> {
		return this.#roles
			.find({ isDefault: true, $or: [{ organizationId: null }, { organizationId }] })
			.select(PUBLIC_FIELDS)
			.lean<Role[]>()
			.exec();
	}

	async findRolesIncluding(roleId: string): Promise<Role[]> {
		return this.#roles.find({ includes: roleId }).select(PUBLIC_FIELDS).lean<Role[]>().exec();
	}

	async insertRole(role: Role): Promise<void> {
		try {
			await this.#roles.create(role);
		} catch (error) {
			if (isDuplicateKeyError(error)) {
				throw new IdentityError(409, "ROLE_NAME_EXISTS", `Ya existe un rol ${role.name} en ese alcance`);
			}
			throw error;
		}
	}

	async updateRole(id: string, patch: RolePatch): Promise<Role | null> {
		try {
			return await this.#roles.findOneAndUpdate({ id }, { $set: patch }, { new: true }).select(PUBLIC_FIELDS).lean<Role>().exec();
		} catch (error) {
			if (isDuplicateKeyError(error)) {
				throw new IdentityError(409, "ROLE_NAME_EXISTS", `Ya existe un rol ${patch.name ?? id} en ese alcance`);
			}
			throw error;
		}
	}

	async deleteRole(id: string): Promise<boolean> {
		const result = await this.#roles.deleteOne({ id }).exec();
		return result.deletedCount > 0;
	}

	async countRolesWithPermission(code: string): Promise<number> {
		return this.#roles.countDocuments({ permissionCodes: code }).exec();
	}

	// ─────────────────────────────────────────────────────────────────────────────
	// Permissions
	// ─────────────────────────────────────────────────────────────────────────────

	async findPermissionsByCodes(codes: readonly string[]): Promise<Permission[]> {
		if (codes.length === 0) return [];
		return this.#permissions
			.find({ code: { $in: [...codes] } })
			.select(PUBLIC_FIELDS)
			.lean<Permission[]>()
			.exec();
	}

	async listPermissions(): Promise<Permission[]> {
		return this.#permissions.find().sort({ code: 1 }).select(PUBLIC_FIELDS).lean<Permission[]>().exec();
	}

	async insertPermission(permission: Permission): Promise<void> {
		try {
			await this.#permissions.create(permission);
		} catch (error) {
			if (isDuplicateKeyError(error)) {
				throw new IdentityError(409, "PERMISSION_EXISTS", `El permiso ${permission.code} ya existe`);
			}
			throw error;
		}
	}

	async deletePermission(code: string): Promise<boolean> {
		const result = await this.#permissions.deleteOne({ code }).exec();
		return result.deletedCount > 0;
	}
}
