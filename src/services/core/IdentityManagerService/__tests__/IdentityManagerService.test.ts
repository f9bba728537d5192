import { beforeEach, describe, expect, it } from "vitest";
import { FlakyStore, roleByName, startIdentity, type StartedIdentity } from "../../../../__tests__/helpers.js";
import IdentityManagerService, { MemoryIdentityStore } from "../index.js";

const ORG_A = "org-a";
const ORG_B = "org-b";
const PASSWORD = "password-123";

describe("IdentityManagerService", () => {
	let env: StartedIdentity;

	beforeEach(async () => {
		env = await startIdentity();
		await env.identity.createOrganization({ id: ORG_A, name: "Org A" });
		await env.identity.createOrganization({ id: ORG_B, name: "Org B" });
	});

	describe("ciclo de vida", () => {
		it("falla si se usa antes de iniciar", async () => {
			const identity = new IdentityManagerService({
				config: { passwordMinLength: 8, permissionCacheTtlMs: 0, permissionCacheSize: 10 },
				store: new MemoryIdentityStore(),
			});
			await expect(identity.getUser("u1")).rejects.toThrow("IdentityManagerService no está iniciado");
		});

		it("siembra roles y permisos predefinidos una sola vez", async () => {
			await env.identity.stop();
			await env.identity.start();

			const roles = await env.identity.listRoles(ORG_A);
			expect(roles.map((role) => role.name).sort()).toEqual(["Admin", "Editor", "Viewer"]);
			expect(roles.every((role) => role.isPredefined && role.organizationId === null)).toBe(true);

			const codes = (await env.identity.listPermissions()).map((permission) => permission.code);
			expect(codes).toHaveLength(10);
			expect(codes).toContain("*");
		});

		it("sin seed arranca vacío", async () => {
			const identity = new IdentityManagerService({
				config: { passwordMinLength: 8, permissionCacheTtlMs: 0, permissionCacheSize: 10 },
				store: new MemoryIdentityStore(),
				seed: false,
			});
			await identity.start();
			await expect(identity.listPermissions()).resolves.toEqual([]);
		});
	});

	describe("organizaciones", () => {
		it("crea organizaciones activas", async () => {
			const org = await env.identity.createOrganization({ name: "  Acme  " });
			expect(org.name).toBe("Acme");
			expect(org.isActive).toBe(true);
			await expect(env.identity.getOrganization(org.id)).resolves.toMatchObject({ id: org.id, name: "Acme" });
		});

		it("rechaza nombres vacíos", async () => {
			await expect(env.identity.createOrganization({ name: "   " })).rejects.toMatchObject({ errorKey: "MISSING_FIELDS", status: 400 });
		});

		it("desactivar una organización inexistente falla", async () => {
			await expect(env.identity.deactivateOrganization("nope")).rejects.toMatchObject({ errorKey: "ORG_NOT_FOUND" });
		});
	});

	describe("usuarios", () => {
		it("normaliza el email y no expone el hash", async () => {
			const user = await env.identity.createUser({ email: "  Alice@X.com ", password: PASSWORD, organizationId: ORG_A });

			expect(user.email).toBe("alice@x.com");
			expect(user.isActive).toBe(true);
			expect("passwordHash" in user).toBe(false);
		});

		it("valida campos, fuerza del password y organización", async () => {
			await expect(env.identity.createUser({ email: "", password: PASSWORD, organizationId: ORG_A })).rejects.toMatchObject({
				errorKey: "MISSING_FIELDS",
			});
			await expect(env.identity.createUser({ email: "a@x.com", password: "short", organizationId: ORG_A })).rejects.toMatchObject({
				name: "AuthError",
				status: 400,
				errorKey: "WEAK_PASSWORD",
			});
			await expect(env.identity.createUser({ email: "a@x.com", password: PASSWORD, organizationId: "nope" })).rejects.toMatchObject({
				errorKey: "ORG_NOT_FOUND",
			});

			await env.identity.deactivateOrganization(ORG_B);
			await expect(env.identity.createUser({ email: "a@x.com", password: PASSWORD, organizationId: ORG_B })).rejects.toMatchObject({
				errorKey: "ORG_NOT_FOUND",
			});
		});

		it("el email es único sin importar mayúsculas", async () => {
			await env.identity.createUser({ email: "alice@x.com", password: PASSWORD, organizationId: ORG_A });
			await expect(env.identity.createUser({ email: "ALICE@x.com", password: PASSWORD, organizationId: ORG_B })).rejects.toMatchObject({
				status: 409,
				errorKey: "EMAIL_EXISTS",
			});
		});

		it("solo acepta roles visibles para la organización", async () => {
			const foreign = await env.identity.createRole({ name: "Auditor", organizationId: ORG_B, permissionCodes: ["user:read"] });

			await expect(
				env.identity.createUser({ email: "a@x.com", password: PASSWORD, organizationId: ORG_A, roleIds: [foreign.id] })
			).rejects.toMatchObject({ status: 403, errorKey: "CROSS_ORG_ROLE" });
			await expect(
				env.identity.createUser({ email: "a@x.com", password: PASSWORD, organizationId: ORG_A, roleIds: ["nope"] })
			).rejects.toMatchObject({ errorKey: "ROLE_NOT_FOUND" });
		});

		it("roleIds vacío no asigna los roles por defecto", async () => {
			const user = await env.identity.createUser({ email: "a@x.com", password: PASSWORD, organizationId: ORG_A, roleIds: [] });
			expect(user.roleIds).toEqual([]);
		});

		it("asignar y quitar roles es idempotente", async () => {
			const user = await env.identity.createUser({ email: "a@x.com", password: PASSWORD, organizationId: ORG_A, roleIds: [] });
			const editor = await roleByName(env.identity, ORG_A, "Editor");

			await env.identity.assignRole(user.id, editor.id);
			const twice = await env.identity.assignRole(user.id, editor.id);
			expect(twice.roleIds).toEqual([editor.id]);

			await env.identity.unassignRole(user.id, editor.id);
			const again = await env.identity.unassignRole(user.id, editor.id);
			expect(again.roleIds).toEqual([]);
		});

		it("asignaciones concurrentes no pierden roles", async () => {
			const user = await env.identity.createUser({ email: "a@x.com", password: PASSWORD, organizationId: ORG_A, roleIds: [] });
			const editor = await roleByName(env.identity, ORG_A, "Editor");
			const viewer = await roleByName(env.identity, ORG_A, "Viewer");

			await Promise.all([env.identity.assignRole(user.id, editor.id), env.identity.assignRole(user.id, viewer.id)]);

			const stored = await env.identity.getUser(user.id);
			expect(stored?.roleIds.slice().sort()).toEqual([editor.id, viewer.id].sort());
		});

		it("quitar un rol en paralelo con otra asignación no lo restaura", async () => {
			const editor = await roleByName(env.identity, ORG_A, "Editor");
			const viewer = await roleByName(env.identity, ORG_A, "Viewer");
			const user = await env.identity.createUser({ email: "a@x.com", password: PASSWORD, organizationId: ORG_A, roleIds: [editor.id] });

			await Promise.all([env.identity.unassignRole(user.id, editor.id), env.identity.assignRole(user.id, viewer.id)]);

			const stored = await env.identity.getUser(user.id);
			expect(stored?.roleIds).toEqual([viewer.id]);
			await expect(env.identity.hasPermission(user.id, ORG_A, "doc:write")).resolves.toBe(false);
		});

		it("asignar a un usuario inexistente falla", async () => {
			const editor = await roleByName(env.identity, ORG_A, "Editor");
			await expect(env.identity.assignRole("nope", editor.id)).rejects.toMatchObject({ status: 404, errorKey: "USER_NOT_FOUND" });
			await expect(env.identity.deactivateUser("nope")).rejects.toMatchObject({ errorKey: "USER_NOT_FOUND" });
		});

		it("getActiveSubject exige usuario activo en su organización activa", async () => {
			const user = await env.identity.createUser({ email: "a@x.com", password: PASSWORD, organizationId: ORG_A });

			await expect(env.identity.getActiveSubject(user.id, ORG_A)).resolves.toMatchObject({ id: user.id });
			await expect(env.identity.getActiveSubject(user.id, ORG_B)).resolves.toBeNull();

			await env.identity.deactivateOrganization(ORG_A);
			await expect(env.identity.getActiveSubject(user.id, ORG_A)).resolves.toBeNull();
		});
	});

	describe("credenciales", () => {
		beforeEach(async () => {
			await env.identity.createUser({ email: "alice@x.com", password: PASSWORD, organizationId: ORG_A });
		});

		it("verifica email (sin distinguir mayúsculas) y password", async () => {
			await expect(env.identity.verifyCredentials("Alice@X.com", PASSWORD)).resolves.toMatchObject({ email: "alice@x.com" });
		});

		it("devuelve null ante password incorrecto o email desconocido", async () => {
			await expect(env.identity.verifyCredentials("alice@x.com", "wrong-password")).resolves.toBeNull();
			await expect(env.identity.verifyCredentials("nobody@x.com", PASSWORD)).resolves.toBeNull();
		});

		it("devuelve null si el usuario o la organización están inactivos", async () => {
			const user = await env.identity.verifyCredentials("alice@x.com", PASSWORD);
			if (!user) throw new Error("login esperado");

			await env.identity.deactivateOrganization(ORG_A);
			await expect(env.identity.verifyCredentials("alice@x.com", PASSWORD)).resolves.toBeNull();

			const bob = await env.identity.createUser({ email: "bob@x.com", password: PASSWORD, organizationId: ORG_B });
			await env.identity.deactivateUser(bob.id);
			await expect(env.identity.verifyCredentials("bob@x.com", PASSWORD)).resolves.toBeNull();
		});

		it("registra el último login", async () => {
			const user = await env.identity.verifyCredentials("alice@x.com", PASSWORD);
			if (!user) throw new Error("login esperado");
			expect(user.lastLoginAt).toBeUndefined();

			await env.identity.recordLogin(user.id);
			const reloaded = await env.identity.getUser(user.id);
			expect(reloaded?.lastLoginAt).toBeInstanceOf(Date);
		});

		it("changePassword verifica el actual y la fuerza del nuevo", async () => {
			const user = await env.identity.verifyCredentials("alice@x.com", PASSWORD);
			if (!user) throw new Error("login esperado");

			await expect(env.identity.changePassword(user.id, "wrong-password", "new-password-1")).rejects.toMatchObject({
				errorKey: "INVALID_CREDENTIALS",
			});
			await expect(env.identity.changePassword(user.id, PASSWORD, "short")).rejects.toMatchObject({ errorKey: "WEAK_PASSWORD" });
			await expect(env.identity.changePassword("nope", PASSWORD, "new-password-1")).rejects.toMatchObject({
				errorKey: "SUBJECT_UNAVAILABLE",
			});

			await env.identity.changePassword(user.id, PASSWORD, "new-password-1");
			await expect(env.identity.verifyCredentials("alice@x.com", PASSWORD)).resolves.toBeNull();
			await expect(env.identity.verifyCredentials("alice@x.com", "new-password-1")).resolves.toMatchObject({ id: user.id });
		});

		it("un fallo del almacenamiento es SERVICE_UNAVAILABLE, no un login fallido", async () => {
			const store = new FlakyStore();
			const flaky = await startIdentity({ store });
			store.down = true;

			await expect(flaky.identity.verifyCredentials("alice@x.com", PASSWORD)).rejects.toMatchObject({
				status: 503,
				errorKey: "SERVICE_UNAVAILABLE",
			});
		});
	});

	describe("roles", () => {
		it("solo un rol global puede ser cross-tenant", async () => {
			await expect(
				env.identity.createRole({ name: "Support", organizationId: ORG_A, permissionCodes: [], crossTenant: true })
			).rejects.toMatchObject({ status: 400, errorKey: "INVALID_CROSS_TENANT_ROLE" });
		});

		it("exige permisos registrados", async () => {
			await expect(
				env.identity.createRole({ name: "Custom", organizationId: ORG_A, permissionCodes: ["doc:read", "ghost:perm"] })
			).rejects.toMatchObject({ status: 404, errorKey: "PERMISSION_NOT_FOUND", data: { codes: ["ghost:perm"] } });
		});

		it("los nombres son únicos por alcance", async () => {
			await env.identity.createRole({ name: "Custom", organizationId: ORG_A, permissionCodes: [] });
			await expect(env.identity.createRole({ name: "Custom", organizationId: ORG_A, permissionCodes: [] })).rejects.toMatchObject({
				status: 409,
				errorKey: "ROLE_NAME_EXISTS",
			});
			await expect(env.identity.createRole({ name: "Custom", organizationId: ORG_B, permissionCodes: [] })).resolves.toMatchObject({
				organizationId: ORG_B,
			});
		});

		it("un rol solo incluye roles visibles en su alcance", async () => {
			const foreign = await env.identity.createRole({ name: "Auditor", organizationId: ORG_B, permissionCodes: [] });
			const local = await env.identity.createRole({ name: "Local", organizationId: ORG_A, permissionCodes: [] });

			await expect(
				env.identity.createRole({ name: "Mixed", organizationId: ORG_A, permissionCodes: [], includes: [foreign.id] })
			).rejects.toMatchObject({ errorKey: "CROSS_ORG_ROLE" });
			await expect(
				env.identity.createRole({ name: "Global", organizationId: null, permissionCodes: [], includes: [local.id] })
			).rejects.toMatchObject({ errorKey: "CROSS_ORG_ROLE" });
			await expect(
				env.identity.createRole({ name: "Broken", organizationId: ORG_A, permissionCodes: [], includes: ["nope"] })
			).rejects.toMatchObject({ errorKey: "ROLE_NOT_FOUND" });
		});

		it("listRoles devuelve los globales y los propios", async () => {
			await env.identity.createRole({ name: "Local", organizationId: ORG_A, permissionCodes: [] });
			await env.identity.createRole({ name: "Auditor", organizationId: ORG_B, permissionCodes: [] });

			const names = (await env.identity.listRoles(ORG_A)).map((role) => role.name).sort();
			expect(names).toEqual(["Admin", "Editor", "Local", "Viewer"]);
		});

		it("rechaza inclusiones que cierran un ciclo", async () => {
			const first = await env.identity.createRole({ name: "First", organizationId: ORG_A, permissionCodes: [] });
			const second = await env.identity.createRole({ name: "Second", organizationId: ORG_A, permissionCodes: [], includes: [first.id] });

			await expect(env.identity.setRoleIncludes(first.id, [second.id])).rejects.toMatchObject({ status: 409, errorKey: "ROLE_CYCLE" });
			await expect(env.identity.setRoleIncludes(first.id, [first.id])).rejects.toMatchObject({ errorKey: "ROLE_CYCLE" });
		});

		it("setRolePermissions reemplaza el conjunto completo", async () => {
			const role = await env.identity.createRole({ name: "Custom", organizationId: ORG_A, permissionCodes: ["doc:read"] });
			const updated = await env.identity.setRolePermissions(role.id, ["user:read", "user:read", "role:read"]);

			expect(updated.permissionCodes).toEqual(["user:read", "role:read"]);
			await expect(env.identity.setRolePermissions("nope", [])).rejects.toMatchObject({ errorKey: "ROLE_NOT_FOUND" });
		});

		it("no permite borrar roles predefinidos", async () => {
			const admin = await roleByName(env.identity, ORG_A, "Admin");
			await expect(env.identity.deleteRole(admin.id)).rejects.toMatchObject({ status: 403, errorKey: "CANNOT_DELETE_PREDEFINED" });
		});

		it("borrar un rol lo quita de usuarios y de otros roles", async () => {
			const child = await env.identity.createRole({ name: "Child", organizationId: ORG_A, permissionCodes: ["user:read"] });
			const parent = await env.identity.createRole({ name: "Parent", organizationId: ORG_A, permissionCodes: [], includes: [child.id] });
			const user = await env.identity.createUser({
				email: "a@x.com",
				password: PASSWORD,
				organizationId: ORG_A,
				roleIds: [child.id, parent.id],
			});

			await env.identity.deleteRole(child.id);

			await expect(env.identity.getRole(child.id)).resolves.toBeNull();
			expect((await env.identity.getRole(parent.id))?.includes).toEqual([]);
			expect((await env.identity.getUser(user.id))?.roleIds).toEqual([parent.id]);
			await expect(env.identity.hasPermission(user.id, ORG_A, "user:read")).resolves.toBe(false);
		});
	});

	describe("permisos", () => {
		it("registra códigos válidos y rechaza el resto", async () => {
			await expect(env.identity.registerPermission("invoice:approve", " Aprobar facturas ")).resolves.toMatchObject({
				code: "invoice:approve",
				description: "Aprobar facturas",
			});
			await expect(env.identity.registerPermission("Invoice:Approve", "x")).rejects.toMatchObject({
				status: 400,
				errorKey: "INVALID_PERMISSION_CODE",
			});
			await expect(env.identity.registerPermission("invoice:approve", "x")).rejects.toMatchObject({
				status: 409,
				errorKey: "PERMISSION_EXISTS",
			});
		});

		it("un permiso en uso no se puede borrar", async () => {
			await expect(env.identity.deletePermission("doc:read")).rejects.toMatchObject({ status: 409, errorKey: "PERMISSION_IN_USE" });
		});

		it("borra permisos sin uso", async () => {
			await env.identity.registerPermission("invoice:approve", "Aprobar facturas");
			await env.identity.deletePermission("invoice:approve");

			await expect(env.identity.deletePermission("invoice:approve")).rejects.toMatchObject({ errorKey: "PERMISSION_NOT_FOUND" });
		});
	});
});
