import type { AuthConfig } from "../config/auth.js";
import type { Clock } from "../utils/time.js";
import type { IRedisProvider } from "../providers/queue/redis/index.js";
import { createAuthCore, type AuthCore } from "../bootstrap.js";
import { MemoryIdentityStore } from "../services/core/IdentityManagerService/store/memory.js";
import IdentityManagerService from "../services/core/IdentityManagerService/index.js";
import type { Role } from "../services/core/IdentityManagerService/domain/role.js";

export const TEST_SECRET = "test-secret-aaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaa";
export const OTHER_SECRET = "test-secret-bbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbb";

/** 2024-01-01T00:00:00Z */
export const T0 = Date.UTC(2024, 0, 1, 0, 0, 0);

/**
 * Reloj controlable en tests
 */
export class ManualClock implements Clock {
	#now: number;

	constructor(start: number = T0) {
		this.#now = start;
	}

	now(): number {
		return this.#now;
	}

	advance(seconds: number): void {
		this.#now += seconds * 1000;
	}

	set(ms: number): void {
		this.#now = ms;
	}
}

export function testConfig(overrides: Partial<AuthConfig> = {}): AuthConfig {
	return {
		signingKeys: [{ kid: "k1", secret: TEST_SECRET }],
		accessTokenTtl: 60 * 60,
		refreshTokenTtl: 30 * 24 * 60 * 60,
		clockSkewSeconds: 0,
		issuer: "tenant-auth-core",
		audience: "tenant-auth-core",
		permissionCacheTtlMs: 0,
		permissionCacheSize: 100,
		passwordMinLength: 8,
		...overrides,
	};
}

/**
 * Stand-in en proceso del RedisProvider (TTL según el reloj de test)
 */
export class FakeRedis implements IRedisProvider {
	readonly data = new Map<string, { value: string; expiresAt: number | null }>();
	failing = false;

	constructor(private readonly clock: Clock) {}

	#check(): void {
		if (this.failing) throw new Error("ECONNREFUSED");
	}

	#live(key: string): string | null {
		const entry = this.data.get(key);
		if (!entry) return null;
		if (entry.expiresAt !== null && entry.expiresAt <= this.clock.now()) {
			this.data.delete(key);
			return null;
		}
		return entry.value;
	}

	async get(key: string): Promise<string | null> {
		this.#check();
		return this.#live(key);
	}

	async setex(key: string, ttlSeconds: number, value: string): Promise<void> {
		this.#check();
		this.data.set(key, { value, expiresAt: this.clock.now() + ttlSeconds * 1000 });
	}

	async exists(key: string): Promise<boolean> {
		this.#check();
		return this.#live(key) !== null;
	}
}

export interface StartedCore extends AuthCore {
	clock: ManualClock;
	store: MemoryIdentityStore;
}

/**
 * Kernel completo en memoria, ya iniciado
 */
export async function startCore(options: { config?: Partial<AuthConfig>; redis?: IRedisProvider; clock?: ManualClock } = {}): Promise<StartedCore> {
	const clock = options.clock ?? new ManualClock();
	const store = new MemoryIdentityStore();
	const core = createAuthCore({ config: testConfig(options.config), env: {}, store, redis: options.redis, clock });
	await core.kernel.start();
	return { ...core, clock, store };
}

export interface StartedIdentity {
	identity: IdentityManagerService;
	store: MemoryIdentityStore;
	clock: ManualClock;
}

/**
 * IdentityManagerService en memoria, ya iniciado y sembrado
 */
export async function startIdentity(
	options: { permissionCacheTtlMs?: number; store?: MemoryIdentityStore; clock?: ManualClock } = {}
): Promise<StartedIdentity> {
	const store = options.store ?? new MemoryIdentityStore();
	const clock = options.clock ?? new ManualClock();
	const identity = new IdentityManagerService({
		config: { passwordMinLength: 8, permissionCacheTtlMs: options.permissionCacheTtlMs ?? 0, permissionCacheSize: 100 },
		store,
		clock,
	});
	await identity.start();
	return { identity, store, clock };
}

/**
 * Busca un rol visible por nombre
 */
export async function roleByName(identity: IdentityManagerService, organizationId: string, name: string): Promise<Role> {
	const role = (await identity.listRoles(organizationId)).find((candidate) => candidate.name === name);
	if (!role) throw new Error(`Rol ${name} no encontrado en ${organizationId}`);
	return role;
}

/**
 * Store que puede simular una caída de la base
 */
export class FlakyStore extends MemoryIdentityStore {
	down = false;

	override async findUserByEmail(email: string) {
		if (this.down) throw new Error("socket closed");
		return super.findUserByEmail(email);
	}

	override async findUserById(id: string) {
		if (this.down) throw new Error("socket closed");
		return super.findUserById(id);
	}
}
