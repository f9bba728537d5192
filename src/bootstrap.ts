import { Kernel } from "./kernel.js";
import { type AuthConfig, loadAuthConfig } from "./config/auth.js";
import type { Clock } from "./utils/time.js";
import JWTProvider from "./providers/security/jwt/index.js";
import MongoProvider from "./providers/object/mongo/index.js";
import RedisProvider, { type IRedisProvider } from "./providers/queue/redis/index.js";
import IdentityManagerService from "./services/core/IdentityManagerService/index.js";
import type { IdentityStore } from "./services/core/IdentityManagerService/store/types.js";
import SessionManagerService from "./services/security/SessionManagerService/index.js";

export interface AuthCoreOptions {
	/** Por defecto se carga desde `env` */
	config?: AuthConfig;
	env?: Record<string, string | undefined>;
	/** Store de identidades explícito; si no, MongoDB cuando `MONGODB_URI` está definido, o memoria */
	store?: IdentityStore;
	/** Cliente de revocaciones explícito; si no, Redis cuando `REDIS_HOST` está definido, o memoria */
	redis?: IRedisProvider;
	clock?: Clock;
}

export interface AuthCore {
	kernel: Kernel;
	identity: IdentityManagerService;
	sessions: SessionManagerService;
}

/**
 * Arma el kernel con sus providers y services, sin iniciarlo
 */
export function createAuthCore(options: AuthCoreOptions = {}): AuthCore {
	const env = options.env ?? process.env;
	const config = options.config ?? loadAuthConfig(env);
	const kernel = new Kernel();

	const jwt = new JWTProvider({ issuer: config.issuer, audience: config.audience });
	kernel.registerProvider(jwt);

	let mongo: MongoProvider | undefined;
	if (!options.store && env.MONGODB_URI) {
		mongo = new MongoProvider({ uri: env.MONGODB_URI });
		kernel.registerProvider(mongo);
	}

	let redis = options.redis;
	if (!redis && env.REDIS_HOST) {
		const provider = new RedisProvider();
		kernel.registerProvider(provider);
		redis = provider;
	}

	const identity = new IdentityManagerService({ config, store: options.store, mongo, clock: options.clock });
	kernel.registerService(identity);

	const sessions = new SessionManagerService({ config, identity, jwt, redis, clock: options.clock });
	kernel.registerService(sessions);

	return { kernel, identity, sessions };
}
