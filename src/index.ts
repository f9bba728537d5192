// Núcleo de autenticación y autorización multi-tenant
export { Kernel, type ILifecycle } from "./kernel.js";
export { createAuthCore, type AuthCore, type AuthCoreOptions } from "./bootstrap.js";
export { loadAuthConfig, parseSigningKeys, validateSigningKeys, MIN_SECRET_LENGTH, type AuthConfig, type SigningKey } from "./config/auth.js";
export { type Clock, systemClock, parseDuration } from "./utils/time.js";
export { Logger } from "./utils/Logger/Logger.js";
export type { ILogger, LogLevel } from "./interfaces/utils/ILogger.js";

// Errores
export { default as CustomError, type CustomErrorJSON } from "./common/types/CustomError.js";
export { AuthError, type AuthErrorTypes } from "./common/types/custom-errors/AuthError.js";
export { AccessError, type AccessErrorTypes } from "./common/types/custom-errors/AccessError.js";
export { IdentityError, type IdentityErrorTypes } from "./common/types/custom-errors/IdentityError.js";
export { toOutwardError, type OutwardError } from "./common/utils/outward.js";

// Providers
export { default as JWTProvider, type IJWTProvider } from "./providers/security/jwt/index.js";
export { default as MongoProvider, type IMongoProvider } from "./providers/object/mongo/index.js";
export { default as RedisProvider, type IRedisProvider } from "./providers/queue/redis/index.js";

// Services
export * from "./services/core/IdentityManagerService/index.js";
export { default as IdentityManagerService } from "./services/core/IdentityManagerService/index.js";
export * from "./services/security/SessionManagerService/index.js";
export { default as SessionManagerService } from "./services/security/SessionManagerService/index.js";
