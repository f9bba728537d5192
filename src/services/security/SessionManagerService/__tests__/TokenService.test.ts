import { afterEach, describe, expect, it } from "vitest";
import * as jose from "jose";
import JWTProvider from "../../../../providers/security/jwt/index.js";
import { Logger } from "../../../../utils/Logger/Logger.js";
import { KeyStore } from "../domain/keys/KeyStore.js";
import { RevocationRepository } from "../domain/tokens/RevocationRepository.js";
import { TokenService, VerifiedClaims } from "../domain/tokens/TokenService.js";
import { FakeRedis, ManualClock, OTHER_SECRET, T0, TEST_SECRET } from "../../../../__tests__/helpers.js";
import type { IRedisProvider } from "../../../../providers/queue/redis/index.js";

const NOW = T0 / 1000;
const ACCESS_TTL = 3600;
const REFRESH_TTL = 86400;
const ISSUER = "tenant-auth-core";

interface Fixture {
	clock: ManualClock;
	keyStore: KeyStore;
	jwt: JWTProvider;
	tokens: TokenService;
}

const repos: RevocationRepository[] = [];

function createTokens(options: { secret?: string; kid?: string; clock?: ManualClock; redis?: IRedisProvider; skew?: number } = {}): Fixture {
	const clock = options.clock ?? new ManualClock();
	const keyStore = new KeyStore({ keys: [{ kid: options.kid ?? "k1", secret: options.secret ?? TEST_SECRET }] });
	const jwt = new JWTProvider({ issuer: ISSUER, audience: ISSUER });
	const revocations = new RevocationRepository({
		clock,
		graceSeconds: options.skew ?? 0,
		subjectCutoffTtlSeconds: REFRESH_TTL,
		redis: options.redis,
	});
	repos.push(revocations);

	const tokens = new TokenService(
		keyStore,
		jwt,
		revocations,
		{ accessTokenTtl: ACCESS_TTL, refreshTokenTtl: REFRESH_TTL, clockSkewSeconds: options.skew ?? 0 },
		clock,
		Logger.getLogger("TokenService")
	);
	return { clock, keyStore, jwt, tokens };
}

function replaceAt(value: string, index: number): string {
	const replacement = value[index] === "A" ? "B" : "A";
	return value.slice(0, index) + replacement + value.slice(index + 1);
}

function tamperPayload(token: string): string {
	const [header, payload, signature] = token.split(".");
	return [header, replaceAt(payload, Math.floor(payload.length / 2)), signature].join(".");
}

afterEach(() => {
	for (const repo of repos.splice(0)) repo.stop();
});

describe("TokenService.issue", () => {
	it("emite access tokens con org, tipo y roles", async () => {
		const { tokens } = createTokens();
		const issued = await tokens.issue("user-1", "org-a", "access", undefined, ["role-1"]);

		expect(issued.kind).toBe("access");
		expect(issued.issuedAt).toBe(NOW);
		expect(issued.expiresAt).toBe(NOW + ACCESS_TTL);

		expect(jose.decodeProtectedHeader(issued.token)).toEqual({ alg: "HS256", typ: "JWT", kid: "k1" });
		expect(jose.decodeJwt(issued.token)).toEqual({
			org: "org-a",
			kind: "access",
			roles: ["role-1"],
			sub: "user-1",
			jti: issued.tokenId,
			iat: NOW,
			exp: NOW + ACCESS_TTL,
			iss: ISSUER,
			aud: ISSUER,
		});
	});

	it("los refresh tokens no llevan roles", async () => {
		const { tokens } = createTokens();
		const issued = await tokens.issue("user-1", "org-a", "refresh");

		expect(issued.expiresAt).toBe(NOW + REFRESH_TTL);
		expect(jose.decodeJwt(issued.token).roles).toBeUndefined();
	});

	it("acepta un TTL explícito y rechaza TTLs inválidos", async () => {
		const { tokens } = createTokens();
		await expect(tokens.issue("user-1", "org-a", "access", 60)).resolves.toMatchObject({ expiresAt: NOW + 60 });
		await expect(tokens.issue("user-1", "org-a", "access", 0)).rejects.toThrow("TTL inválido: 0");
	});

	it("cada token tiene un identificador propio", async () => {
		const { tokens } = createTokens();
		const [first, second] = await Promise.all([tokens.issue("user-1", "org-a", "access"), tokens.issue("user-1", "org-a", "access")]);
		expect(first.tokenId).not.toBe(second.tokenId);
	});
});

describe("TokenService.validate", () => {
	it("devuelve los claims verificados", async () => {
		const { tokens } = createTokens();
		const issued = await tokens.issue("user-1", "org-a", "access", undefined, ["role-1", "role-2"]);

		const claims = await tokens.validate(issued.token, "access");

		expect(claims).toBeInstanceOf(VerifiedClaims);
		expect(claims).toMatchObject({
			subjectId: "user-1",
			organizationId: "org-a",
			kind: "access",
			tokenId: issued.tokenId,
			issuedAt: NOW,
			expiresAt: NOW + ACCESS_TTL,
			roleIds: ["role-1", "role-2"],
			kid: "k1",
		});
		expect(Object.isFrozen(claims)).toBe(true);
	});

	it("un payload alterado es TOKEN_MALFORMED", async () => {
		const { tokens } = createTokens();
		const issued = await tokens.issue("user-1", "org-a", "access");

		await expect(tokens.validate(tamperPayload(issued.token))).rejects.toMatchObject({ errorKey: "TOKEN_MALFORMED" });
	});

	it("cambiar cualquier carácter del header o del payload es TOKEN_MALFORMED", async () => {
		const { tokens } = createTokens();
		const issued = await tokens.issue("user-1", "org-a", "access", undefined, ["role-1"]);
		const [header, payload, signature] = issued.token.split(".");

		const variants = [
			...Array.from(header, (_, index) => [replaceAt(header, index), payload, signature].join(".")),
			...Array.from(payload, (_, index) => [header, replaceAt(payload, index), signature].join(".")),
		];
		expect(variants).toHaveLength(header.length + payload.length);

		for (const variant of variants) {
			await expect(tokens.validate(variant)).rejects.toMatchObject({ errorKey: "TOKEN_MALFORMED" });
		}
	});

	it("una firma alterada en los bits de relleno es TOKEN_MALFORMED", async () => {
		const { tokens } = createTokens();
		const issued = await tokens.issue("user-1", "org-a", "access");
		const [header, payload, signature] = issued.token.split(".");
		const alphabet = "ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789-_";
		const tweaked = signature.slice(0, -1) + alphabet[alphabet.indexOf(signature.slice(-1)) ^ 1];

		await expect(tokens.validate([header, payload, tweaked].join("."))).rejects.toMatchObject({ errorKey: "TOKEN_MALFORMED" });
		await expect(tokens.validate(issued.token)).resolves.toBeInstanceOf(VerifiedClaims);
	});

	it.each(["", "garbage", "a.b.c", "a.b"])("%j es TOKEN_MALFORMED", async (raw) => {
		const { tokens } = createTokens();
		await expect(tokens.validate(raw)).rejects.toMatchObject({ status: 401, errorKey: "TOKEN_MALFORMED" });
	});

	it("un token firmado con otro secreto es TOKEN_MALFORMED", async () => {
		const foreign = createTokens({ secret: OTHER_SECRET });
		const { tokens } = createTokens();
		const issued = await foreign.tokens.issue("user-1", "org-a", "access");

		await expect(tokens.validate(issued.token)).rejects.toMatchObject({ errorKey: "TOKEN_MALFORMED" });
	});

	it("un kid desconocido es TOKEN_MALFORMED", async () => {
		const foreign = createTokens({ kid: "k9" });
		const { tokens } = createTokens();
		const issued = await foreign.tokens.issue("user-1", "org-a", "access");

		await expect(tokens.validate(issued.token)).rejects.toMatchObject({ errorKey: "TOKEN_MALFORMED" });
	});

	it("la firma se verifica antes que la expiración", async () => {
		const clock = new ManualClock();
		const foreign = createTokens({ secret: OTHER_SECRET, clock });
		const { tokens } = createTokens({ clock });
		const issued = await foreign.tokens.issue("user-1", "org-a", "access");

		clock.advance(ACCESS_TTL * 2);
		await expect(tokens.validate(issued.token)).rejects.toMatchObject({ errorKey: "TOKEN_MALFORMED" });
	});

	it("rechaza otros algoritmos aunque la clave coincida", async () => {
		const { tokens } = createTokens();
		const token = await new jose.SignJWT({ org: "org-a", kind: "access", roles: [] })
			.setProtectedHeader({ alg: "HS512", typ: "JWT", kid: "k1" })
			.setSubject("user-1")
			.setJti("jti-1")
			.setIssuedAt(NOW)
			.setExpirationTime(NOW + 60)
			.setIssuer(ISSUER)
			.setAudience(ISSUER)
			.sign(new TextEncoder().encode(TEST_SECRET));

		await expect(tokens.validate(token)).rejects.toMatchObject({ errorKey: "TOKEN_MALFORMED" });
	});

	it("rechaza tokens sin firma", async () => {
		const { tokens } = createTokens();
		const token = new jose.UnsecuredJWT({ org: "org-a", kind: "access", roles: [] })
			.setSubject("user-1")
			.setJti("jti-1")
			.setIssuedAt(NOW)
			.setExpirationTime(NOW + 60)
			.setIssuer(ISSUER)
			.setAudience(ISSUER)
			.encode();

		await expect(tokens.validate(token)).rejects.toMatchObject({ errorKey: "TOKEN_MALFORMED" });
	});

	it("claims propios incompletos son TOKEN_MALFORMED", async () => {
		const { tokens, jwt, keyStore } = createTokens();
		const { kid, key } = keyStore.getSigningKey();
		const base = { kid, subject: "user-1", jwtId: "jti-1", issuedAt: NOW, expiresAt: NOW + 60 };

		const withoutOrg = await jwt.signWithKey({ kind: "access", roles: [] }, key, base);
		const withoutRoles = await jwt.signWithKey({ org: "org-a", kind: "access" }, key, base);
		const unknownKind = await jwt.signWithKey({ org: "org-a", kind: "id" }, key, base);

		await expect(tokens.validate(withoutOrg)).rejects.toMatchObject({ errorKey: "TOKEN_MALFORMED" });
		await expect(tokens.validate(withoutRoles)).rejects.toMatchObject({ errorKey: "TOKEN_MALFORMED" });
		await expect(tokens.validate(unknownKind)).rejects.toMatchObject({ errorKey: "TOKEN_MALFORMED" });
	});

	it("un token vencido es TOKEN_EXPIRED", async () => {
		const { clock, tokens } = createTokens();
		const issued = await tokens.issue("user-1", "org-a", "access");

		clock.advance(ACCESS_TTL - 1);
		await expect(tokens.validate(issued.token)).resolves.toBeInstanceOf(VerifiedClaims);

		clock.advance(1);
		await expect(tokens.validate(issued.token)).rejects.toMatchObject({ errorKey: "TOKEN_EXPIRED" });
	});

	it("la tolerancia de reloj extiende la vigencia", async () => {
		const { clock, tokens } = createTokens({ skew: 5 });
		const issued = await tokens.issue("user-1", "org-a", "access");

		clock.advance(ACCESS_TTL + 4);
		await expect(tokens.validate(issued.token)).resolves.toBeInstanceOf(VerifiedClaims);
		clock.advance(1);
		await expect(tokens.validate(issued.token)).rejects.toMatchObject({ errorKey: "TOKEN_EXPIRED" });
	});

	it("un token revocado es TOKEN_REVOKED", async () => {
		const { tokens } = createTokens();
		const issued = await tokens.issue("user-1", "org-a", "access");
		const other = await tokens.issue("user-1", "org-a", "access");

		await tokens.revoke(issued.tokenId, issued.expiresAt);

		await expect(tokens.validate(issued.token)).rejects.toMatchObject({ errorKey: "TOKEN_REVOKED" });
		await expect(tokens.validate(other.token)).resolves.toMatchObject({ tokenId: other.tokenId });
	});

	it("revokeSubject revoca lo emitido hasta ese segundo inclusive", async () => {
		const { clock, tokens } = createTokens();
		const before = await tokens.issue("user-1", "org-a", "refresh");
		const otherUser = await tokens.issue("user-2", "org-a", "refresh");

		await tokens.revokeSubject("user-1");
		const sameSecond = await tokens.issue("user-1", "org-a", "refresh");
		clock.advance(1);
		const after = await tokens.issue("user-1", "org-a", "refresh");

		await expect(tokens.validate(before.token)).rejects.toMatchObject({ errorKey: "TOKEN_REVOKED" });
		await expect(tokens.validate(sameSecond.token)).rejects.toMatchObject({ errorKey: "TOKEN_REVOKED" });
		await expect(tokens.validate(after.token)).resolves.toMatchObject({ subjectId: "user-1" });
		await expect(tokens.validate(otherUser.token)).resolves.toMatchObject({ subjectId: "user-2" });
	});

	it("un tipo inesperado es WRONG_TOKEN_KIND", async () => {
		const { tokens } = createTokens();
		const access = await tokens.issue("user-1", "org-a", "access");
		const refresh = await tokens.issue("user-1", "org-a", "refresh");

		await expect(tokens.validate(refresh.token, "access")).rejects.toMatchObject({ errorKey: "WRONG_TOKEN_KIND" });
		await expect(tokens.validate(access.token, "refresh")).rejects.toMatchObject({ errorKey: "WRONG_TOKEN_KIND" });
		await expect(tokens.validate(refresh.token)).resolves.toMatchObject({ kind: "refresh", roleIds: [] });
	});

	it("la revocación se evalúa antes que el tipo", async () => {
		const { tokens } = createTokens();
		const refresh = await tokens.issue("user-1", "org-a", "refresh");
		await tokens.revoke(refresh.tokenId, refresh.expiresAt);

		await expect(tokens.validate(refresh.token, "access")).rejects.toMatchObject({ errorKey: "TOKEN_REVOKED" });
	});

	it("los tokens firmados con claves rotadas siguen verificando mientras la clave esté vigente", async () => {
		const { keyStore, tokens } = createTokens();
		const old = await tokens.issue("user-1", "org-a", "access");

		await keyStore.rotate({ kid: "k2", secret: OTHER_SECRET });
		const fresh = await tokens.issue("user-1", "org-a", "access");

		await expect(tokens.validate(old.token)).resolves.toMatchObject({ kid: "k1" });
		await expect(tokens.validate(fresh.token)).resolves.toMatchObject({ kid: "k2" });

		await keyStore.rotate({ kid: "k3", secret: "test-secret-cccccccccccccccccccccccccccccccc" });
		await keyStore.rotate({ kid: "k4", secret: "test-secret-dddddddddddddddddddddddddddddddd" });
		await expect(tokens.validate(old.token)).rejects.toMatchObject({ errorKey: "TOKEN_MALFORMED" });
	});

	it("si el almacén de revocaciones falla, es SERVICE_UNAVAILABLE", async () => {
		const clock = new ManualClock();
		const redis = new FakeRedis(clock);
		const { tokens } = createTokens({ clock, redis });
		const issued = await tokens.issue("user-1", "org-a", "access");

		redis.failing = true;
		await expect(tokens.validate(issued.token)).rejects.toMatchObject({ status: 503, errorKey: "SERVICE_UNAVAILABLE" });
		await expect(tokens.revoke(issued.tokenId, issued.expiresAt)).rejects.toMatchObject({ errorKey: "SERVICE_UNAVAILABLE" });
	});

	it("no se pueden fabricar claims sin la marca del emisor", () => {
		expect(VerifiedClaims.fromPayload(Symbol("VerifiedClaims"), { sub: "x" }, "k1")).toBeNull();
	});
});
