import { describe, expect, it } from "vitest";
import { generateId, hashPassword, verifyPassword } from "../utils/crypto.js";

describe("hashPassword / verifyPassword", () => {
	it("guarda salt y hash en hex", async () => {
		const hash = await hashPassword("correct horse");
		expect(hash).toMatch(/^[0-9a-f]{32}:[0-9a-f]{128}$/);
	});

	it("usa un salt distinto en cada hash", async () => {
		const [first, second] = await Promise.all([hashPassword("correct horse"), hashPassword("correct horse")]);
		expect(first).not.toBe(second);
	});

	it("verifica el password correcto y rechaza otro", async () => {
		const hash = await hashPassword("correct horse");
		await expect(verifyPassword("correct horse", hash)).resolves.toBe(true);
		await expect(verifyPassword("Correct horse", hash)).resolves.toBe(false);
	});

	it("sin hash (usuario desconocido) devuelve false", async () => {
		await expect(verifyPassword("cualquiera", null)).resolves.toBe(false);
	});

	it("un hash mal formado devuelve false", async () => {
		await expect(verifyPassword("cualquiera", "no-es-un-hash")).resolves.toBe(false);
	});
});

describe("generateId", () => {
	it("genera UUIDs", () => {
		expect(generateId()).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
		expect(generateId()).not.toBe(generateId());
	});
});
