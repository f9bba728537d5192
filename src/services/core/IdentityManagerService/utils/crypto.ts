import * as crypto from "node:crypto";
import { promisify } from "node:util";

const pbkdf2 = promisify(crypto.pbkdf2);

const ITERATIONS = 100000;
const KEY_LENGTH = 64;
const SALT_BYTES = 16;
const DIGEST = "sha512";
const HASH_PATTERN = /^([0-9a-f]{32}):([0-9a-f]{128})$/;

/**
 * Hash de relleno para usuarios inexistentes: el costo de derivación es el
 * mismo que con un usuario real y nunca verifica.
 */
const DUMMY_HASH = `${"0".repeat(SALT_BYTES * 2)}:${"0".repeat(KEY_LENGTH * 2)}`;

export function generateId(): string {
	return crypto.randomUUID();
}

export async function hashPassword(password: string): Promise<string> {
	const salt = crypto.randomBytes(SALT_BYTES).toString("hex");
	const hash = await pbkdf2(password, salt, ITERATIONS, KEY_LENGTH, DIGEST);
	return `${salt}:${hash.toString("hex")}`;
}

/**
 * Verifica un password contra su hash almacenado en tiempo constante.
 * Con `passwordHash = null` (usuario desconocido) deriva contra el hash de
 * relleno y devuelve false. Un hash mal formado también devuelve false.
 */
export async function verifyPassword(password: string, passwordHash: string | null): Promise<boolean> {
	const match = HASH_PATTERN.exec(passwordHash ?? DUMMY_HASH);
	const [salt, hash] = match ? [match[1], match[2]] : DUMMY_HASH.split(":");

	const computed = await pbkdf2(password, salt, ITERATIONS, KEY_LENGTH, DIGEST);
	const expected = Buffer.from(hash, "hex");
	const equal = crypto.timingSafeEqual(computed, expected);

	return equal && match !== null && passwordHash !== null;
}
