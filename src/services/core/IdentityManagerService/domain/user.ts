import { Schema } from "mongoose";

/**
 * Usuario del sistema. Pertenece a exactamente una organización.
 * Nunca se elimina: la desactivación es terminal.
 */
export interface User {
	id: string;
	/** Normalizado (trim + lowercase) */
	email: string;
	/** `salt:hash` en hex (PBKDF2-SHA512) */
	passwordHash: string;
	organizationId: string;
	roleIds: string[];
	isActive: boolean;
	createdAt: Date;
	updatedAt: Date;
	lastLoginAt?: Date;
}

/**
 * Vista pública del usuario (sin hash)
 */
export type PublicUser = Omit<User, "passwordHash">;

export function toPublicUser(user: User): PublicUser {
	const { passwordHash: _hash, ...rest } = user;
	return rest;
}

export function normalizeEmail(email: string): string {
	return email.trim().toLowerCase();
}

export const userSchema = new Schema<User>(
	{
		id: { type: String, required: true, unique: true },
		email: { type: String, required: true, unique: true, lowercase: true, trim: true },
		passwordHash: { type: String, required: true },
		organizationId: { type: String, required: true, index: true },
		roleIds: { type: [String], default: [], index: true },
		isActive: { type: Boolean, default: true },
		createdAt: { type: Date, default: Date.now },
		updatedAt: { type: Date, default: Date.now },
		lastLoginAt: Date,
	},
	{ id: false } // Disable Mongoose virtual id getter to avoid conflicts with custom id field
);
