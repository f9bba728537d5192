import { Schema } from "mongoose";

/**
 * Permiso del catálogo. El código es estable (`recurso:acción`) y no cambia
 * mientras algún rol lo referencie.
 */
export interface Permission {
	code: string;
	description: string;
	createdAt: Date;
}

export const permissionSchema = new Schema<Permission>(
	{
		code: { type: String, required: true, unique: true },
		description: { type: String, default: "" },
		createdAt: { type: Date, default: Date.now },
	},
	{ id: false }
);
