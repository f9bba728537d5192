import { Schema } from "mongoose";

/**
 * Organización (tenant). Frontera de aislamiento de usuarios y roles.
 */
export interface Organization {
	id: string;
	name: string;
	isActive: boolean;
	createdAt: Date;
	updatedAt: Date;
}

export const organizationSchema = new Schema<Organization>(
	{
		id: { type: String, required: true, unique: true },
		name: { type: String, required: true, trim: true },
		isActive: { type: Boolean, default: true },
		createdAt: { type: Date, default: Date.now },
		updatedAt: { type: Date, default: Date.now },
	},
	{ id: false }
);
