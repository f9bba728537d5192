export { type User, type PublicUser, userSchema, toPublicUser, normalizeEmail } from "./user.js";
export { type Role, roleSchema, isRoleVisibleTo } from "./role.js";
export { type Organization, organizationSchema } from "./organization.js";
export { type Permission, permissionSchema } from "./permission.js";
