/**
 * Código comodín: concede cualquier permiso
 */
export const WILDCARD = "*" as const;

const SEGMENT = "[a-z][a-z0-9_-]*";
const CODE_PATTERN = new RegExp(`^(\\*|${SEGMENT}:(\\*|${SEGMENT}))$`);

/**
 * Código de permiso `recurso:acción` (`*` y `recurso:*` son comodines)
 */
export type PermissionCode = string;

export function isPermissionCode(value: string): value is PermissionCode {
	return CODE_PATTERN.test(value);
}

/**
 * Verifica si un conjunto de permisos concede el código pedido.
 * Agregar códigos al conjunto nunca convierte un `true` en `false`.
 */
export function grants(granted: ReadonlySet<PermissionCode>, requested: PermissionCode): boolean {
	if (granted.has(WILDCARD) || granted.has(requested)) return true;

	const separator = requested.indexOf(":");
	if (separator <= 0) return false;
	return granted.has(`${requested.slice(0, separator)}:${WILDCARD}`);
}
