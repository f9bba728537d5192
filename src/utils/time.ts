/**
 * Fuente de tiempo inyectable (ms desde epoch)
 */
export interface Clock {
	now(): number;
}

export const systemClock: Clock = {
	now: () => Date.now(),
};

const DURATION_MULTIPLIERS: Record<string, number> = {
	s: 1,
	m: 60,
	h: 60 * 60,
	d: 24 * 60 * 60,
	w: 7 * 24 * 60 * 60,
};

/**
 * Parsea un string de duración (`15m`, `30d`, `3600s`) a segundos
 * @throws Error si el formato no es válido
 */
export function parseDuration(value: string): number {
	const match = /^(\d+)([smhdw])$/.exec(value.trim());
	if (!match) {
		throw new Error(`Duración inválida: "${value}" (formato esperado: <n>[smhdw])`);
	}

	const amount = Number.parseInt(match[1], 10);
	const seconds = amount * DURATION_MULTIPLIERS[match[2]];
	if (seconds <= 0) {
		throw new Error(`La duración debe ser mayor a cero: "${value}"`);
	}
	return seconds;
}

/** Segundos enteros desde epoch para un instante en ms */
export function toEpochSeconds(ms: number): number {
	return Math.floor(ms / 1000);
}
