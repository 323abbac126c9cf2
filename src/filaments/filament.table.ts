export const FILAMENT_TYPES = ['PLA', 'PETG', 'ABS', 'TPU', 'NYLON', 'ASA'] as const;

export type FilamentType = (typeof FILAMENT_TYPES)[number];

export interface FilamentEntry {
	readonly name: FilamentType;
	readonly densityGramsPerCm3: number;
}

export type FilamentTable = Readonly<Record<FilamentType, number>>;

// g/cm³
export const FILAMENT_DENSITIES: FilamentTable = Object.freeze({
	PLA: 1.24,
	PETG: 1.27,
	ABS: 1.04,
	TPU: 1.21,
	NYLON: 1.14,
	ASA: 1.07,
});

export function isFilamentType(name: string): name is FilamentType {
	return FILAMENT_TYPES.some(type => type === name);
}

/**
 * Case-insensitive lookup; returns undefined for names outside the table.
 */
export function findFilament(name: string, table: FilamentTable = FILAMENT_DENSITIES): FilamentEntry | undefined {
	const key = name.trim().toUpperCase();
	if (!isFilamentType(key)) return undefined;
	return { name: key, densityGramsPerCm3: table[key] };
}

export function listFilaments(table: FilamentTable = FILAMENT_DENSITIES): FilamentEntry[] {
	return FILAMENT_TYPES.map(name => ({ name, densityGramsPerCm3: table[name] }));
}
