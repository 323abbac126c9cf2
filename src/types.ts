export type ServiceStatus = {
	service: string;
	status: 'running';
	version: string;
};

export type FilamentTypesResponse = {
	filament_types: Record<string, number>;
};

// Multipart fields as they arrive from the client; everything is a string.
export type RawSliceFields = {
	layer_height?: string;
	infill_density?: string;
	wall_count?: string;
	filament_type?: string;
	filament_density?: string;
};

export type SliceResponse = {
	success: boolean;
	print_time_minutes: number;
	print_time_formatted: string;
	filament_length_mm: number;
	filament_volume_cm3: number;
	filament_weight_g: number;
	filament_type: string;
	layer_height: number;
	infill_density: number;
	wall_count: number;
};

export type ErrorResponse = {
	detail: string;
};
