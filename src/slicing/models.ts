export interface UploadedModel {
	name: string;
	data: Buffer;
}

export interface SliceRequest {
	sourceFile: UploadedModel;
	layerHeight: number;
	infillDensity: number;
	wallCount: number;
	filamentType: string;
	/** Supersedes the table density for filamentType when set. */
	filamentDensityOverride?: number;
}

export interface ScratchPaths {
	inputPath: string;
	outputPath: string;
}

export interface ExternalToolResult {
	exitCode: number;
	stdout: string;
	generatedOutputPath?: string;
}

export interface ParsedReport {
	printTimeMinutes: number;
	filamentLengthMm: number;
}

export interface FilamentUsage {
	volumeCm3: number;
	weightG: number;
}
