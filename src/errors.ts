export const EXIT_CODES = {
	usage: 2,
	input: 3,
	record: 4,
	config: 5,
} as const;

export class WatchlogError extends Error {
	readonly exitCode: number;

	constructor(message: string, exitCode: number, options?: ErrorOptions) {
		super(message, options);
		this.name = new.target.name;
		this.exitCode = exitCode;
	}
}

/** Invalid flag combination. Raised before any file is opened. */
export class UsageError extends WatchlogError {
	constructor(message: string) {
		super(message, EXIT_CODES.usage);
	}
}

/** Missing, unreadable, unsupported or malformed spreadsheet file. */
export class InputFileError extends WatchlogError {
	readonly filePath: string;

	constructor(filePath: string, message: string, options?: ErrorOptions) {
		super(`${message} (file: ${filePath})`, EXIT_CODES.input, options);
		this.filePath = filePath;
	}
}

export class SheetNotFoundError extends WatchlogError {
	constructor(sheetName: string, available: string[]) {
		const known = available.length > 0 ? available.join(", ") : "none";
		super(
			`Sheet '${sheetName}' not found (available: ${known})`,
			EXIT_CODES.input,
		);
	}
}

/** A row is missing a field the mode needs, or holds one it cannot parse. */
export class RecordError extends WatchlogError {
	readonly row: number | undefined;

	constructor(message: string, row?: number) {
		super(row === undefined ? message : `Row ${row}: ${message}`, EXIT_CODES.record);
		this.row = row;
	}
}

export class ConfigError extends WatchlogError {
	constructor(message: string, options?: ErrorOptions) {
		super(message, EXIT_CODES.config, options);
	}
}

/** A single metadata lookup failed. Reported per record, never fatal. */
export class LookupError extends Error {
	readonly videoId: string;

	constructor(videoId: string, message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = "LookupError";
		this.videoId = videoId;
	}
}

export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}
