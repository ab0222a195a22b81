export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
	return error instanceof Error && 'code' in error;
}

export function parseJson(text: string): unknown {
	return JSON.parse(text);
}

/** Splits a comma-separated list, dropping blanks. */
export function splitList(value: string | undefined): string[] {
	if (!value) {
		return [];
	}

	return value.split(',').map(item => item.trim()).filter(Boolean);
}
