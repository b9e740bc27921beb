const pad = (value: number, length = 2) => String(value).padStart(length, "0");

/** `DD-MM-YYYY`, used as the day key of routine totals. */
export function formatDayKey(date: Date): string {
	return `${pad(date.getUTCDate())}-${pad(date.getUTCMonth() + 1)}-${date.getUTCFullYear()}`;
}

/** `DD/MM/YY` */
export function formatShortDate(date: Date): string {
	return `${pad(date.getUTCDate())}/${pad(date.getUTCMonth() + 1)}/${pad(date.getUTCFullYear() % 100)}`;
}

/** `HH:MM:SS DD-MM-YYYY` */
export function formatTimestamp(date: Date): string {
	return `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())} ${formatDayKey(date)}`;
}

/** `MMDDYYYY_HHMMSS_ffffff` in local time; microseconds are padded milliseconds. */
export function formatFileStamp(date: Date): string {
	return [
		`${pad(date.getMonth() + 1)}${pad(date.getDate())}${date.getFullYear()}`,
		`${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`,
		pad(date.getMilliseconds() * 1000, 6),
	].join("_");
}
