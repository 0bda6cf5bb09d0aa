export type Clock = () => number;

export const systemClock: Clock = () => Date.now();

function pad(value: number): string {
	return String(value).padStart(2, "0");
}

export function localDay(timestampMs: number): string {
	const date = new Date(timestampMs);
	return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

export function formatUtcDateTime(timestampMs: number): string {
	const date = new Date(timestampMs);
	return `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(
		date.getUTCDate(),
	)} ${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(
		date.getUTCSeconds(),
	)}`;
}
