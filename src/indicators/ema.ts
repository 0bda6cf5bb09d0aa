export function ema(series: readonly number[], length: number): number {
	if (series.length === 0) return Number.NaN;
	if (series.length < length || length < 1) {
		return series[series.length - 1];
	}

	const k = 2 / (length + 1);
	let value = series[series.length - length];
	for (const close of series.slice(series.length - length + 1)) {
		value = close * k + value * (1 - k);
	}
	return value;
}
