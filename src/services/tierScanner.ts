import { defer, from, lastValueFrom, of } from "rxjs";
import { catchError, filter, map, mergeMap, timeout, toArray } from "rxjs/operators";
import type { BreakoutSignal, Candle, ScanTier } from "../types";
import type { ScannerContext } from "./context";

const DEFAULT_PRIORITY = 50;

/** Highest priority first, ties in reverse alphabetical order. */
export function prioritizeSymbols(
	symbols: readonly string[],
	priority: Readonly<Record<string, number>>,
	maxSymbols = 0,
): string[] {
	const rank = (symbol: string) => priority[symbol] ?? DEFAULT_PRIORITY;
	const sorted = [...new Set(symbols)].sort((a, b) => {
		const diff = rank(b) - rank(a);
		if (diff !== 0) return diff;
		return a < b ? 1 : a > b ? -1 : 0;
	});
	return maxSymbols > 0 ? sorted.slice(0, maxSymbols) : sorted;
}

function detect(
	ctx: ScannerContext,
	tier: ScanTier,
	symbol: string,
	candles: Candle[],
): Promise<BreakoutSignal | null> {
	if (!candles.length) {
		return Promise.resolve(null);
	}
	return ctx.detector.detectBreakout(symbol, tier.interval, candles, tier.name);
}

// Only the fetch is time-bounded; detection writes positions.
export async function scanTier(
	ctx: ScannerContext,
	tier: ScanTier,
): Promise<BreakoutSignal[]> {
	const { concurrency, symbolTimeoutMs, maxSymbolsPerScan } = ctx.config.scan;
	const symbols = prioritizeSymbols(tier.symbols, ctx.priority, maxSymbolsPerScan);
	const log = ctx.logger.child({ tier: tier.name });

	log.info(
		{ scanning: symbols.length, total: tier.symbols.length, interval: tier.interval },
		"Scanning tier",
	);

	const signals = await lastValueFrom(
		from(symbols).pipe(
			mergeMap(
				(symbol) =>
					defer(() =>
						ctx.fetcher.fetchCandles(symbol, tier.interval, ctx.config.scan.outputSize),
					).pipe(
						timeout({ first: symbolTimeoutMs }),
						mergeMap((candles) => detect(ctx, tier, symbol, candles)),
						catchError((error: unknown) => {
							log.error({ symbol, error }, "Failed to scan symbol");
							return of(null);
						}),
					),
				concurrency,
			),
			filter((signal): signal is BreakoutSignal => Boolean(signal)),
			toArray(),
			map((list) => list.sort((a, b) => b.strength - a.strength)),
		),
	);

	log.info({ signals: signals.length }, "Tier scan finished");
	return signals;
}
