import type { Logger } from "./logger";
import { KeyedMutex } from "./mutex";
import { isRecord, readJson, writeJson } from "./storage";

export type Guard<V> = (value: unknown) => value is V;

export type Updater<V> = (current: V | undefined) => V | undefined;

export interface KeyValueStore<V> {
	get(key: string): Promise<V | undefined>;
	put(key: string, value: V): Promise<void>;
	delete(key: string): Promise<boolean>;
	/** Returning `undefined` from the updater deletes the key. */
	update(key: string, updater: Updater<V>): Promise<V | undefined>;
	deleteWhere(predicate: (value: V, key: string) => boolean): Promise<number>;
	entries(): Promise<Array<[string, V]>>;
}

const LOCK_KEY = "store";

abstract class SerializedStore<V> implements KeyValueStore<V> {
	private readonly mutex = new KeyedMutex();
	private state: Map<string, V> | null = null;

	protected abstract load(): Promise<Map<string, V>>;

	protected abstract persist(state: Map<string, V>): Promise<void>;

	get(key: string): Promise<V | undefined> {
		return this.locked(async (state) => {
			const value = state.get(key);
			return value === undefined ? undefined : structuredClone(value);
		});
	}

	put(key: string, value: V): Promise<void> {
		return this.locked(async (state) => {
			state.set(key, structuredClone(value));
			await this.persist(state);
		});
	}

	delete(key: string): Promise<boolean> {
		return this.locked(async (state) => {
			const existed = state.delete(key);
			if (existed) await this.persist(state);
			return existed;
		});
	}

	update(key: string, updater: Updater<V>): Promise<V | undefined> {
		return this.locked(async (state) => {
			const current = state.get(key);
			const next = updater(
				current === undefined ? undefined : structuredClone(current),
			);
			if (next === undefined) {
				if (state.delete(key)) await this.persist(state);
				return undefined;
			}
			state.set(key, structuredClone(next));
			await this.persist(state);
			return structuredClone(next);
		});
	}

	deleteWhere(predicate: (value: V, key: string) => boolean): Promise<number> {
		return this.locked(async (state) => {
			let removed = 0;
			for (const [key, value] of [...state.entries()]) {
				if (predicate(value, key)) {
					state.delete(key);
					removed++;
				}
			}
			if (removed > 0) await this.persist(state);
			return removed;
		});
	}

	entries(): Promise<Array<[string, V]>> {
		return this.locked(async (state) =>
			[...state.entries()].map(
				([key, value]): [string, V] => [key, structuredClone(value)],
			),
		);
	}

	private locked<T>(task: (state: Map<string, V>) => Promise<T>): Promise<T> {
		return this.mutex.run(LOCK_KEY, async () => {
			if (!this.state) {
				this.state = await this.load();
			}
			return task(this.state);
		});
	}
}

export class MemoryStore<V> extends SerializedStore<V> {
	constructor(private readonly initial: Iterable<[string, V]> = []) {
		super();
	}

	protected async load(): Promise<Map<string, V>> {
		return new Map(this.initial);
	}

	protected async persist(): Promise<void> {}
}

export type JsonFileStoreOptions<V> = {
	filePath: string;
	isValue: Guard<V>;
	logger: Logger;
};

// Unreadable files and malformed entries load as absent.
export class JsonFileStore<V> extends SerializedStore<V> {
	private readonly filePath: string;
	private readonly isValue: Guard<V>;
	private readonly log: Logger;

	constructor(options: JsonFileStoreOptions<V>) {
		super();
		this.filePath = options.filePath;
		this.isValue = options.isValue;
		this.log = options.logger;
	}

	protected async load(): Promise<Map<string, V>> {
		let raw: unknown;
		try {
			raw = await readJson(this.filePath, {});
		} catch (error) {
			this.log.warn(
				{ file: this.filePath, error },
				"Store file unreadable, starting empty",
			);
			return new Map();
		}

		if (!isRecord(raw)) {
			this.log.warn({ file: this.filePath }, "Store file is not an object");
			return new Map();
		}

		const state = new Map<string, V>();
		for (const [key, value] of Object.entries(raw)) {
			if (this.isValue(value)) {
				state.set(key, value);
			} else {
				this.log.warn({ file: this.filePath, key }, "Dropping malformed entry");
			}
		}
		return state;
	}

	protected async persist(state: Map<string, V>): Promise<void> {
		try {
			await writeJson(this.filePath, Object.fromEntries(state));
		} catch (error) {
			this.log.error({ file: this.filePath, error }, "Failed to persist store");
		}
	}
}
