import fs from "node:fs/promises";
import path from "node:path";

export async function readJson(
	filePath: string,
	fallback: unknown,
): Promise<unknown> {
	try {
		const content = await fs.readFile(filePath, "utf8");
		return JSON.parse(content);
	} catch (err: unknown) {
		if (isErrnoException(err) && err.code === "ENOENT") {
			return fallback;
		}
		throw err;
	}
}

export async function writeJson(
	filePath: string,
	data: unknown,
): Promise<void> {
	await fs.mkdir(path.dirname(filePath), { recursive: true });
	const tmpPath = `${filePath}.tmp`;
	await fs.writeFile(tmpPath, JSON.stringify(data, null, 2), "utf8");
	await fs.rename(tmpPath, filePath);
}

export function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
	return err instanceof Error && "code" in err;
}
