import fs from "node:fs/promises";
import path from "node:path";

function isMissingFile(err: unknown): boolean {
	return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export async function readJson<T>(filePath: string, fallback: T): Promise<T> {
	try {
		const content = await fs.readFile(filePath, "utf8");
		return JSON.parse(content);
	} catch (err: unknown) {
		if (isMissingFile(err)) {
			return fallback;
		}
		throw err;
	}
}

/** Writes through a temp file and renames, so readers never see half a file. */
export async function writeJson(
	filePath: string,
	data: unknown,
): Promise<void> {
	await fs.mkdir(path.dirname(filePath), { recursive: true });
	const tmpPath = `${filePath}.${process.pid}.tmp`;
	await fs.writeFile(tmpPath, JSON.stringify(data, null, 2), "utf8");
	await fs.rename(tmpPath, filePath);
}

export async function appendLine(
	filePath: string,
	line: string,
): Promise<void> {
	await fs.mkdir(path.dirname(filePath), { recursive: true });
	await fs.appendFile(filePath, `${line}\n`, "utf8");
}
