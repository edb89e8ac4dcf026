import fg from "fast-glob";
import fs from "node:fs/promises";
import path from "node:path";

export const MODEL_TYPES: ReadonlyArray<ModelType> = ["aesthetic", "technical"];

/** Extensions the prediction script can decode */
export const IMAGE_EXTS = ["jpg", "jpeg", "png"];

export function modelsFor(selection: ModelSelection): ModelType[] {
	return selection === "both" ? [...MODEL_TYPES] : [selection];
}

function buildGlobPattern(exts: string[]): string {
	if (exts.length === 1) return `*.${exts[0]}`;
	return `*.{${exts.join(",")}}`;
}

/** Non-recursive listing of images in `cwd`, sorted by file name. */
export async function getFilesInFolder(
	cwd: string,
	exts: string[] = IMAGE_EXTS,
): Promise<ImageList> {
	const pattern = buildGlobPattern(exts);
	const filesRel = await fg([pattern], {
		cwd: cwd,
		onlyFiles: true,
		unique: true,
		dot: false,
		caseSensitiveMatch: false,
	});
	return filesRel.sort().map((f) => path.join(cwd, f));
}

/** True when the directory is missing or has no entries at all. */
export async function isDirEmpty(dir: string): Promise<boolean> {
	try {
		const entries = await fs.readdir(dir);
		return entries.length === 0;
	} catch (err) {
		if (isErrnoException(err) && (err.code === "ENOENT" || err.code === "ENOTDIR")) {
			return true;
		}
		throw err;
	}
}

export async function pathExists(p: string): Promise<boolean> {
	return fs
		.access(p)
		.then(() => true)
		.catch(() => false);
}

/** Exists and is not zero bytes */
export async function isNonEmptyFile(p: string): Promise<boolean> {
	const stat = await fs.stat(p).catch(() => null);
	return !!stat && stat.isFile() && stat.size > 0;
}

export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
	return err instanceof Error && "code" in err;
}
