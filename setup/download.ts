import axios from "axios";
import { createWriteStream } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";
import type { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";

/** Saves the body at `url` to `dest` */
export type Fetcher = (url: string, dest: string) => Promise<void>;

export const downloadFile: Fetcher = async (url, dest) => {
	await fs.mkdir(path.dirname(dest), { recursive: true });

	const response = await axios.get<Readable>(url, {
		responseType: "stream",
		maxRedirects: 10,
	});

	try {
		await pipeline(response.data, createWriteStream(dest));
	} catch (err) {
		await fs.rm(dest, { force: true });
		throw err;
	}
};
