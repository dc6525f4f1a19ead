import { readFile, writeFile } from "node:fs/promises";

/** A squash message of this many lines or fewer lists no commits. */
export const TRIVIAL_SQUASH_LINES = 3;

export function countLines(text: string): number {
	if (text === "") {
		return 0;
	}
	return text.replace(/\n$/, "").split("\n").length;
}

export const DEFAULT_COMMENT_CHAR = "#";

export function scissorsLine(commentChar: string): string {
	return `${commentChar} ------------------------ >8 ------------------------`;
}

export function commentOut(line: string, commentChar: string = DEFAULT_COMMENT_CHAR): string {
	if (line.startsWith(commentChar)) {
		return line;
	}
	return line === "" ? commentChar : `${commentChar} ${line}`;
}

/**
 * Puts `carried` in front of the previous default message. The previous lines
 * follow a scissors line, so a scissors cleanup drops them and leaves the
 * carried text as written, comment-led lines included.
 */
export function composeCarriedMessage(
	carried: string,
	previous: string,
	commentChar: string = DEFAULT_COMMENT_CHAR,
): string {
	const lines = previous === "" ? [] : previous.replace(/\n$/, "").split("\n");
	const commented = lines.map((line) => commentOut(line, commentChar));
	return [carried, "", scissorsLine(commentChar), ...commented].join("\n") + "\n";
}

export async function readMessageBuffer(path: string): Promise<string> {
	try {
		return await readFile(path, "utf-8");
	} catch (err) {
		if (err instanceof Error && "code" in err && err.code === "ENOENT") {
			return "";
		}
		throw err;
	}
}

/** Reads the whole buffer before writing it back; no handle stays open in between. */
export async function rewriteMessageBuffer(
	path: string,
	carried: string,
	commentChar: string = DEFAULT_COMMENT_CHAR,
): Promise<string> {
	const previous = await readMessageBuffer(path);
	const next = composeCarriedMessage(carried, previous, commentChar);
	await writeFile(path, next, "utf-8");
	return next;
}
