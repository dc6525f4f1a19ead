/**
 * Marker that opens the message of a "pull updates from parent" commit on a
 * development branch. Such commits never supply a pull-request message.
 */
export const UPDATE_FROM_PREFIX = "!update-from:";

// Matches per line, both as a git --grep pattern and as a RegExp with the "m" flag.
export const UPDATE_FROM_PATTERN = "^!update-from:";

export function formatUpdateFromMessage(parentBranch: string): string {
	return `${UPDATE_FROM_PREFIX} ${parentBranch}`;
}
