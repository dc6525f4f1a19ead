export const DEVELOPMENT_PREFIX = "dev/";
export const PULL_REQUEST_PREFIX = "pr/";

export function developmentBranch(baseName: string): string {
	return `${DEVELOPMENT_PREFIX}${baseName}`;
}

export function pullRequestBranch(baseName: string): string {
	return `${PULL_REQUEST_PREFIX}${baseName}`;
}

/** Inverse of developmentBranch; null when the name is not a development branch. */
export function baseNameFromDevelopment(branch: string): string | null {
	if (!branch.startsWith(DEVELOPMENT_PREFIX)) {
		return null;
	}
	const baseName = branch.slice(DEVELOPMENT_PREFIX.length);
	return baseName.length > 0 ? baseName : null;
}
