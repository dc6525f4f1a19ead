import { resolve } from "node:path";

export interface WorkflowConfig {
	repoPath: string;
	parentBranch: string;
	verbose: boolean;
}

export const DEFAULT_PARENT_BRANCH = "master";

export function defaultConfig(overrides: Partial<WorkflowConfig> = {}): WorkflowConfig {
	return {
		repoPath: resolve(overrides.repoPath ?? process.cwd()),
		parentBranch: overrides.parentBranch ?? DEFAULT_PARENT_BRANCH,
		verbose: overrides.verbose ?? false,
	};
}
