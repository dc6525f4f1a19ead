import type { VersionControlService } from "../git/service.js";
import { UPDATE_FROM_PATTERN } from "../git/update-marker.js";

/**
 * Message of the single non-trivial commit `devBranch` has since it diverged
 * from `parentBranch`. Null when there are none or several of them.
 */
export async function inferMessageFromDevBranch(
	vcs: VersionControlService,
	devBranch: string,
	parentBranch: string,
): Promise<string | null> {
	const base = await vcs.commonAncestor(devBranch, parentBranch);
	const commits = await vcs.logCommits({ from: base, to: devBranch }, UPDATE_FROM_PATTERN);
	const [only] = commits;
	if (commits.length !== 1 || only === undefined) {
		return null;
	}
	return vcs.getCommitMessage(only);
}
