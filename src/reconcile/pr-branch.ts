import { WorkflowError } from "../errors.js";
import type { VersionControlService } from "../git/service.js";

/**
 * Leaves `prBranch` checked out at the tip of `parentBranch`.
 *
 * An existing pull-request branch may carry exactly one squashed commit from a
 * previous run; its message is returned so the next commit can reuse it.
 * Anything further ahead is treated as foreign work and nothing is touched.
 */
export async function preparePrBranch(
	vcs: VersionControlService,
	prBranch: string,
	parentBranch: string,
): Promise<string | null> {
	if (!(await vcs.branchExists(prBranch))) {
		await vcs.checkout(parentBranch);
		await vcs.createBranch(prBranch);
		console.error(`[prsync] Created ${prBranch} from ${parentBranch}`);
		return null;
	}

	const [ahead] = await vcs.aheadCounts(prBranch, parentBranch);
	if (ahead > 1) {
		throw new WorkflowError(
			"too-many-foreign-commits",
			`${prBranch} is ${ahead} commits ahead of ${parentBranch}; at most 1 is expected. ` +
				`Inspect ${prBranch} and delete it manually if its commits can be discarded.`,
		);
	}

	const carried = ahead === 1 ? await vcs.getCommitMessage(prBranch) : null;

	await vcs.checkout(prBranch);
	await vcs.resetHard(parentBranch);
	console.error(`[prsync] Reset ${prBranch} to ${parentBranch}`);
	return carried;
}
