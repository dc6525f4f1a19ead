import { WorkflowError } from "../errors.js";
import type { VersionControlService } from "../git/service.js";
import { countLines, rewriteMessageBuffer, TRIVIAL_SQUASH_LINES } from "./message-buffer.js";

export interface SquashAndCommitOptions {
	devBranch: string;
	parentBranch: string;
	carriedMessage: string | null;
}

export type SquashOutcome = { status: "committed" } | { status: "no-changes" };

function conflictError(source: string, target: string, paths: string[]): WorkflowError {
	return new WorkflowError(
		"merge-conflict",
		`Merging ${source} into ${target} produced conflicts in: ${paths.join(", ")}`,
	);
}

/**
 * Squashes `devBranch` onto the checked-out branch and commits it.
 *
 * A conflicted merge is left in place for the operator to resolve. The no-op
 * check runs before the carried message is applied, so a carried message is
 * dropped along with an empty squash.
 */
export async function squashAndCommit(
	vcs: VersionControlService,
	options: SquashAndCommitOptions,
): Promise<SquashOutcome> {
	const { devBranch, parentBranch, carriedMessage } = options;

	const result = await vcs.squashMerge(devBranch);
	if (result.status === "conflict") {
		throw conflictError(devBranch, parentBranch, result.paths);
	}

	if (countLines(result.message) <= TRIVIAL_SQUASH_LINES) {
		return { status: "no-changes" };
	}

	if (carriedMessage !== null) {
		await rewriteMessageBuffer(await vcs.messageBufferPath(), carriedMessage, await vcs.commentChar());
	}

	await vcs.commit({ allowEmpty: true });
	return { status: "committed" };
}

/**
 * Squash merge that never leaves a conflicted tree behind: on conflict every
 * staged and working change is discarded before the error is raised.
 */
export async function squashMergeOrDiscard(
	vcs: VersionControlService,
	source: string,
	target: string,
): Promise<string> {
	const result = await vcs.squashMerge(source);
	if (result.status === "conflict") {
		await vcs.discardAllChanges();
		throw conflictError(source, target, result.paths);
	}
	return result.message;
}
