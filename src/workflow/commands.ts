import { baseNameFromDevelopment, developmentBranch, pullRequestBranch } from "../branches/naming.js";
import { toWorkflowError, WorkflowError } from "../errors.js";
import type { VersionControlService } from "../git/service.js";
import { formatUpdateFromMessage } from "../git/update-marker.js";
import { inferMessageFromDevBranch } from "../reconcile/message-inference.js";
import { preparePrBranch } from "../reconcile/pr-branch.js";
import { squashAndCommit, squashMergeOrDiscard } from "../reconcile/squash.js";

export interface CreateDevelopmentBranchParams {
	baseName: string;
	parentBranch: string;
	enableUpdates: boolean;
}

export type CreateDevelopmentBranchResult =
	| { status: "created"; branch: string }
	| { status: "failed"; error: WorkflowError };

export interface SyncPullRequestBranchParams {
	/** Base name of the pull-request branch; taken from the current development branch when omitted. */
	branch?: string;
	parentBranch: string;
	/** Base name of the development branch to squash; defaults to `branch`. */
	devName?: string;
}

export type MessageSource = "pr-branch" | "dev-branch" | "default";

export interface ResolvedSync {
	prBranch: string;
	devBranch: string;
	parentBranch: string;
}

export type SyncPullRequestBranchResult =
	| ({ status: "committed"; messageSource: MessageSource } & ResolvedSync)
	| ({ status: "no-changes" } & ResolvedSync)
	| { status: "failed"; error: WorkflowError };

export async function createDevelopmentBranch(
	vcs: VersionControlService,
	params: CreateDevelopmentBranchParams,
): Promise<CreateDevelopmentBranchResult> {
	const branch = developmentBranch(params.baseName);
	try {
		await vcs.checkout(params.parentBranch);
		await vcs.createBranch(branch);
		if (params.enableUpdates) {
			await squashMergeOrDiscard(vcs, params.parentBranch, branch);
			await vcs.commit({ message: formatUpdateFromMessage(params.parentBranch), allowEmpty: true });
		}
	} catch (err) {
		return { status: "failed", error: toWorkflowError(err) };
	}
	console.error(`[prsync] Created ${branch} from ${params.parentBranch}`);
	return { status: "created", branch };
}

async function resolveSync(vcs: VersionControlService, params: SyncPullRequestBranchParams): Promise<ResolvedSync> {
	let target = params.branch;
	if (target === undefined) {
		const current = await vcs.currentBranch();
		const inferred = baseNameFromDevelopment(current);
		if (inferred === null) {
			throw new WorkflowError(
				"naming-mismatch",
				`Current branch ${current} is not a development branch (${developmentBranch("<name>")}); pass a branch name.`,
			);
		}
		target = inferred;
	}

	const devBranch = developmentBranch(params.devName ?? target);
	if (!(await vcs.branchExists(devBranch))) {
		throw new WorkflowError("no-such-development-branch", `Development branch ${devBranch} does not exist.`);
	}

	return { prBranch: pullRequestBranch(target), devBranch, parentBranch: params.parentBranch };
}

export async function syncPullRequestBranch(
	vcs: VersionControlService,
	params: SyncPullRequestBranchParams,
): Promise<SyncPullRequestBranchResult> {
	try {
		const resolved = await resolveSync(vcs, params);
		const { prBranch, devBranch, parentBranch } = resolved;

		let messageSource: MessageSource = "pr-branch";
		let carriedMessage = await preparePrBranch(vcs, prBranch, parentBranch);
		if (carriedMessage === null) {
			carriedMessage = await inferMessageFromDevBranch(vcs, devBranch, parentBranch);
			messageSource = carriedMessage === null ? "default" : "dev-branch";
		}

		const outcome = await squashAndCommit(vcs, { devBranch, parentBranch, carriedMessage });
		if (outcome.status === "no-changes") {
			console.error(`[prsync] No changes to squash from ${devBranch}`);
			return { status: "no-changes", ...resolved };
		}

		console.error(`[prsync] Committed ${devBranch} onto ${prBranch} (message from ${messageSource})`);
		return { status: "committed", messageSource, ...resolved };
	} catch (err) {
		return { status: "failed", error: toWorkflowError(err) };
	}
}
