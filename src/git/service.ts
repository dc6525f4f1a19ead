/**
 * Operations the reconciler performs against a repository.
 *
 * An implementation owns one checkout: the current branch, the index and the
 * working tree are shared mutable state that every call observes and may
 * change. Calls must be awaited one at a time, and no second workflow may run
 * against the same repository concurrently. Nothing here locks.
 */

export type SquashResult =
	| {
			status: "merged";
			/** Default squash message git prepared; empty when already up to date. */
			message: string;
	  }
	| {
			status: "conflict";
			paths: string[];
	  };

export interface CommitOptions {
	/**
	 * Explicit message. When omitted, the message buffer is committed with
	 * everything from its scissors line on cut away.
	 */
	message?: string;
	allowEmpty: boolean;
}

export interface LogRange {
	from: string;
	to: string;
}

export interface VersionControlService {
	/** Throws a "not-on-a-branch" WorkflowError when HEAD is detached. */
	currentBranch(): Promise<string>;
	checkout(branch: string): Promise<void>;
	/** Creates a branch at HEAD and checks it out. */
	createBranch(name: string): Promise<void>;
	/** Points the current branch at `target`, discarding index and working tree changes. */
	resetHard(target: string): Promise<void>;
	branchExists(name: string): Promise<boolean>;
	/** Stages the changes of `source` onto the current branch without committing. */
	squashMerge(source: string): Promise<SquashResult>;
	discardAllChanges(): Promise<void>;
	commit(options: CommitOptions): Promise<void>;
	getCommitMessage(ref: string): Promise<string>;
	commonAncestor(a: string, b: string): Promise<string>;
	/** Commits `a` and `b` each have beyond their common ancestor, in that order. */
	aheadCounts(a: string, b: string): Promise<[number, number]>;
	/**
	 * Commits reachable from `range.to` but not `range.from`, newest first,
	 * leaving out any commit with a message line matching `excludePattern`.
	 */
	logCommits(range: LogRange, excludePattern: string): Promise<string[]>;
	repoRoot(): Promise<string>;
	/** Location of the default-message buffer a squash merge writes. */
	messageBufferPath(): Promise<string>;
	/** Character that opens comment lines in commit messages. */
	commentChar(): Promise<string>;
}
