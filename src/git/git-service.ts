import { rm } from "node:fs/promises";
import { resolve } from "node:path";
import { WorkflowError } from "../errors.js";
import { DEFAULT_COMMENT_CHAR, readMessageBuffer } from "../reconcile/message-buffer.js";
import { ExecError, type ExecResult, exec, formatCommand } from "../utils/exec.js";
import type { CommitOptions, LogRange, SquashResult, VersionControlService } from "./service.js";

export interface GitServiceOptions {
	repoPath: string;
	verbose?: boolean;
}

const SQUASH_MSG = "SQUASH_MSG";

export class GitService implements VersionControlService {
	private readonly repoPath: string;
	private readonly verbose: boolean;

	constructor(options: GitServiceOptions) {
		this.repoPath = options.repoPath;
		this.verbose = options.verbose ?? false;
	}

	private git(args: string[], env?: Record<string, string>): Promise<ExecResult> {
		if (this.verbose) {
			console.error(`[prsync] $ ${formatCommand("git", args)}`);
		}
		return exec("git", args, { cwd: this.repoPath, env: env && { ...process.env, ...env } });
	}

	async currentBranch(): Promise<string> {
		try {
			const { stdout } = await this.git(["symbolic-ref", "--short", "-q", "HEAD"]);
			return stdout.trim();
		} catch (err) {
			if (err instanceof ExecError && err.exitCode === 1) {
				throw new WorkflowError("not-on-a-branch", "HEAD is detached; check out a branch first.", {
					cause: err,
				});
			}
			throw err;
		}
	}

	async checkout(branch: string): Promise<void> {
		await this.git(["checkout", branch]);
	}

	async createBranch(name: string): Promise<void> {
		await this.git(["checkout", "-b", name]);
	}

	async resetHard(target: string): Promise<void> {
		await this.git(["reset", "--hard", target]);
	}

	async branchExists(name: string): Promise<boolean> {
		try {
			await this.git(["rev-parse", "--verify", "--quiet", `refs/heads/${name}`]);
			return true;
		} catch (err) {
			if (err instanceof ExecError && err.exitCode === 1) {
				return false;
			}
			throw err;
		}
	}

	async squashMerge(source: string): Promise<SquashResult> {
		const bufferPath = await this.messageBufferPath();
		// An "already up to date" merge writes no buffer, so a leftover one must not be mistaken for it.
		await rm(bufferPath, { force: true });

		try {
			await this.git(["merge", "--squash", source]);
		} catch (err) {
			const paths = await this.conflictedPaths();
			if (paths.length > 0) {
				return { status: "conflict", paths };
			}
			throw err;
		}

		return { status: "merged", message: await readMessageBuffer(bufferPath) };
	}

	private async conflictedPaths(): Promise<string[]> {
		const { stdout } = await this.git(["diff", "--name-only", "--diff-filter=U"]);
		return stdout.split("\n").filter((line) => line.length > 0);
	}

	async discardAllChanges(): Promise<void> {
		await this.git(["reset", "--hard", "HEAD"]);
	}

	async commit(options: CommitOptions): Promise<void> {
		const allowEmpty = options.allowEmpty ? ["--allow-empty"] : [];
		if (options.message !== undefined) {
			await this.git(["commit", "-m", options.message, ...allowEmpty]);
			return;
		}
		// git only honours scissors when the message goes through an editor; a no-op one keeps it unattended.
		const commentChar = await this.commentChar();
		await this.git(
			[
				"-c",
				`core.commentChar=${commentChar}`,
				"commit",
				"-F",
				await this.messageBufferPath(),
				"-e",
				"--cleanup=scissors",
				...allowEmpty,
			],
			{ GIT_EDITOR: "true" },
		);
	}

	async getCommitMessage(ref: string): Promise<string> {
		const { stdout } = await this.git(["log", "-1", "--format=%B", ref]);
		return stdout.replace(/\n+$/, "");
	}

	async commonAncestor(a: string, b: string): Promise<string> {
		const { stdout } = await this.git(["merge-base", a, b]);
		return stdout.trim();
	}

	async aheadCounts(a: string, b: string): Promise<[number, number]> {
		const { stdout } = await this.git(["rev-list", "--left-right", "--count", `${a}...${b}`]);
		const [left, right] = stdout.trim().split(/\s+/);
		const aAhead = Number.parseInt(left ?? "", 10);
		const bAhead = Number.parseInt(right ?? "", 10);
		if (Number.isNaN(aAhead) || Number.isNaN(bAhead)) {
			throw new Error(`Unexpected rev-list output for ${a}...${b}: '${stdout.trim()}'`);
		}
		return [aAhead, bAhead];
	}

	async logCommits(range: LogRange, excludePattern: string): Promise<string[]> {
		const { stdout } = await this.git([
			"log",
			"--format=%H",
			"--invert-grep",
			`--grep=${excludePattern}`,
			`${range.from}..${range.to}`,
		]);
		return stdout.split("\n").filter((line) => line.length > 0);
	}

	async repoRoot(): Promise<string> {
		const { stdout } = await this.git(["rev-parse", "--show-toplevel"]);
		return stdout.trim();
	}

	async commentChar(): Promise<string> {
		try {
			const { stdout } = await this.git(["config", "--get", "core.commentChar"]);
			const value = stdout.replace(/\n$/, "");
			// "auto" lets git pick per message; the buffer needs one fixed character.
			return value === "" || value === "auto" ? DEFAULT_COMMENT_CHAR : value;
		} catch (err) {
			if (err instanceof ExecError && err.exitCode === 1) {
				return DEFAULT_COMMENT_CHAR;
			}
			throw err;
		}
	}

	async messageBufferPath(): Promise<string> {
		const { stdout } = await this.git(["rev-parse", "--git-path", SQUASH_MSG]);
		return resolve(this.repoPath, stdout.trim());
	}
}
