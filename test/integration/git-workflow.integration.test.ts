import { mkdtemp, readFile, realpath, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { GitService } from "../../src/git/git-service.js";
import { exec } from "../../src/utils/exec.js";
import { createDevelopmentBranch, syncPullRequestBranch } from "../../src/workflow/commands.js";

async function git(dir: string, ...args: string[]): Promise<string> {
	const { stdout } = await exec("git", args, { cwd: dir });
	return stdout.trim();
}

async function commitFile(dir: string, file: string, content: string, message: string): Promise<void> {
	await writeFile(join(dir, file), content);
	await git(dir, "add", file);
	await git(dir, "commit", "-m", message);
}

async function initRepo(dir: string): Promise<void> {
	await git(dir, "init");
	await git(dir, "config", "user.email", "test@test.com");
	await git(dir, "config", "user.name", "Test");
	await git(dir, "config", "commit.gpgsign", "false");
	await git(dir, "symbolic-ref", "HEAD", "refs/heads/master");
	await commitFile(dir, "README.md", "hello\n", "initial commit");
}

describe("GitService against a real repository", () => {
	let tmpDir: string;
	let service: GitService;

	beforeEach(async () => {
		vi.spyOn(console, "error").mockImplementation(() => {});
		tmpDir = await mkdtemp(join(tmpdir(), "prsync-git-"));
		await initRepo(tmpDir);
		service = new GitService({ repoPath: tmpDir });
	});

	afterEach(async () => {
		vi.restoreAllMocks();
		await rm(tmpDir, { recursive: true, force: true });
	});

	async function startFeature(enableUpdates = true): Promise<void> {
		const result = await createDevelopmentBranch(service, { baseName: "feature", parentBranch: "master", enableUpdates });
		expect(result).toEqual({ status: "created", branch: "dev/feature" });
	}

	it("creates a development branch with an update-from marker", async () => {
		await startFeature();

		expect(await service.currentBranch()).toBe("dev/feature");
		expect(await service.aheadCounts("dev/feature", "master")).toEqual([1, 0]);
		expect(await service.getCommitMessage("dev/feature")).toBe("!update-from: master");
	});

	it("squashes the development branch into one pull-request commit", async () => {
		await startFeature();
		await commitFile(tmpDir, "bug.ts", "fixed\n", "fix bug");

		const result = await syncPullRequestBranch(service, { parentBranch: "master" });

		expect(result.status).toBe("committed");
		expect(await service.currentBranch()).toBe("pr/feature");
		expect(await service.aheadCounts("pr/feature", "master")).toEqual([1, 0]);
		expect(await service.getCommitMessage("pr/feature")).toBe("fix bug");
		expect(await git(tmpDir, "show", "pr/feature:bug.ts")).toBe("fixed");
	});

	it("keeps a reworded pull-request message across syncs", async () => {
		await startFeature();
		await commitFile(tmpDir, "bug.ts", "fixed\n", "fix bug");
		await syncPullRequestBranch(service, { parentBranch: "master" });
		await git(tmpDir, "commit", "--amend", "-m", "Fix the off-by-one in pagination");
		await service.checkout("dev/feature");
		await commitFile(tmpDir, "bug.test.ts", "test\n", "more tests");

		const result = await syncPullRequestBranch(service, { parentBranch: "master" });

		expect(result.status).toBe("committed");
		expect(await service.getCommitMessage("pr/feature")).toBe("Fix the off-by-one in pagination");
		expect(await service.aheadCounts("pr/feature", "master")).toEqual([1, 0]);
		expect(await git(tmpDir, "show", "pr/feature:bug.test.ts")).toBe("test");
	});

	it("keeps carried lines that start with the comment character", async () => {
		await startFeature();
		await commitFile(tmpDir, "crash.ts", "fixed\n", "fix crash");
		await syncPullRequestBranch(service, { parentBranch: "master" });
		await git(tmpDir, "commit", "--amend", "--cleanup=verbatim", "-m", "Fix crash\n\n#42 was the root cause");
		await service.checkout("dev/feature");
		await commitFile(tmpDir, "crash.test.ts", "test\n", "crash test");

		const result = await syncPullRequestBranch(service, { parentBranch: "master" });

		expect(result.status).toBe("committed");
		expect(await service.getCommitMessage("pr/feature")).toBe("Fix crash\n\n#42 was the root cause");
	});

	it("follows core.commentChar when carrying a message", async () => {
		await git(tmpDir, "config", "core.commentChar", ";");
		await startFeature();
		await commitFile(tmpDir, "bug.ts", "fixed\n", "fix bug");
		await syncPullRequestBranch(service, { parentBranch: "master" });
		await service.checkout("dev/feature");
		await commitFile(tmpDir, "bug.test.ts", "test\n", "more tests");

		const result = await syncPullRequestBranch(service, { parentBranch: "master" });

		expect(result.status).toBe("committed");
		if (result.status !== "committed") return;
		expect(result.messageSource).toBe("pr-branch");
		expect(await service.getCommitMessage("pr/feature")).toBe("fix bug");
	});

	it("reads the comment character from the repository config", async () => {
		expect(await service.commentChar()).toBe("#");

		await git(tmpDir, "config", "core.commentChar", ";");
		expect(await service.commentChar()).toBe(";");

		await git(tmpDir, "config", "core.commentChar", "auto");
		expect(await service.commentChar()).toBe("#");
	});

	it("reports no changes for an empty development branch", async () => {
		await startFeature(false);

		const result = await syncPullRequestBranch(service, { parentBranch: "master" });

		expect(result.status).toBe("no-changes");
		expect(await git(tmpDir, "rev-parse", "pr/feature")).toBe(await git(tmpDir, "rev-parse", "master"));
	});

	it("refuses a pull-request branch two commits ahead", async () => {
		await startFeature();
		await git(tmpDir, "checkout", "-b", "pr/feature", "master");
		await commitFile(tmpDir, "one.ts", "1\n", "one");
		await commitFile(tmpDir, "two.ts", "2\n", "two");
		const prTip = await git(tmpDir, "rev-parse", "pr/feature");

		const result = await syncPullRequestBranch(service, { branch: "feature", parentBranch: "master" });

		expect(result.status).toBe("failed");
		if (result.status !== "failed") return;
		expect(result.error.kind).toBe("too-many-foreign-commits");
		expect(await git(tmpDir, "rev-parse", "pr/feature")).toBe(prTip);
	});

	it("leaves a conflicted squash in the working tree", async () => {
		await startFeature();
		await commitFile(tmpDir, "README.md", "dev\n", "dev edit");
		await service.checkout("master");
		await commitFile(tmpDir, "README.md", "master\n", "master edit");

		const result = await syncPullRequestBranch(service, { branch: "feature", parentBranch: "master" });

		expect(result.status).toBe("failed");
		if (result.status !== "failed") return;
		expect(result.error.kind).toBe("merge-conflict");
		expect(result.error.message).toBe("Merging dev/feature into master produced conflicts in: README.md");
		expect(await git(tmpDir, "diff", "--name-only", "--diff-filter=U")).toBe("README.md");
	});

	it("detects a detached HEAD", async () => {
		await git(tmpDir, "checkout", "--detach");

		await expect(service.currentBranch()).rejects.toThrow("HEAD is detached");
	});

	it("reports whether branches exist", async () => {
		expect(await service.branchExists("master")).toBe(true);
		expect(await service.branchExists("dev/none")).toBe(false);
	});

	it("locates the message buffer under the git directory", async () => {
		expect(await service.messageBufferPath()).toBe(join(tmpDir, ".git", "SQUASH_MSG"));
	});

	it("resolves the repository root", async () => {
		expect(await service.repoRoot()).toBe(await realpath(tmpDir));
	});

	it("commits the message buffer up to its scissors line", async () => {
		await writeFile(join(tmpDir, "x.ts"), "x\n");
		await git(tmpDir, "add", "x.ts");
		await writeFile(
			await service.messageBufferPath(),
			"Add x\n\n# kept line\n\n# ------------------------ >8 ------------------------\n# dropped\n",
		);

		await service.commit({ allowEmpty: false });

		expect(await service.getCommitMessage("HEAD")).toBe("Add x\n\n# kept line");
		await expect(readFile(join(tmpDir, "x.ts"), "utf-8")).resolves.toBe("x\n");
	});

	it("echoes each git command when verbose", async () => {
		const verbose = new GitService({ repoPath: tmpDir, verbose: true });

		await verbose.branchExists("master");

		expect(console.error).toHaveBeenCalledWith("[prsync] $ git rev-parse --verify --quiet refs/heads/master");
	});

	it("runs git silently by default", async () => {
		await service.branchExists("master");

		expect(console.error).not.toHaveBeenCalled();
	});
});
