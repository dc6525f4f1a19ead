import { Command } from "commander";
import { defaultConfig, DEFAULT_PARENT_BRANCH, type WorkflowConfig } from "./config.js";
import { toWorkflowError, type WorkflowError } from "./errors.js";
import { GitService } from "./git/git-service.js";
import type { VersionControlService } from "./git/service.js";
import { createDevelopmentBranch, syncPullRequestBranch } from "./workflow/commands.js";

type GlobalOptions = {
	verbose?: boolean;
	repo?: string;
};

interface DevOptions {
	on: string;
	updates: boolean;
}

interface PrOptions {
	on: string;
	dev?: string;
}

export type ServiceFactory = (config: WorkflowConfig) => VersionControlService;

const gitServiceFactory: ServiceFactory = (config) =>
	new GitService({ repoPath: config.repoPath, verbose: config.verbose });

function configFor(command: Command, parentBranch: string): WorkflowConfig {
	const globals = command.optsWithGlobals<GlobalOptions>();
	return defaultConfig({ repoPath: globals.repo, parentBranch, verbose: globals.verbose });
}

function reportFailure(error: WorkflowError): void {
	console.error(`[prsync] ${error.kind}: ${error.message}`);
	process.exitCode = 1;
}

/** Returns null, after reporting, when `repoPath` is not inside a repository. */
async function openRepository(
	createService: ServiceFactory,
	config: WorkflowConfig,
): Promise<VersionControlService | null> {
	const service = createService(config);
	try {
		const root = await service.repoRoot();
		if (config.verbose) {
			console.error(`[prsync] Repository ${root}`);
		}
	} catch (err) {
		reportFailure(toWorkflowError(err));
		return null;
	}
	return service;
}

export function buildProgram(createService: ServiceFactory = gitServiceFactory): Command {
	const program = new Command();

	program
		.name("prsync")
		.description("Squash development branches into single-commit pull-request branches")
		.option("-v, --verbose", "Print every git command before running it")
		.option("-C, --repo <path>", "Path to the git repository (defaults to the working directory)");

	program
		.command("dev")
		.description("Create dev/<branch> from the parent branch")
		.argument("<branch>", "Base name of the development branch")
		.option("--on <parent>", "Parent branch", DEFAULT_PARENT_BRANCH)
		.option("--no-updates", "Skip the initial update-from marker commit")
		.action(async (branch: string, opts: DevOptions, command: Command) => {
			const config = configFor(command, opts.on);
			const service = await openRepository(createService, config);
			if (service === null) return;
			const result = await createDevelopmentBranch(service, {
				baseName: branch,
				parentBranch: config.parentBranch,
				enableUpdates: opts.updates,
			});
			if (result.status === "failed") {
				reportFailure(result.error);
			}
		});

	program
		.command("pr")
		.description("Squash dev/<branch> into a single commit on pr/<branch>")
		.argument("[branch]", "Base name of the pull-request branch (defaults to the current dev/ branch)")
		.option("--on <parent>", "Parent branch", DEFAULT_PARENT_BRANCH)
		.option("-D, --dev <name>", "Base name of the development branch to squash (defaults to <branch>)")
		.action(async (branch: string | undefined, opts: PrOptions, command: Command) => {
			const config = configFor(command, opts.on);
			const service = await openRepository(createService, config);
			if (service === null) return;
			const result = await syncPullRequestBranch(service, {
				branch,
				parentBranch: config.parentBranch,
				devName: opts.dev,
			});
			if (result.status === "failed") {
				reportFailure(result.error);
			}
		});

	return program;
}
