import { ExecError } from "./utils/exec.js";

export type WorkflowErrorKind =
	| "not-on-a-branch"
	| "naming-mismatch"
	| "no-such-development-branch"
	| "too-many-foreign-commits"
	| "merge-conflict"
	| "command-failure";

export class WorkflowError extends Error {
	readonly kind: WorkflowErrorKind;

	constructor(kind: WorkflowErrorKind, message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = "WorkflowError";
		this.kind = kind;
	}
}

/**
 * Maps anything thrown out of a workflow step onto a WorkflowError. Errors
 * that already carry a kind pass through; everything else is a command failure.
 */
export function toWorkflowError(err: unknown): WorkflowError {
	if (err instanceof WorkflowError) {
		return err;
	}
	if (err instanceof ExecError) {
		const detail = err.stderr.trim() || err.stdout.trim();
		const message = detail ? `${err.command} failed: ${detail}` : `${err.command} failed`;
		return new WorkflowError("command-failure", message, { cause: err });
	}
	if (err instanceof Error) {
		return new WorkflowError("command-failure", err.message, { cause: err });
	}
	return new WorkflowError("command-failure", String(err), { cause: err });
}
