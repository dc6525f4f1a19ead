import { type ExecFileException, type ExecFileOptions, execFile } from "node:child_process";

export interface ExecResult {
	stdout: string;
	stderr: string;
}

export class ExecError extends Error {
	readonly command: string;
	readonly exitCode: number | undefined;
	readonly stdout: string;
	readonly stderr: string;

	constructor(command: string, exitCode: number | undefined, stdout: string, stderr: string) {
		super(`Command failed: ${command}\n${stderr}`);
		this.name = "ExecError";
		this.command = command;
		this.exitCode = exitCode;
		this.stdout = stdout;
		this.stderr = stderr;
	}
}

export function formatCommand(file: string, args: readonly string[]): string {
	return [file, ...args.map((arg) => (/^[\w./:=@^-]+$/.test(arg) ? arg : JSON.stringify(arg)))].join(" ");
}

export function exec(file: string, args: readonly string[], options: ExecFileOptions & { encoding?: BufferEncoding } = {}): Promise<ExecResult> {
	return new Promise((resolve, reject) => {
		execFile(
			file,
			args,
			{ maxBuffer: 50 * 1024 * 1024, encoding: "utf-8", ...options },
			(error: ExecFileException | null, stdout: string, stderr: string) => {
				if (error) {
					const exitCode = typeof error.code === "number" ? error.code : undefined;
					reject(new ExecError(formatCommand(file, args), exitCode, stdout, stderr));
					return;
				}
				resolve({ stdout, stderr });
			},
		);
	});
}
