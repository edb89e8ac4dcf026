/** A failure that ends the CLI with a printed message and a non-zero exit code. */
export class AssessError extends Error {
	readonly exitCode: number;

	constructor(message: string, exitCode = 1) {
		super(message);
		this.name = "AssessError";
		this.exitCode = exitCode;
	}
}

export function exitCodeOf(err: unknown): number {
	return err instanceof AssessError ? err.exitCode : 1;
}
