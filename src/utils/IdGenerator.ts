/**
 * Per-kind sequential labels ("sphere#1", "plane#3") that identify shapes
 * in logs.
 */
export class IdGenerator {
	private static _counts: Map<string, number> = new Map();

	public static nextId(kind: string): string {
		const count = (this._counts.get(kind) ?? 0) + 1;
		this._counts.set(kind, count);
		return `${kind}#${count}`;
	}

	/** Restarts numbering for one kind, or for all of them. */
	public static reset(kind?: string): void {
		if (kind === undefined) this._counts.clear();
		else this._counts.delete(kind);
	}
}
