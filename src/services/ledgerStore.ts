import type { Position } from "../types";

/** Live positions keyed by instrument; at most one per instrument. */
export class LedgerStore {
	private readonly positions = new Map<string, Position>();

	constructor(restored: Position[] = []) {
		for (const position of restored) this.insert(position);
	}

	get(instrument: string): Position | undefined {
		return this.positions.get(instrument);
	}

	has(instrument: string): boolean {
		return this.positions.has(instrument);
	}

	insert(position: Position): void {
		if (this.positions.has(position.instrument)) {
			throw new Error(`Position already open for ${position.instrument}`);
		}
		this.positions.set(position.instrument, position);
	}

	remove(instrument: string): Position | undefined {
		const position = this.positions.get(instrument);
		this.positions.delete(instrument);
		return position;
	}

	list(): Position[] {
		return [...this.positions.values()];
	}

	get size(): number {
		return this.positions.size;
	}
}
