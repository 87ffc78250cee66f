import type { ItemRecord, Plan, RemoteItem } from "./types.js";

/**
 * Map item ids to their position, rejecting duplicates
 */
function indexById<T>(items: T[], idOf: (item: T) => string, side: string): Map<string, number> {
	const positions = new Map<string, number>();
	items.forEach((item, position) => {
		const id = idOf(item);
		if (positions.has(id)) {
			throw new Error(`Duplicate item id "${id}" in ${side} listing`);
		}
		positions.set(id, position);
	});
	return positions;
}

/**
 * Reconcile the previously committed items against a fresh remote listing.
 *
 * Every previous id lands in exactly one of removals, moves or unchanged; every remote id
 * in exactly one of additions, moves or unchanged. Additions and moves are ordered by their
 * new position, removals by their old one.
 */
export function computePlan(previous: ItemRecord[], remote: RemoteItem[]): Plan {
	const oldPositions = indexById(previous, (record) => record.itemId, "previous");
	const newPositions = indexById(remote, (item) => item.itemId, "remote");

	const plan: Plan = { additions: [], removals: [], moves: [], unchanged: [] };

	remote.forEach((item, position) => {
		const from = oldPositions.get(item.itemId);
		if (from === undefined) {
			plan.additions.push({ item, position });
			return;
		}

		const record = previous[from];
		if (from === position) {
			plan.unchanged.push({ record, position });
		} else {
			plan.moves.push({ record, from, to: position });
		}
	});

	previous.forEach((record, position) => {
		if (!newPositions.has(record.itemId)) {
			plan.removals.push({ record, position });
		}
	});

	return plan;
}

export function isEmptyPlan(plan: Plan): boolean {
	return plan.additions.length === 0 && plan.removals.length === 0 && plan.moves.length === 0;
}

/**
 * Whether applying the plan mutates existing files (and so needs a backup)
 */
export function isDestructive(plan: Plan): boolean {
	return plan.removals.length > 0 || plan.moves.length > 0;
}
