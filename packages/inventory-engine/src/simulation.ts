export interface ReplenishmentRule {
	reorderPoint: number;
	orderQuantity: number;
	leadTimePeriods: number;
}

export interface SimulationSnapshot {
	period: number;
	level: number;
	pendingQuantity: number;
	arrivalPeriod: number | null;
	ordersPlaced: number;
	unmetDemand: number;
}

/**
 * Period-by-period stock trajectory under a continuous-review (s, Q) rule.
 * Stock starts at the reorder point; at most one order is outstanding.
 */
export class InventorySimulation {
	private level: number;
	private period = 0;
	private pendingQuantity = 0;
	private arrivalPeriod: number | null = null;
	private ordersPlaced = 0;
	private unmetDemand = 0;
	private readonly levels: number[] = [];

	constructor(private readonly rule: ReplenishmentRule) {
		this.level = rule.reorderPoint;
	}

	step(demand: number): SimulationSnapshot {
		if (this.arrivalPeriod === this.period) {
			this.level += this.pendingQuantity;
			this.pendingQuantity = 0;
			this.arrivalPeriod = null;
		}

		const remaining = this.level - demand;
		if (remaining < 0) {
			this.unmetDemand += -remaining;
		}
		this.level = Math.max(remaining, 0);

		if (this.level <= this.rule.reorderPoint && this.arrivalPeriod === null) {
			this.pendingQuantity = this.rule.orderQuantity;
			this.arrivalPeriod = this.period + this.rule.leadTimePeriods;
			this.ordersPlaced += 1;
		}

		this.levels.push(this.level);
		const snapshot = this.snapshot();
		this.period += 1;
		return snapshot;
	}

	run(demand: readonly number[]): number[] {
		demand.forEach((value) => this.step(value));
		return this.trajectory();
	}

	trajectory(): number[] {
		return [...this.levels];
	}

	snapshot(): SimulationSnapshot {
		return {
			period: this.period,
			level: this.level,
			pendingQuantity: this.pendingQuantity,
			arrivalPeriod: this.arrivalPeriod,
			ordersPlaced: this.ordersPlaced,
			unmetDemand: this.unmetDemand,
		};
	}
}
