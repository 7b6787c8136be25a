import type { IZone } from './types/zones';
import type { ICardInstance } from './types/cards';
import type { IRng } from './Rng';
import { ZoneIdentifier } from './types/enums';

export abstract class BaseZone implements IZone {
	public readonly id: string;
	public readonly zoneType: ZoneIdentifier;
	public entities: ICardInstance[];

	constructor(id: string, zoneType: ZoneIdentifier) {
		this.id = id;
		this.zoneType = zoneType;
		this.entities = [];
	}

	add(entity: ICardInstance): void {
		if (this.contains(entity.instanceId)) {
			throw new Error(`Zone ${this.id} already holds card instance '${entity.instanceId}'.`);
		}
		this.entities.push(entity);
	}

	addBottom(entities: ICardInstance[]): void {
		entities.forEach((entity) => this.add(entity));
	}

	at(index: number): ICardInstance | undefined {
		if (!Number.isInteger(index) || index < 0) return undefined;
		return this.entities[index];
	}

	getAll(): ICardInstance[] {
		return [...this.entities];
	}

	getCount(): number {
		return this.entities.length;
	}

	isEmpty(): boolean {
		return this.entities.length === 0;
	}

	/** Empties the zone and returns what it held, in order. */
	takeAll(): ICardInstance[] {
		const taken = this.entities;
		this.entities = [];
		return taken;
	}

	contains(instanceId: string): boolean {
		return this.entities.some((e) => e.instanceId === instanceId);
	}
}

export class DeckZone extends BaseZone {
	constructor(id = 'deck') {
		super(id, ZoneIdentifier.Deck);
	}

	removeTop(): ICardInstance | undefined {
		return this.entities.shift();
	}

	/**
	 * Fisher-Yates: for i from the last index down to 1, swap with j in [0, i].
	 */
	shuffle(rng: IRng): void {
		const cards = this.entities;
		for (let i = cards.length - 1; i > 0; i--) {
			const j = rng.nextInt(0, i);
			[cards[i], cards[j]] = [cards[j], cards[i]];
		}
		console.log(`[Zone] Deck ${this.id} has been shuffled (${cards.length} cards).`);
	}
}

export class HandZone extends BaseZone {
	constructor(id = 'hand') {
		super(id, ZoneIdentifier.Hand);
	}

	removeAt(index: number): ICardInstance | undefined {
		if (this.at(index) === undefined) return undefined;
		const [removed] = this.entities.splice(index, 1);
		return removed;
	}
}

export class DiscardPileZone extends BaseZone {
	constructor(id = 'discardPile') {
		super(id, ZoneIdentifier.DiscardPile);
	}
}
