import type { EventBus } from './EventBus';
import type { IRng } from './Rng';
import type { ICardInstance } from './types/cards';
import type { DeckZone, DiscardPileZone, HandZone } from './Zone';

export interface CardZones {
	deck: DeckZone;
	hand: HandZone;
	discardPile: DiscardPileZone;
}

/**
 * Moves cards between deck, hand and discard pile. Instances are moved,
 * never copied, so identity is preserved across every transition.
 */
export class DeckManager {
	constructor(
		private zones: CardZones,
		private rng: IRng,
		private eventBus: EventBus
	) {}

	/**
	 * Puts the whole discard pile back into the deck, then shuffles the deck.
	 */
	public shuffleDeckIn(): void {
		const { deck, discardPile } = this.zones;
		deck.addBottom(discardPile.takeAll());
		deck.shuffle(this.rng);
		this.eventBus.publish('deckShuffled', { count: deck.getCount() });
	}

	/**
	 * Draws up to `count` cards, reshuffling the discard pile in when the deck runs out.
	 * Returns how many were drawn; fewer than requested is normal once both piles are empty.
	 */
	public draw(count: number): number {
		const { deck, hand, discardPile } = this.zones;
		let drawn = 0;
		for (let i = 0; i < count; i++) {
			if (deck.isEmpty()) {
				if (discardPile.isEmpty()) break;
				this.shuffleDeckIn();
			}
			const card = deck.removeTop();
			if (!card) break;
			hand.add(card);
			drawn++;
			this.eventBus.publish('cardDrawn', { card });
		}
		if (drawn < count) {
			console.log(`[DeckManager] Drew ${drawn} of ${count} requested cards; deck and discard are exhausted.`);
		}
		return drawn;
	}

	public discardHand(): void {
		const { hand, discardPile } = this.zones;
		discardPile.addBottom(hand.takeAll());
	}

	/** Plain append; no shuffle. */
	public addToDiscard(card: ICardInstance): void {
		this.zones.discardPile.add(card);
	}

	public addToDeck(card: ICardInstance): void {
		this.zones.deck.add(card);
	}

	public totalCardCount(): number {
		const { deck, hand, discardPile } = this.zones;
		return deck.getCount() + hand.getCount() + discardPile.getCount();
	}
}
