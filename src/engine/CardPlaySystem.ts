import type { GameStateManager } from './GameStateManager';
import { fail, succeed } from './results';
import { computeAttackDamage } from './StatusEffectHandler';
import type { ICardInstance } from './types/cards';
import type { IPlayer } from './types/combatants';
import type { ActionResult } from './types/game';
import { ActionFailureReason, CardType } from './types/enums';

export class CardPlaySystem {
	constructor(private gsm: GameStateManager) {}

	public canPlay(card: ICardInstance, player: IPlayer): boolean {
		return player.energy >= card.cost;
	}

	/**
	 * Validates and plays the card at `handIndex`. The card leaves the hand while
	 * it resolves and lands in the discard pile afterwards, lethal or not.
	 */
	public playFromHand(handIndex: number): ActionResult {
		const { hand, discardPile } = this.gsm.state.zones;
		const card = hand.at(handIndex);
		if (!card) {
			return fail(
				ActionFailureReason.InvalidIndex,
				`Hand index ${handIndex} is out of range (hand holds ${hand.getCount()} cards).`
			);
		}
		if (!this.canPlay(card, this.gsm.state.player)) {
			return fail(
				ActionFailureReason.InsufficientEnergy,
				`${card.name} costs ${card.cost} but only ${this.gsm.state.player.energy} energy is left.`
			);
		}

		hand.removeAt(handIndex);
		this.gsm.recordAction({ type: 'playCard', handIndex, cardName: card.name });
		this.gsm.eventBus.publish('cardPlayed', { card, handIndex });
		this.gsm.startAnimation(card.name, this.gsm.config.cardAnimationSeconds);

		this.play(card);
		discardPile.add(card);
		return succeed();
	}

	/**
	 * Effect pipeline, in this order: damage (+ vulnerable), block, draw, self-copy, energy.
	 * A lethal attack ends combat and stops right there.
	 */
	public play(card: ICardInstance): void {
		const { state, statusHandler } = this.gsm;
		const player = state.player;
		const enemy = state.currentEnemy;

		if (card.type === CardType.Attack && enemy) {
			const damage = computeAttackDamage(card.damage ?? 0, player, enemy);
			statusHandler.takeDamage(enemy, damage, 'enemy');
			if (card.vulnerable) {
				statusHandler.applyVulnerable(enemy, card.vulnerable, 'enemy');
			}
			console.log(`[CardPlaySystem] ${card.name} hits ${enemy.name} for ${damage}; ${enemy.health} HP left.`);
			if (enemy.health <= 0) {
				this.gsm.endCombat();
				return;
			}
		}

		if (card.block) {
			statusHandler.gainBlock(player, card.block, 'player');
		}

		if (card.draw) {
			this.gsm.deckManager.draw(card.draw);
		}

		if (card.copy) {
			this.gsm.deckManager.addToDiscard(this.gsm.objectFactory.copyCard(card));
		}

		player.energy = Math.max(0, player.energy - card.cost);
	}
}
