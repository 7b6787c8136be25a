import type { ICardInstance, ICardSnapshot } from './cards';
import type { IEnemy, IEnemySnapshot, IPlayer, IPlayerSnapshot } from './combatants';
import type { ActionFailureReason, GamePhase } from './enums';
import type { DeckZone, DiscardPileZone, HandZone } from '../Zone';

export interface IAnimation {
	name: string;
	duration: number;
	elapsed: number;
}

export type GameAction =
	| { type: 'startGame' }
	| { type: 'playCard'; handIndex: number; cardName: string }
	| { type: 'requestEndTurn' }
	| { type: 'endTurn' }
	| { type: 'pickReward'; rewardIndex: number; cardName: string }
	| { type: 'skipReward' }
	| { type: 'acknowledgeGameOver' };

/**
 * Everything mutable about a play session.
 */
export interface IGameState {
	phase: GamePhase;
	player: IPlayer;
	currentEnemy: IEnemy | null; // only during combat
	zones: {
		deck: DeckZone;
		hand: HandZone;
		discardPile: DiscardPileZone;
	};
	rewardCards: ICardInstance[]; // only during rewards
	turnEnding: boolean;
	turnEndDelay: number;
	animation: IAnimation | null;
	turnNumber: number;
	combatNumber: number;
	combatsWon: number;
	actionHistory: GameAction[];
}

export type ActionResult =
	| { success: true }
	| { success: false; reason: ActionFailureReason; message: string };

/**
 * Read-only view handed to the presentation layer.
 */
export interface IGameSnapshot {
	phase: GamePhase;
	player: IPlayerSnapshot;
	enemy: IEnemySnapshot | null;
	hand: ICardSnapshot[];
	deckCount: number;
	discardCount: number;
	rewards: ICardSnapshot[];
	turnEnding: boolean;
	isAnimating: boolean;
	turnNumber: number;
	combatNumber: number;
	combatsWon: number;
}
