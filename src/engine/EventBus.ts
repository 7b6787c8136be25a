import type { EnemyIntent, GamePhase, StatusType } from './types/enums';
import type { ICardInstance } from './types/cards';

type EventPayloads = {
	phaseChanged: { from: GamePhase; to: GamePhase };
	combatStarted: { combatNumber: number; enemyName: string };
	combatEnded: { combatNumber: number; rewardCount: number };
	cardDrawn: { card: ICardInstance };
	deckShuffled: { count: number };
	cardPlayed: { card: ICardInstance; handIndex: number };
	damageDealt: { target: 'player' | 'enemy'; amount: number; healthLost: number; blockUsed: number };
	blockGained: { target: 'player' | 'enemy'; amount: number };
	statusApplied: { target: 'player' | 'enemy'; status: StatusType; amount: number };
	enemyIntentChanged: { enemyName: string; intent: EnemyIntent };
	turnEndRequested: Record<string, never>;
	turnEnded: { turnNumber: number };
	rewardPicked: { card: ICardInstance };
};

export type EventType = keyof EventPayloads;
type EventHandler<T extends EventType> = (payload: EventPayloads[T]) => void;
type HandlerRegistry = { [T in EventType]: EventHandler<T>[] };

export class EventBus {
	private subscribers: HandlerRegistry = {
		phaseChanged: [],
		combatStarted: [],
		combatEnded: [],
		cardDrawn: [],
		deckShuffled: [],
		cardPlayed: [],
		damageDealt: [],
		blockGained: [],
		statusApplied: [],
		enemyIntentChanged: [],
		turnEndRequested: [],
		turnEnded: [],
		rewardPicked: []
	};

	/** Returns an unsubscribe function. */
	subscribe<T extends EventType>(eventType: T, handler: EventHandler<T>): () => void {
		const handlers = this.subscribers[eventType];
		handlers.push(handler);
		return () => {
			const index = handlers.indexOf(handler);
			if (index !== -1) handlers.splice(index, 1);
		};
	}

	publish<T extends EventType>(eventType: T, payload: EventPayloads[T]): void {
		// copy so handlers may unsubscribe while being notified
		const handlers = [...this.subscribers[eventType]];
		handlers.forEach((handler) => {
			try {
				handler(payload);
			} catch (error) {
				console.error(`[EventBus] Error in event handler for ${eventType}:`, error);
			}
		});
	}
}
