import { EventBus } from './EventBus';
import { MathRandomRng, type IRng } from './Rng';
import { ObjectFactory } from './ObjectFactory';
import { DeckZone, DiscardPileZone, HandZone } from './Zone';
import { DeckManager } from './DeckManager';
import { StatusEffectHandler } from './StatusEffectHandler';
import { CardPlaySystem } from './CardPlaySystem';
import { EnemyAI } from './EnemyAI';
import { TurnManager } from './TurnManager';
import { PhaseManager } from './PhaseManager';
import { fail, succeed } from './results';
import { loadGameConfig, type GameConfig, type GameConfigInput } from './config';
import { ActionFailureReason, GamePhase } from './types/enums';
import type { ActionResult, GameAction, IGameSnapshot, IGameState } from './types/game';
import type { ICardInstance, ICardSnapshot, ICardTemplate } from './types/cards';
import type { IEnemySnapshot, IEnemyTemplate, IPlayer } from './types/combatants';
import { cardTemplates as defaultCardTemplates } from '../data/cards';
import { enemyTemplates as defaultEnemyTemplates } from '../data/enemies';
import {
	cardTemplateListSchema,
	enemyTemplateListSchema,
	type CardTemplateInput,
	type EnemyTemplateInput
} from '../data/schemas';

export interface GameStateManagerOptions {
	rng?: IRng;
	eventBus?: EventBus;
	config?: GameConfigInput;
	cardTemplates?: readonly CardTemplateInput[];
	enemyTemplates?: readonly EnemyTemplateInput[];
}

/**
 * Owns one play session and is the only entry point for player intents.
 * Card movement goes to DeckManager, effects to CardPlaySystem,
 * the enemy's action to EnemyAI and turn/phase flow to TurnManager/PhaseManager.
 */
export class GameStateManager {
	public state: IGameState;
	public readonly config: GameConfig;
	public readonly rng: IRng;
	public readonly eventBus: EventBus;
	public readonly objectFactory: ObjectFactory;
	public readonly cardTemplates: readonly ICardTemplate[];
	public readonly enemyTemplates: readonly IEnemyTemplate[];
	public readonly deckManager: DeckManager;
	public readonly statusHandler: StatusEffectHandler;
	public readonly cardPlaySystem: CardPlaySystem;
	public readonly enemyAI: EnemyAI;
	public readonly turnManager: TurnManager;
	public readonly phaseManager: PhaseManager;

	constructor(options: GameStateManagerOptions = {}) {
		this.config = loadGameConfig(options.config);
		this.rng = options.rng ?? new MathRandomRng();
		this.eventBus = options.eventBus ?? new EventBus();
		this.cardTemplates = cardTemplateListSchema.parse(options.cardTemplates ?? defaultCardTemplates);
		this.enemyTemplates = enemyTemplateListSchema.parse(options.enemyTemplates ?? defaultEnemyTemplates);

		this.objectFactory = new ObjectFactory(this.cardTemplates);
		this.state = this.initializeGameState();
		this.deckManager = new DeckManager(this.state.zones, this.rng, this.eventBus);
		this.statusHandler = new StatusEffectHandler(this.eventBus);
		this.cardPlaySystem = new CardPlaySystem(this);
		this.enemyAI = new EnemyAI(this);
		this.turnManager = new TurnManager(this);
		this.phaseManager = new PhaseManager(this);

		this.initializeStartingDeck();
	}

	private initializeGameState(): IGameState {
		const player: IPlayer = {
			health: this.config.playerMaxHealth,
			maxHealth: this.config.playerMaxHealth,
			energy: this.config.playerMaxEnergy,
			maxEnergy: this.config.playerMaxEnergy,
			block: 0,
			vulnerable: 0,
			weak: 0
		};
		return {
			phase: GamePhase.Menu,
			player,
			currentEnemy: null,
			zones: {
				deck: new DeckZone(),
				hand: new HandZone(),
				discardPile: new DiscardPileZone()
			},
			rewardCards: [],
			turnEnding: false,
			turnEndDelay: 0,
			animation: null,
			turnNumber: 0,
			combatNumber: 0,
			combatsWon: 0,
			actionHistory: []
		};
	}

	private initializeStartingDeck(): void {
		for (const entry of this.config.startingDeck) {
			for (let i = 0; i < entry.count; i++) {
				this.deckManager.addToDeck(this.objectFactory.createCardInstance(entry.templateId));
			}
		}
		this.deckManager.shuffleDeckIn();
		console.log(`[GSM] Starting deck built with ${this.state.zones.deck.getCount()} cards.`);
	}

	public recordAction(action: GameAction): void {
		this.state.actionHistory.push(action);
	}

	private requirePhase(phase: GamePhase, intent: string): ActionResult | null {
		if (this.state.phase === phase) return null;
		return fail(
			ActionFailureReason.WrongPhase,
			`${intent} is only valid during ${phase} (current phase: ${this.state.phase}).`
		);
	}

	// ---------------------------------------------------------------------
	// Intents
	// ---------------------------------------------------------------------

	public startGame(): ActionResult {
		const rejected = this.requirePhase(GamePhase.Menu, 'startGame');
		if (rejected) return rejected;
		this.recordAction({ type: 'startGame' });
		this.phaseManager.startCombat();
		return succeed();
	}

	public playCard(handIndex: number): ActionResult {
		const rejected = this.requirePhase(GamePhase.Combat, 'playCard');
		if (rejected) return rejected;
		if (this.state.turnEnding) {
			return fail(ActionFailureReason.TurnEnding, 'Cannot play cards while the turn is ending.');
		}
		return this.cardPlaySystem.playFromHand(handIndex);
	}

	public requestEndTurn(): ActionResult {
		const rejected = this.requirePhase(GamePhase.Combat, 'requestEndTurn');
		if (rejected) return rejected;
		return this.turnManager.requestEndTurn();
	}

	public pickReward(rewardIndex: number): ActionResult {
		const rejected = this.requirePhase(GamePhase.Rewards, 'pickReward');
		if (rejected) return rejected;
		const reward = Number.isInteger(rewardIndex) ? this.state.rewardCards[rewardIndex] : undefined;
		if (!reward) {
			return fail(
				ActionFailureReason.InvalidIndex,
				`Reward index ${rewardIndex} is out of range (0..${this.state.rewardCards.length - 1}).`
			);
		}
		this.recordAction({ type: 'pickReward', rewardIndex, cardName: reward.name });
		this.addCardToDeck(reward);
		this.phaseManager.startCombat();
		return succeed();
	}

	public skipReward(): ActionResult {
		const rejected = this.requirePhase(GamePhase.Rewards, 'skipReward');
		if (rejected) return rejected;
		this.recordAction({ type: 'skipReward' });
		this.phaseManager.startCombat();
		return succeed();
	}

	/**
	 * Driven by the presentation clock. Ages the animation flag and
	 * commits a pending end of turn once its delay has elapsed.
	 */
	public advanceTime(deltaSeconds: number): ActionResult {
		if (!Number.isFinite(deltaSeconds) || deltaSeconds < 0) {
			return fail(ActionFailureReason.InvalidTime, `Time delta must be a non-negative number, got ${deltaSeconds}.`);
		}
		this.updateAnimation(deltaSeconds);
		if (this.state.phase === GamePhase.Combat) {
			this.turnManager.advanceTime(deltaSeconds);
		}
		return succeed();
	}

	public acknowledgeGameOver(): ActionResult {
		const rejected = this.requirePhase(GamePhase.GameOver, 'acknowledgeGameOver');
		if (rejected) return rejected;
		this.recordAction({ type: 'acknowledgeGameOver' });
		this.phaseManager.returnToMenu();
		return succeed();
	}

	// ---------------------------------------------------------------------
	// Transitions triggered from inside a resolution
	// ---------------------------------------------------------------------

	public endCombat(): void {
		this.phaseManager.endCombat();
	}

	public gameOver(): void {
		this.phaseManager.gameOver();
	}

	/**
	 * Copies the reward into the deck, then reshuffles discard and deck together.
	 */
	public addCardToDeck(reward: ICardInstance): void {
		const card = this.objectFactory.copyCard(reward);
		this.deckManager.addToDeck(card);
		this.deckManager.shuffleDeckIn();
		this.eventBus.publish('rewardPicked', { card });
		console.log(`[GSM] Added ${card.name} to the deck (${this.state.zones.deck.getCount()} cards).`);
	}

	// ---------------------------------------------------------------------
	// Animation flag
	// ---------------------------------------------------------------------

	public startAnimation(name: string, duration: number): void {
		this.state.animation = duration > 0 ? { name, duration, elapsed: 0 } : null;
	}

	private updateAnimation(deltaSeconds: number): void {
		const animation = this.state.animation;
		if (!animation) return;
		animation.elapsed += deltaSeconds;
		if (animation.elapsed > animation.duration) {
			this.state.animation = null;
		}
	}

	public get isAnimating(): boolean {
		return this.state.animation !== null;
	}

	// ---------------------------------------------------------------------
	// Observations
	// ---------------------------------------------------------------------

	public get currentPhase(): GamePhase {
		return this.state.phase;
	}

	public getSnapshot(): IGameSnapshot {
		const { player, zones } = this.state;
		return {
			phase: this.state.phase,
			player: {
				health: player.health,
				maxHealth: player.maxHealth,
				energy: player.energy,
				maxEnergy: player.maxEnergy,
				block: player.block,
				vulnerable: player.vulnerable,
				weak: player.weak
			},
			enemy: this.getEnemySnapshot(),
			hand: zones.hand.getAll().map((card) => this.toCardSnapshot(card, this.cardPlaySystem.canPlay(card, player))),
			deckCount: zones.deck.getCount(),
			discardCount: zones.discardPile.getCount(),
			rewards: this.state.rewardCards.map((card) => this.toCardSnapshot(card, false)),
			turnEnding: this.state.turnEnding,
			isAnimating: this.isAnimating,
			turnNumber: this.state.turnNumber,
			combatNumber: this.state.combatNumber,
			combatsWon: this.state.combatsWon
		};
	}

	private getEnemySnapshot(): IEnemySnapshot | null {
		const enemy = this.state.currentEnemy;
		if (!enemy) return null;
		return {
			name: enemy.name,
			health: enemy.health,
			maxHealth: enemy.maxHealth,
			block: enemy.block,
			vulnerable: enemy.vulnerable,
			weak: enemy.weak,
			intent: enemy.intent,
			forecastDamage: this.enemyAI.forecastDamage(enemy, this.state.player),
			color: enemy.color
		};
	}

	private toCardSnapshot(card: ICardInstance, playable: boolean): ICardSnapshot {
		return {
			instanceId: card.instanceId,
			name: card.name,
			cost: card.cost,
			type: card.type,
			description: card.description,
			color: card.color,
			playable
		};
	}
}
