// Public surface of the combat engine

export { GameStateManager } from './engine/GameStateManager';
export type { GameStateManagerOptions } from './engine/GameStateManager';
export { EventBus } from './engine/EventBus';
export type { EventType } from './engine/EventBus';
export { MathRandomRng, SeededRng, pickRandom } from './engine/Rng';
export type { IRng } from './engine/Rng';
export { loadGameConfig, gameConfigSchema } from './engine/config';
export type { GameConfig, GameConfigInput } from './engine/config';
export { computeAttackDamage, resolveDamage } from './engine/StatusEffectHandler';
export type { DamageResult, CombatantSide } from './engine/StatusEffectHandler';
export { ActionFailureReason, CardType, EnemyIntent, GamePhase, StatusType, ZoneIdentifier } from './engine/types/enums';
export type { ICardInstance, ICardSnapshot, ICardTemplate, RGBColor } from './engine/types/cards';
export type {
	IEnemy,
	IEnemySnapshot,
	IEnemyTemplate,
	IPlayer,
	IPlayerSnapshot,
	IStatusEffects
} from './engine/types/combatants';
export type { ActionResult, GameAction, IGameSnapshot, IGameState } from './engine/types/game';
export { gameMachine } from './lib/state/gameMachine';
export type { GameMachineInput } from './lib/state/gameMachine';
