import type { ICardInstance, ICardTemplate } from './types/cards';
import type { IEnemy, IEnemyTemplate } from './types/combatants';
import type { EnemyIntent } from './types/enums';

/**
 * Creates card instances and enemies from templates.
 * Every instance gets a fresh id, so a copy is never the same card as its source.
 */
export class ObjectFactory {
	private nextId = 0;
	private cardTemplates: Map<string, ICardTemplate>;

	constructor(templates: readonly ICardTemplate[]) {
		this.cardTemplates = new Map(templates.map((template) => [template.id, template]));
	}

	public createUniqueId(): string {
		return `card-${this.nextId++}`;
	}

	public getTemplate(templateId: string): ICardTemplate {
		const template = this.cardTemplates.get(templateId);
		if (!template) {
			throw new Error(`Card template not found: ${templateId}`);
		}
		return template;
	}

	public createCardInstance(templateId: string): ICardInstance {
		return this.instantiate(this.getTemplate(templateId));
	}

	public instantiate(template: ICardTemplate): ICardInstance {
		const instance: ICardInstance = {
			instanceId: this.createUniqueId(),
			templateId: template.id,
			name: template.name,
			type: template.type,
			cost: template.cost,
			description: template.description,
			color: template.color
		};
		if (template.damage !== undefined) instance.damage = template.damage;
		if (template.block !== undefined) instance.block = template.block;
		if (template.vulnerable !== undefined) instance.vulnerable = template.vulnerable;
		if (template.draw !== undefined) instance.draw = template.draw;
		if (template.copy !== undefined) instance.copy = template.copy;
		if (template.areaOfEffect !== undefined) instance.areaOfEffect = template.areaOfEffect;
		return instance;
	}

	/** Value copy of a runtime card under a new id. */
	public copyCard(card: ICardInstance): ICardInstance {
		return { ...card, instanceId: this.createUniqueId() };
	}

	public createEnemy(template: IEnemyTemplate, intent: EnemyIntent): IEnemy {
		return {
			templateId: template.id,
			name: template.name,
			health: template.maxHealth,
			maxHealth: template.maxHealth,
			damage: template.damage,
			buff: template.buff ?? 0,
			intents: template.intents,
			intent,
			color: template.color,
			block: 0,
			vulnerable: 0,
			weak: 0
		};
	}
}
