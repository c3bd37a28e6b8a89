import { Injectable } from '@nestjs/common';
import type {
  ActionId,
  Character,
  Species,
  Status,
} from '../../db/types/index.js';

@Injectable()
export class CharacterService {
  /** level/experience/stats 모두 0, 배운 행동 없음 */
  fromSpecies(species: Species): Character {
    return {
      name: species.name,
      species: { ...species, baseStats: { ...species.baseStats } },
      attributes: {
        level: 0,
        experience: 0,
        stats: { health: 0, attack: 0, defense: 0, speed: 0 },
        actions: [],
      },
      state: {
        alignment: species.alignment,
        health: 0,
        status: {},
      },
    };
  }

  fromSpeciesAndActions(species: Species, actions: ActionId[]): Character {
    const character = this.fromSpecies(species);
    character.attributes.actions = [...actions];
    return character;
  }

  /** 전투 상태 초기화 (idempotent) */
  refresh(character: Character): void {
    character.state = {
      alignment: character.species.alignment,
      health: character.attributes.stats.health,
      status: {},
    };
  }

  /** 행동 순서 tie-break용: 현재 speed */
  priority(character: Character): number {
    return character.attributes.stats.speed;
  }

  dealDamage(character: Character, amount: number): void {
    character.state.health = Math.max(0, character.state.health - amount);
  }

  hasStatus(character: Character, status: Status): boolean {
    return character.state.status[status] !== undefined;
  }

  /** 직렬화 가능한 깊은 복사 */
  clone(character: Character): Character {
    return structuredClone(character);
  }
}
