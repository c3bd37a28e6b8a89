// 콘텐츠 생성: species / action pool / 캐릭터 샘플링

import { Injectable } from '@nestjs/common';
import {
  ALIGNMENT,
  ALIGNMENT_LABEL,
  type Action,
  type ActionPool,
  type Alignment,
  type AttackAction,
  type Character,
  type Species,
} from '../db/types/index.js';
import type { Rng } from '../engine/rng/rng.service.js';
import { ActionService } from '../engine/actions/action.service.js';
import { CharacterService } from '../engine/character/character.service.js';
import type { World, WorldContent } from './content.types.js';

const WORST_BST = 200;
const BEST_BST = 700;
const WORST_ATTACK = 10;
const BEST_ATTACK = 150;
/** % */
const PRIORITY_MOVE_CHANCE = 25;
/** 공격 + padding 슬롯 수 */
const ATTACK_SLOTS = 60;
const MAX_PADDING = 20;
const KNOWN_ACTIONS = 4;

@Injectable()
export class WorldGeneratorService {
  constructor(
    private readonly actionService: ActionService,
    private readonly characterService: CharacterService,
  ) {}

  sampleAlignment(rng: Rng): Alignment {
    return ALIGNMENT[rng.int(ALIGNMENT.length)];
  }

  sampleSpecies(content: WorldContent, rng: Rng): Species {
    const alignment = this.sampleAlignment(rng);
    const suffixes = content.names.speciesSuffixes;
    const suffix = suffixes[rng.int(suffixes.length)];
    const bst = rng.range(WORST_BST, BEST_BST - 1);

    const raw = [rng.next(), rng.next(), rng.next(), rng.next()];
    const sum = raw.reduce((acc, x) => acc + x, 0);
    const [health, attack, defense, speed] = raw.map((x) => (sum > 0 ? x / sum : 0.25));

    return {
      name: `${ALIGNMENT_LABEL[alignment]} ${suffix}`,
      bst,
      baseStats: { health, attack, defense, speed },
      alignment,
    };
  }

  sampleAttack(content: WorldContent, rng: Rng): AttackAction {
    const alignment = this.sampleAlignment(rng);
    const suffixes = content.names.attackSuffixes;
    const suffix = suffixes[rng.int(suffixes.length)];
    return {
      kind: 'ATTACK',
      name: `${ALIGNMENT_LABEL[alignment]} ${suffix}`,
      power: rng.range(WORST_ATTACK, BEST_ATTACK - 1),
      alignment,
      priority: rng.chance(PRIORITY_MOVE_CHANCE) ? 1 : 0,
    };
  }

  /**
   * arena 배치: [무작위 공격 × (60 - padding)] + 고정 행동.
   * padding 만큼의 id는 어떤 행동에도 대응하지 않는다 (SKIP).
   */
  generateActionPool(content: WorldContent, rng: Rng): ActionPool {
    const padding = rng.int(MAX_PADDING);
    const actions: Action[] = [];
    for (let i = 0; i < ATTACK_SLOTS - padding; i++) {
      actions.push(this.sampleAttack(content, rng));
    }
    actions.push(...content.fixedActions.map((action) => ({ ...action })));
    return { actions, padding };
  }

  generate(content: WorldContent, speciesCount: number, rng: Rng): World {
    const pool = this.generateActionPool(content, rng);
    const species: Species[] = [];
    for (let i = 0; i < speciesCount; i++) {
      species.push(this.sampleSpecies(content, rng));
    }
    return { species, pool };
  }

  /** level 0 캐릭터: 레벨/스탯은 호출자가 설정 */
  sampleCharacter(world: World, rng: Rng): Character {
    const species = rng.pick(world.species);
    if (!species) {
      throw new Error('World has no species');
    }
    const size = this.actionService.poolSize(world.pool);
    const actions = Array.from({ length: KNOWN_ACTIONS }, () => rng.int(size));
    return this.characterService.fromSpeciesAndActions(species, actions);
  }
}
