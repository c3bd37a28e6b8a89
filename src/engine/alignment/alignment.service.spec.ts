import { AlignmentService } from './alignment.service.js';
import { ALIGNMENT, EFFECTIVENESS, type Alignment, type Effectiveness } from '../../db/types/index.js';

describe('AlignmentService', () => {
  let service: AlignmentService;

  beforeEach(() => {
    service = new AlignmentService();
  });

  const table: Array<[Alignment, Alignment, Effectiveness, number]> = [
    ['ROCK', 'ROCK', 'NEUTRAL', 10],
    ['ROCK', 'PAPER', 'NOT_VERY_EFFECTIVE', 5],
    ['ROCK', 'SCISSORS', 'SUPER_EFFECTIVE', 20],
    ['PAPER', 'ROCK', 'SUPER_EFFECTIVE', 20],
    ['PAPER', 'PAPER', 'NEUTRAL', 10],
    ['PAPER', 'SCISSORS', 'NOT_VERY_EFFECTIVE', 5],
    ['SCISSORS', 'ROCK', 'NOT_VERY_EFFECTIVE', 5],
    ['SCISSORS', 'PAPER', 'SUPER_EFFECTIVE', 20],
    ['SCISSORS', 'SCISSORS', 'NEUTRAL', 10],
  ];

  it.each(table)('%s → %s = %s (x%d/10)', (attacker, defender, expected, factor) => {
    expect(service.effectiveness(attacker, defender)).toBe(expected);
    expect(service.effectivenessFactor(attacker, defender)).toBe(factor);
  });

  it('모든 쌍에 정의되어 있다', () => {
    for (const a of ALIGNMENT) {
      for (const b of ALIGNMENT) {
        expect(EFFECTIVENESS).toContain(service.effectiveness(a, b));
      }
    }
  });

  it('super-effective의 역방향은 not-very-effective', () => {
    for (const a of ALIGNMENT) {
      for (const b of ALIGNMENT) {
        if (a === b) continue;
        if (service.effectiveness(a, b) === 'SUPER_EFFECTIVE') {
          expect(service.effectiveness(b, a)).toBe('NOT_VERY_EFFECTIVE');
        }
      }
    }
  });

  it('같은 속성끼리는 neutral', () => {
    for (const a of ALIGNMENT) {
      expect(service.effectiveness(a, a)).toBe('NEUTRAL');
    }
  });

  it('각 속성은 정확히 하나를 이기고 하나에 진다', () => {
    for (const a of ALIGNMENT) {
      const results = ALIGNMENT.map((b) => service.effectiveness(a, b));
      expect(results.filter((r) => r === 'SUPER_EFFECTIVE')).toHaveLength(1);
      expect(results.filter((r) => r === 'NOT_VERY_EFFECTIVE')).toHaveLength(1);
    }
  });
});
