import { faker } from '@faker-js/faker';
import { describe, expect, test } from 'vitest';

import { generateDisjointMatchings } from '@/lib/pairing-generators/round-robin-generator';
import { SPACER } from '@/lib/pairing-generators/round-robin-generator/constants';
import { buildVertexLabels } from '@/lib/pairing-generators/round-robin-generator/schedule/name-list';

const RANDOM_TOURNAMENTS_COUNT = 10;

const PLAYER_NUMBER_FAKEOPTS = {
  min: 2,
  max: 61,
};

/** Random participant list; names may repeat, players are told apart by index */
function generatePlayerNames(): string[] {
  const playerNumber = faker.number.int(PLAYER_NUMBER_FAKEOPTS);
  return Array.from({ length: playerNumber }, () => faker.person.fullName());
}

describe('round robin over random participant lists', () => {
  for (
    let tournamentNumber = 0;
    tournamentNumber < RANDOM_TOURNAMENTS_COUNT;
    tournamentNumber++
  ) {
    const names = generatePlayerNames();
    const labels = buildVertexLabels(names);
    const hasSpacer = labels.length !== names.length;

    // playing every round, one game per pair
    const opponents = labels.map(() => new Set<number>());
    const byesPerPlayer = names.map(() => 0);
    let gameCount = 0;
    let roundCount = 0;

    for (const round of generateDisjointMatchings(labels.length)) {
      for (const [first, second] of round) {
        if (hasSpacer && (first === names.length || second === names.length)) {
          const sittingOut = first === names.length ? second : first;
          byesPerPlayer[sittingOut]++;
          continue;
        }
        opponents[first].add(second);
        opponents[second].add(first);
        gameCount++;
      }
      roundCount++;
    }

    test(`${tournamentNumber} - ${names.length} players: game count equals theoretical`, () => {
      const theoreticalGameCount = (names.length * (names.length - 1)) / 2;
      expect(gameCount).toBe(theoreticalGameCount);
      expect(roundCount).toBe(labels.length - 1);
    });

    test(`${tournamentNumber} - ${names.length} players: everyone meets everyone`, () => {
      for (let player = 0; player < names.length; player++) {
        expect(opponents[player].size).toBe(names.length - 1);
      }
    });

    test(`${tournamentNumber} - ${names.length} players: byes only for odd lists`, () => {
      const expectedByes = hasSpacer ? 1 : 0;
      expect(byesPerPlayer.every((byes) => byes === expectedByes)).toBe(true);
      expect(hasSpacer).toBe(names.length % 2 === 1);
      if (hasSpacer) {
        expect(labels[labels.length - 1]).toBe(SPACER);
      }
    });
  }
});
