/**
 * Says "defeated" in creative ways for post game titles
 */

/** Returns a float in [0, 1), like Math.random */
export type RandomSource = () => number;

export interface WeightedPhrase {
  phrase: string;
  weight: number;
}

export type MarginBand = 'loss' | 'narrow' | 'close' | 'ordinary' | 'blowout' | 'rout';

const phrases = (...entries: Array<string | [string, number]>): readonly WeightedPhrase[] =>
  Object.freeze(
    entries.map((entry) =>
      typeof entry === 'string' ? { phrase: entry, weight: 1 } : { phrase: entry[0], weight: entry[1] }
    )
  );

export const DEFEAT_SYNONYMS: Readonly<Record<MarginBand, readonly WeightedPhrase[]>> = Object.freeze({
  loss: phrases('defeat', 'beat'),
  narrow: phrases('steal one against', 'hang on to defeat', 'edge out'),
  close: phrases(['hang on to defeat', 2], 'edge out'),
  ordinary: phrases(['defeat', 2], 'beat', 'triumph over'),
  blowout: phrases('blow out', 'level out', 'destroy', 'crush', 'walk all over', 'exterminate'),
  rout: phrases('slaughter', 'massacre', 'obliterate', 'eviscerate', 'annihilate'),
});

/**
 * Band for a final margin. The followed team losing always reads plainly.
 */
export function marginBand(margin: number, followedTeamWon: boolean): MarginBand {
  if (!followedTeamWon) return 'loss';
  const abs = Math.abs(margin);
  if (abs < 3) return 'narrow';
  if (abs < 6) return 'close';
  if (abs > 40) return 'rout';
  if (abs > 20) return 'blowout';
  return 'ordinary';
}

export function pickWeighted(entries: readonly WeightedPhrase[], random: RandomSource): string {
  const total = entries.reduce((sum, entry) => sum + entry.weight, 0);
  let roll = random() * total;
  for (const entry of entries) {
    roll -= entry.weight;
    if (roll < 0) {
      return entry.phrase;
    }
  }
  return entries[entries.length - 1].phrase;
}

export function defeatSynonym(margin: number, followedTeamWon: boolean, random: RandomSource): string {
  return pickWeighted(DEFEAT_SYNONYMS[marginBand(margin, followedTeamWon)], random);
}
