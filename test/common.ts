import { Suit, Rank, Card } from 'lib/cards.ts'
import type { Hand } from 'lib/cards.ts'

const RANK_CHARS = '23456789TJQKA';
const SUIT_CHARS = 'cdsh';

/*
 * Card from raw (suit, rank) indices.
 */
export const card = (suit: number, rank: number) => new Card(suit, rank);

/*
 * Cards from shorthand like 'Ac Td 2s'.
 */
export function parse_cards(s: string): Card[] {
  return s.split(/\s+/).filter(tok => tok.length > 0).map(tok => {
    const rank = RANK_CHARS.indexOf(tok[0]);
    const suit = SUIT_CHARS.indexOf(tok[1]);
    if (rank < 0 || suit < 0 || tok.length !== 2) {
      throw new Error(`bad card shorthand: ${tok}`);
    }
    return new Card(suit, rank);
  });
}

export const hand = (s: string, jokers: number = 0): Hand => ({
  cards: parse_cards(s),
  jokers,
});

export { Suit, Rank };
