import { catalog, category, HandSize, is_hand_size } from 'lib/categories.ts'

import * as c from 'test/common.ts'

import {expect} from 'chai'

const find = (hand_size: HandSize, name: string) => {
  const cat = catalog(hand_size).find(cat => cat.name === name);
  if (!cat) throw new Error(`no category named ${name}`);
  return cat;
};

describe('catalog', () => {
  it('lists the five-card categories', () => {
    expect(catalog(HandSize.FIVE).map(cat => cat.name)).to.deep.equal([
      'Pair',
      '3 of a kind',
      '4 of a kind',
      '5 of a kind',
      '2 pair',
      'Full house',
      'Flush house',
      'Straight flush',
      'Flush five',
    ]);
  });

  it('lists the six-card categories', () => {
    expect(catalog(HandSize.SIX).map(cat => cat.name)).to.deep.equal([
      'Pair',
      '3 of a kind',
      '4 of a kind',
      '5 of a kind',
      '2 pair',
      '3 pair',
      '6 of a kind',
      '2 triplets',
      'Straight (6)',
      'Flush (6)',
      'Full mansion',
      'Straight flush (6)',
      'Flush six',
    ]);
  });

  it('binds parameters into each predicate', () => {
    const {cards} = c.hand('2c 3d 4h 5s 6c 7d');
    expect(find(HandSize.SIX, 'Straight (6)').evaluate(cards, 0)).to.be.true;
    expect(find(HandSize.SIX, 'Straight (6)').evaluate(cards.slice(1), 0))
      .to.be.false;
    expect(find(HandSize.SIX, 'Straight (6)').evaluate(cards.slice(1), 1))
      .to.be.true;

    const quads = c.hand('9c 9d 9h 9s');
    expect(find(HandSize.FIVE, '4 of a kind').evaluate(quads.cards, 0)).to.be.true;
    expect(find(HandSize.FIVE, '5 of a kind').evaluate(quads.cards, 0)).to.be.false;
    expect(find(HandSize.FIVE, '5 of a kind').evaluate(quads.cards, 1)).to.be.true;

    const suited = c.hand('Ac Ac Ac Ac Ac');
    expect(find(HandSize.FIVE, 'Flush five').evaluate(suited.cards, 0)).to.be.true;
    expect(find(HandSize.SIX, 'Flush six').evaluate(suited.cards, 0)).to.be.false;
    expect(find(HandSize.SIX, 'Flush six').evaluate(suited.cards, 1)).to.be.true;
  });

  it('makes categories from bare predicates', () => {
    const cat = category('Anything', () => true);
    expect(cat.name).to.equal('Anything');
    expect(cat.evaluate([], 0)).to.be.true;
  });
});

describe('is_hand_size', () => {
  it('accepts 5 and 6 only', () => {
    expect(is_hand_size(5)).to.be.true;
    expect(is_hand_size(6)).to.be.true;
    expect(is_hand_size(7)).to.be.false;
    expect(is_hand_size(4)).to.be.false;
  });
});
