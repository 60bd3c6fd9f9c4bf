import { main } from 'cli/run.ts'
import type { Output } from 'cli/run.ts'
import { usage } from 'cli/config.ts'

import log from 'utils/logger.ts'

import {expect} from 'chai'

/*
 * Run the command, collecting what it writes.
 */
const capture = (argv: string[]) => {
  const out: string[] = [];
  const err: string[] = [];
  const output: Output = {
    out: line => { out.push(line); },
    err: line => { err.push(line); },
  };
  const status = main(argv, output);
  return {status, out, err};
};

describe('main', () => {
  before(() => { log.silent = true; });
  after(() => { log.silent = false; });

  it('exits 1 on a bad flag without sampling', () => {
    const {status, out, err} = capture(['--cards', '13']);
    expect(status).to.equal(1);
    expect(out).to.deep.equal([]);
    expect(err).to.have.lengthOf(1);
    expect(err[0].startsWith('error: optional property "cards": ')).to.be.true;
  });

  it('exits 1 when the deck cannot cover the hand', () => {
    expect(capture(['--decks', '0', '--cards', '3'])).to.deep.equal({
      status: 1,
      out: [],
      err: ['error: cannot draw 3 cards from a deck of 0'],
    });
  });

  it('prints usage for --help', () => {
    expect(capture(['--help'])).to.deep.equal({
      status: 0,
      out: [usage],
      err: [],
    });
  });

  it('prints progress and the report for a run', () => {
    const {status, out, err} = capture([
      '--seed', '1', '--cards', '1', '--batch-size', '1000',
      '--max-iterations', '1000',
    ]);
    expect(status).to.equal(0);
    expect(err).to.deep.equal([]);
    // a single card falls into no category
    expect(out).to.deep.equal([
      '1000 iterations...',
      '--------------',
      '(no overlapping 99% confidence intervals)',
      'total iterations: 1000',
      'Straight flush: 0.000000 (0)',
      '          Pair: 0.000000 (0)',
      '    Full house: 0.000000 (0)',
      '   Flush house: 0.000000 (0)',
      '    Flush five: 0.000000 (0)',
      '   5 of a kind: 0.000000 (0)',
      '   4 of a kind: 0.000000 (0)',
      '   3 of a kind: 0.000000 (0)',
      '        2 pair: 0.000000 (0)',
    ]);
  });
});
